import type { Token, TokenType } from '../types/parser.js';
import { createParseError } from '../types/errors.js';

/**
 * Tokenizer for rule formulas and literals
 */
export class Tokenizer {
    private input: string;
    private pos: number = 0;
    private tokens: Token[] = [];

    constructor(input: string) {
        this.input = input;
    }

    tokenize(): Token[] {
        while (this.pos < this.input.length) {
            this.skipWhitespace();
            if (this.pos >= this.input.length) break;

            const char = this.input[this.pos];

            // Multi-character operators first: '->' must not read as NOT
            if (this.match('->') || this.match('=>')) {
                this.addToken('IMPLIES', this.input.slice(this.pos - 2, this.pos), 2);
                continue;
            }

            switch (char) {
                case '(': this.addToken('LPAREN', char); this.pos++; continue;
                case ')': this.addToken('RPAREN', char); this.pos++; continue;
                case '&':
                case '∧': this.addToken('AND', char); this.pos++; continue;
                case '→': this.addToken('IMPLIES', char); this.pos++; continue;
                case '-':
                case '¬':
                case '!':
                case '~': this.addToken('NOT', char); this.pos++; continue;
            }

            if (/[a-zA-Z0-9_]/.test(char)) {
                const start = this.pos;
                while (this.pos < this.input.length && /[a-zA-Z0-9_]/.test(this.input[this.pos])) {
                    this.pos++;
                }
                this.tokens.push({ type: 'IDENT', value: this.input.slice(start, this.pos), position: start });
                continue;
            }

            throw createParseError(`Unexpected character '${char}'`, this.input, this.pos);
        }

        this.tokens.push({ type: 'EOF', value: '', position: this.pos });
        return this.tokens;
    }

    private skipWhitespace(): void {
        while (this.pos < this.input.length && /\s/.test(this.input[this.pos])) {
            this.pos++;
        }
    }

    private match(str: string): boolean {
        if (this.input.slice(this.pos, this.pos + str.length) === str) {
            this.pos += str.length;
            return true;
        }
        return false;
    }

    /** `consumed` is how far `pos` has already moved past the token. */
    private addToken(type: TokenType, value: string, consumed: number = 0): void {
        this.tokens.push({ type, value, position: this.pos - consumed });
    }
}
