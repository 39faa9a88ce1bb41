import type { Proposition } from '../types/clause.js';
import type { ParsedImplication, Token, TokenType } from '../types/parser.js';
import { createParseError } from '../types/errors.js';
import { createProposition } from '../logic/proposition.js';

/**
 * Parser for rule formulas
 *
 * Grammar (EBNF-ish):
 *   implication = antecedent '->' literal
 *   antecedent  = '(' antecedent ')' ('&' conjunction)? | conjunction
 *   conjunction = literal ('&' literal)*
 *   literal     = '-'* IDENT | '(' literal ')'
 *
 * Repeated negation cancels: `--A` is `A`.
 */
export class Parser {
    private tokens: Token[];
    private originalInput: string;
    private pos: number = 0;

    constructor(tokens: Token[], originalInput: string) {
        this.tokens = tokens;
        this.originalInput = originalInput;
    }

    parseImplication(): ParsedImplication {
        const antecedents = this.parseAntecedent();
        this.expect('IMPLIES');
        const consequent = this.parseLiteral();
        this.expectEnd();
        return { antecedents, consequent };
    }

    parseSingleLiteral(): Proposition {
        const literal = this.parseLiteral();
        this.expectEnd();
        return literal;
    }

    private current(): Token {
        return this.tokens[this.pos] ?? { type: 'EOF', value: '', position: this.originalInput.length };
    }

    private advance(): Token {
        const token = this.current();
        this.pos++;
        return token;
    }

    private expect(type: TokenType): Token {
        const token = this.current();
        if (token.type !== type) {
            throw createParseError(
                token.type === 'EOF'
                    ? `Expected ${type} but reached end of input`
                    : `Expected ${type} but got '${token.value}'`,
                this.originalInput,
                token.position
            );
        }
        return this.advance();
    }

    private expectEnd(): void {
        const token = this.current();
        if (token.type !== 'EOF') {
            throw createParseError(`Unexpected token '${token.value}'`, this.originalInput, token.position);
        }
    }

    private parseAntecedent(): Proposition[] {
        // '(' opens either a grouped conjunction or a parenthesized first literal
        if (this.current().type === 'LPAREN') {
            this.advance();
            const conjuncts = this.parseAntecedent();
            this.expect('RPAREN');
            if (this.current().type === 'AND') {
                this.advance();
                conjuncts.push(...this.parseConjunction());
            }
            return conjuncts;
        }
        return this.parseConjunction();
    }

    private parseConjunction(): Proposition[] {
        const literals = [this.parseLiteral()];
        while (this.current().type === 'AND') {
            this.advance();
            literals.push(this.parseLiteral());
        }
        return literals;
    }

    private parseLiteral(): Proposition {
        let negated = false;
        while (this.current().type === 'NOT') {
            this.advance();
            negated = !negated;
        }

        if (this.current().type === 'LPAREN') {
            this.advance();
            const inner = this.parseLiteral();
            this.expect('RPAREN');
            return createProposition(inner.name, inner.negated !== negated);
        }

        const name = this.expect('IDENT').value;
        return createProposition(name, negated);
    }
}
