/**
 * Rule formula parsing
 */

import type { Proposition } from '../types/clause.js';
import type { ParsedImplication } from '../types/parser.js';
import { Tokenizer } from './tokenizer.js';
import { Parser } from './parser.js';

export { Tokenizer } from './tokenizer.js';
export { Parser } from './parser.js';

/**
 * Parse an implication such as `A & -B -> C`.
 */
export function parseImplication(input: string): ParsedImplication {
    const tokens = new Tokenizer(input).tokenize();
    return new Parser(tokens, input).parseImplication();
}

/**
 * Parse a single literal such as `A`, `-A` or `¬A`.
 */
export function parseLiteral(input: string): Proposition {
    const tokens = new Tokenizer(input).tokenize();
    return new Parser(tokens, input).parseSingleLiteral();
}
