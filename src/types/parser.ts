/**
 * Parser Types
 */

import type { Proposition } from './clause.js';

export type TokenType =
    | 'IDENT'         // Station_Open_Expo
    | 'AND'           // & ∧
    | 'IMPLIES'       // -> → =>
    | 'NOT'           // - ¬ ! ~
    | 'LPAREN'        // (
    | 'RPAREN'        // )
    | 'EOF';

export interface Token {
    type: TokenType;
    value: string;
    position: number;
}

/**
 * A parsed rule formula.
 */
export interface ParsedImplication {
    antecedents: Proposition[];
    consequent: Proposition;
}
