/**
 * CNF Clause Types
 *
 * Propositions, clauses and the derivation records produced by resolution.
 */

/**
 * An atomic named boolean variable, optionally negated.
 * Two propositions are complementary when they share a name and differ in sign.
 */
export interface Proposition {
    readonly name: string;
    readonly negated: boolean;
}

/**
 * A disjunction of propositions in canonical order (by name, positive first),
 * without duplicates. The empty clause stands for contradiction (□).
 */
export interface Clause {
    readonly propositions: readonly Proposition[];
    /** Content key: equal for clauses with the same propositions */
    readonly key: string;
}

/**
 * Where a clause in a derivation came from.
 */
export type ClauseOrigin =
    | { readonly kind: 'rule'; readonly ruleId: string }
    | { readonly kind: 'fact'; readonly proposition: Proposition }
    | { readonly kind: 'query'; readonly proposition: Proposition }
    | { readonly kind: 'resolvent'; readonly pivot: string };

/**
 * One clause of a derivation with the ids of the clauses it was resolved from
 * (empty for input clauses). Ids are creation order within a single run.
 */
export interface DerivationStep {
    readonly id: number;
    readonly clause: Clause;
    readonly parents: readonly number[];
    readonly origin: ClauseOrigin;
}
