/**
 * Options shared by consistency checks and entailment queries.
 */
export interface ReasoningOptions {
    /** Abort with SaturationLimitExceeded once the clause arena grows past this size */
    maxClauses?: number;
    /** Abort with SaturationLimitExceeded after this many resolution attempts */
    maxResolutions?: number;
    /** Reconstruct the derivation trace of a refutation (default: true) */
    includeTrace?: boolean;
    /**
     * Callback for progress updates.
     * @param progress Share of the queued clauses processed so far, between 0 and 1.
     * @param message A descriptive message about the current step.
     */
    onProgress?: (progress: number | undefined, message: string) => void;
}

export interface CheckOptions extends ReasoningOptions {
    /** Attach a satisfying assignment to consistent verdicts */
    withModel?: boolean;
}

/** Engine-wide bounds; per-call ReasoningOptions override them. */
export interface EngineLimits {
    maxClauses: number;
    maxResolutions: number;
}

export const DEFAULTS = {
    maxClauses: 50_000,
    maxResolutions: 2_000_000,
    progressInterval: 250,
    defaultMode: 'today',
} as const;
