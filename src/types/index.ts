/**
 * Shared type definitions
 */

// Re-export error types
export {
    LogicException,
    ConfigurationError,
    NotFoundError,
    ConflictingFactsError,
    SaturationLimitExceeded,
    getSuggestion,
    createParseError,
    createConfigurationError,
    createRuleNotFoundError,
    createConflictingFactsError,
    createInvalidFactError,
    createInvalidArgumentsError,
    createSaturationLimitError,
    createUnsatisfiableError,
    createEngineError,
    serializeLogicError,
} from './errors.js';

export type {
    LogicErrorCode,
    ErrorSpan,
    LogicError,
} from './errors.js';

// Re-export clause types
export type {
    Proposition,
    Clause,
    ClauseOrigin,
    DerivationStep,
} from './clause.js';

// Re-export rule types
export type {
    LiteralInput,
    RuleDefinition,
    Rule,
    KnowledgeBaseSummary,
} from './rule.js';

// Re-export parser types
export type {
    TokenType,
    Token,
    ParsedImplication,
} from './parser.js';

// Re-export response types
export type {
    Verbosity,
    RunStatistics,
    Verdict,
    EntailmentResult,
    MinimalVerdictResponse,
    StandardVerdictResponse,
    DetailedVerdictResponse,
    VerdictResponse,
    MinimalEntailmentResponse,
    StandardEntailmentResponse,
    DetailedEntailmentResponse,
    EntailmentResponse,
} from './responses.js';

// Re-export options
export {
    DEFAULTS
} from './options.js';

export type {
    ReasoningOptions,
    CheckOptions,
    EngineLimits,
} from './options.js';
