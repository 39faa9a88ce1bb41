/**
 * Structured Error System
 *
 * Machine-readable errors with codes, spans, and suggestions. Inconsistent
 * fact sets are not errors: they come back as a Verdict.
 */

/**
 * Error codes for rulebook operations
 */
export type LogicErrorCode =
  | 'PARSE_ERROR'           // Malformed literal or rule formula
  | 'CONFIGURATION_ERROR'   // Malformed rule, rulebook or environment
  | 'NOT_FOUND'             // Unknown rule id
  | 'CONFLICTING_FACTS'     // Fact set assigns both values to one name
  | 'INVALID_FACT'          // Fact with a blank name or non-boolean value
  | 'INVALID_ARGUMENTS'     // Tool or command arguments of the wrong shape
  | 'SATURATION_LIMIT'      // Clause or resolution bound reached
  | 'UNSATISFIABLE'         // Operation needs a consistent fact set
  | 'ENGINE_ERROR';         // Resolution and SAT backends disagree

/**
 * Source location span for error reporting
 */
export interface ErrorSpan {
  start: number;
  end: number;
  line?: number;
  col?: number;
}

/**
 * Structured error with code, message, span, and suggestions
 */
export interface LogicError {
  code: LogicErrorCode;
  message: string;
  span?: ErrorSpan;
  suggestion?: string;
  context?: string;          // The offending text (formula, file, fact name)
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping LogicError for throw/catch patterns
 */
export class LogicException extends Error {
  public readonly error: LogicError;

  constructor(error: LogicError) {
    super(error.message);
    this.name = 'LogicException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get code(): LogicErrorCode {
    return this.error.code;
  }

  /**
   * Serialize error for tool responses
   */
  toJSON(): LogicError {
    return this.error;
  }
}

/** Malformed rule, duplicate id, undeclared mode or bad rulebook. Fatal at load time. */
export class ConfigurationError extends LogicException {
  constructor(error: Omit<LogicError, 'code'>) {
    super({ ...error, code: 'CONFIGURATION_ERROR' });
    this.name = 'ConfigurationError';
  }
}

/** Lookup of an unknown rule id. */
export class NotFoundError extends LogicException {
  constructor(error: Omit<LogicError, 'code'>) {
    super({ ...error, code: 'NOT_FOUND' });
    this.name = 'NotFoundError';
  }
}

/** A fact set that assigns both true and false to the same name. */
export class ConflictingFactsError extends LogicException {
  constructor(error: Omit<LogicError, 'code'>) {
    super({ ...error, code: 'CONFLICTING_FACTS' });
    this.name = 'ConflictingFactsError';
  }
}

/** Saturation stopped at a configured bound; the verdict is unknown. */
export class SaturationLimitExceeded extends LogicException {
  constructor(error: Omit<LogicError, 'code'>) {
    super({ ...error, code: 'SATURATION_LIMIT' });
    this.name = 'SaturationLimitExceeded';
  }
}

/**
 * Common syntax error patterns and their suggestions
 */
const SYNTAX_SUGGESTIONS: Array<{
  pattern: RegExp;
  suggestion: string;
}> = [
    {
      pattern: /\([^)]*$/,
      suggestion: "Unbalanced parentheses - missing closing ')'"
    },
    {
      pattern: /^[^(]*\)/,
      suggestion: "Unbalanced parentheses - missing opening '('"
    },
    {
      pattern: /(->|→|=>)\s*$/,
      suggestion: "Incomplete implication - missing consequent after '->'"
    },
    {
      pattern: /^\s*(->|→|=>)/,
      suggestion: "Incomplete implication - missing antecedent before '->'"
    },
    {
      pattern: /(&|∧)\s*(->|→|=>|$)/,
      suggestion: "Incomplete conjunction - missing right operand after '&'"
    },
    {
      pattern: /\||∨/,
      suggestion: 'Disjunction is not supported in rules - split it into one rule per case'
    },
    {
      pattern: /(->|→|=>).*(&|∧)/,
      suggestion: 'The consequent must be a single literal - split it into one rule per conclusion'
    },
    {
      pattern: /^\s*[-¬!~]+\s*$/,
      suggestion: "Incomplete negation - missing proposition after '-'"
    },
  ];

/**
 * Get a suggestion for a syntax error based on the input
 */
export function getSuggestion(input: string): string | undefined {
  for (const { pattern, suggestion } of SYNTAX_SUGGESTIONS) {
    if (pattern.test(input)) {
      return suggestion;
    }
  }
  return undefined;
}

/**
 * Create a parse error with optional span and suggestion
 */
export function createParseError(
  message: string,
  input: string,
  position?: number
): LogicException {
  const span = position !== undefined ? {
    start: position,
    end: position + 1,
    line: getLineNumber(input, position),
    col: getColumnNumber(input, position),
  } : undefined;

  return new LogicException({
    code: 'PARSE_ERROR',
    message,
    span,
    suggestion: getSuggestion(input),
    context: input,
  });
}

/**
 * Create a configuration error
 */
export function createConfigurationError(
  message: string,
  details?: Record<string, unknown>,
  suggestion?: string
): ConfigurationError {
  return new ConfigurationError({ message, details, suggestion });
}

/**
 * Create a rule-not-found error
 */
export function createRuleNotFoundError(ruleId: string, known: readonly string[]): NotFoundError {
  return new NotFoundError({
    message: `Rule '${ruleId}' not found`,
    suggestion: known.length > 0
      ? `Known rule ids: ${known.join(', ')}`
      : 'The knowledge base has no rules',
    details: { ruleId },
  });
}

/**
 * Create a conflicting facts error
 */
export function createConflictingFactsError(name: string): ConflictingFactsError {
  return new ConflictingFactsError({
    message: `Fact '${name}' is asserted both true and false`,
    suggestion: 'Assign a single truth value to each proposition',
    context: name,
    details: { name },
  });
}

/**
 * Create an invalid fact error
 */
export function createInvalidFactError(
  message: string,
  details?: Record<string, unknown>
): LogicException {
  return new LogicException({
    code: 'INVALID_FACT',
    message,
    suggestion: 'Facts map non-empty proposition names to true or false',
    details,
  });
}

/**
 * Create an invalid arguments error
 */
export function createInvalidArgumentsError(
  message: string,
  details?: Record<string, unknown>
): LogicException {
  return new LogicException({
    code: 'INVALID_ARGUMENTS',
    message,
    details,
  });
}

/**
 * Create a saturation limit error
 */
export function createSaturationLimitError(
  bound: 'clauses' | 'resolutions',
  limit: number,
  details?: Record<string, unknown>
): SaturationLimitExceeded {
  return new SaturationLimitExceeded({
    message: `Saturation limit of ${limit} ${bound} exceeded before a verdict was reached`,
    suggestion: bound === 'clauses'
      ? 'Raise maxClauses (RULEBOOK_MAX_CLAUSES) or reduce the active rule set'
      : 'Raise maxResolutions (RULEBOOK_MAX_RESOLUTIONS) or reduce the active rule set',
    details: { bound, limit, ...details },
  });
}

/**
 * Create an unsatisfiable error
 */
export function createUnsatisfiableError(
  message: string = 'The facts are inconsistent with the active rules',
  details?: Record<string, unknown>
): LogicException {
  return new LogicException({
    code: 'UNSATISFIABLE',
    message,
    suggestion: 'Run a consistency check first and resolve the violated rules',
    details,
  });
}

/**
 * Create an engine error
 */
export function createEngineError(
  message: string,
  details?: Record<string, unknown>
): LogicException {
  return new LogicException({
    code: 'ENGINE_ERROR',
    message: `Engine error: ${message}`,
    details,
  });
}

/**
 * Get line number from position in string
 */
function getLineNumber(input: string, position: number): number {
  const lines = input.substring(0, position).split('\n');
  return lines.length;
}

/**
 * Get column number from position in string
 */
function getColumnNumber(input: string, position: number): number {
  const lastNewline = input.lastIndexOf('\n', position - 1);
  return position - lastNewline;
}

/**
 * Serialize a LogicError for JSON output
 */
export function serializeLogicError(error: LogicError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.span && { span: error.span }),
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}
