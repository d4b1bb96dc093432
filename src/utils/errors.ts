/**
 * Error types and codes for argmatch.
 * All errors raised by the engine extend ArgMatchError.
 */

/**
 * Base error class for all argmatch errors.
 * Carries a stable code, optional structured details and a cause chain.
 */
export class ArgMatchError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ArgMatchError';
    Error.captureStackTrace(this, this.constructor);
  }

  /** Uid of the option this error is scoped to, if any. */
  get uid(): number | undefined {
    const uid = this.details?.uid;
    return typeof uid === 'number' ? uid : undefined;
  }

  /**
   * Attach the error that caused this one.
   */
  causedBy(cause: ArgMatchError): this {
    this.cause = cause;
    return this;
  }

  /**
   * This error followed by its causes, outermost first.
   */
  chain(): ArgMatchError[] {
    const chain: ArgMatchError[] = [];
    let current: unknown = this;
    while (current instanceof ArgMatchError && !chain.includes(current)) {
      chain.push(current);
      current = current.cause;
    }
    return chain;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      cause: this.cause instanceof ArgMatchError ? this.cause.toJSON() : undefined,
    };
  }
}

/**
 * Recoverable failures recorded while matching (missing argument, bad value,
 * unknown option, unsatisfied force-required option, rejected callback).
 * Error codes: M001-M008
 */
export class MatchFailure extends ArgMatchError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'MatchFailure';
  }
}

/**
 * Errors that abort the parse immediately.
 * Error codes: P001
 */
export class ParseError extends ArgMatchError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ParseError';
  }
}

/**
 * Option declaration and parser configuration errors.
 * Error codes: C001-C007
 */
export class ConfigError extends ArgMatchError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, YAML parse errors, etc.).
 * Error codes: S001-S002
 */
export class SystemError extends ArgMatchError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Match failures (M001-M008)
  OPTION_NOT_FOUND: 'M001',
  MISSING_ARGUMENT: 'M002',
  INVALID_VALUE: 'M003',
  OPT_FORCE_REQUIRED: 'M004',
  POS_FORCE_REQUIRED: 'M005',
  CMD_FORCE_REQUIRED: 'M006',
  INVOKE_FAILED: 'M007',
  MAIN_FORCE_REQUIRED: 'M008',

  // Parse errors (P001)
  DEACTIVATE_NOT_SUPPORTED: 'P001',

  // Config errors (C001-C007)
  INVALID_DECLARATION: 'C001',
  INVALID_INDEX: 'C002',
  POS_CONFLICTS_CMD: 'C003',
  DUPLICATE_SUBPARSER: 'C004',
  UNKNOWN_OPTION: 'C005',
  INVALID_STYLE: 'C006',
  CONFIG_LOAD_ERROR: 'C007',

  // System errors (S001-S002)
  PARSE_ERROR: 'S001',
  INVALID_MANIFEST: 'S002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
