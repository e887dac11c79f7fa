/**
 * Error taxonomy
 *
 * Every failure the core can raise is one of these. They are all fatal:
 * nothing is diffed or linted once one has been thrown.
 */

export const ErrorCode = {
  PARSE_ERROR: 'PARSE_ERROR',
  REFERENCE_ERROR: 'REFERENCE_ERROR',
  RULE_CONFIG_ERROR: 'RULE_CONFIG_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export class ContractGuardError extends Error {
  public readonly code: ErrorCodeType;

  constructor(message: string, code: ErrorCodeType, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'ContractGuardError';
    this.code = code;
  }
}

/**
 * The input document is not well-formed: a required key is missing, a type
 * declaration is malformed, or the text could not be parsed at all.
 */
export class ParseError extends ContractGuardError {
  /** JSON pointer into the document (e.g., '#/paths/~1orders/get') */
  public readonly location: string;
  public readonly reason: string;

  constructor(
    location: string,
    reason: string,
    options?: { cause?: unknown; code?: ErrorCodeType }
  ) {
    super(`${reason} (at ${location})`, options?.code ?? ErrorCode.PARSE_ERROR, options);
    this.name = 'ParseError';
    this.location = location;
    this.reason = reason;
  }
}

/**
 * A `$ref` is external, dangling or part of a cycle.
 */
export class ReferenceResolutionError extends ParseError {
  public readonly ref: string;

  constructor(location: string, ref: string, reason: string) {
    super(location, reason, { code: ErrorCode.REFERENCE_ERROR });
    this.name = 'ReferenceResolutionError';
    this.ref = ref;
  }
}

/**
 * A supplied rule set or configuration file is malformed.
 */
export class RuleConfigError extends ContractGuardError {
  public readonly ruleId: string | undefined;
  public readonly issues: readonly string[];

  constructor(message: string, options?: { ruleId?: string; issues?: string[]; cause?: unknown }) {
    super(message, ErrorCode.RULE_CONFIG_ERROR, options);
    this.name = 'RuleConfigError';
    this.ruleId = options?.ruleId;
    this.issues = options?.issues ?? [];
  }
}

export function isContractGuardError(error: unknown): error is ContractGuardError {
  return error instanceof ContractGuardError;
}
