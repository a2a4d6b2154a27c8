/**
 * Error taxonomy for the verification engine.
 *
 * Every error carries a stable `code` so outer layers (MCP tools, REST handlers,
 * CLI) can map it onto an `error_code` payload without inspecting messages.
 */

export type VerificationErrorCode = 'DATE_PARSE_ERROR' | 'INVALID_DATE' | 'INVALID_INPUT';

export class VerificationError extends Error {
  readonly code: VerificationErrorCode;

  constructor(code: VerificationErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised when a date string matches none of the supported forms, is not a real
 * calendar date, or lies outside the accepted year range.
 */
export class DateParseError extends VerificationError {
  readonly input: string;
  readonly reason: string;

  constructor(input: string, reason: string) {
    super('DATE_PARSE_ERROR', `Cannot parse date "${input}": ${reason}`);
    this.input = input;
    this.reason = reason;
  }
}

/**
 * Raised when the as-of date precedes the date of birth.
 */
export class InvalidDateError extends VerificationError {
  constructor(message: string) {
    super('INVALID_DATE', message);
  }
}

export interface InputIssue {
  path: string;
  message: string;
}

/**
 * Raised for malformed inputs to the engine itself (null reference record,
 * non-string OCR text, bad configuration). The run is aborted before any work.
 */
export class InvalidInputError extends VerificationError {
  readonly issues: InputIssue[];

  constructor(message: string, issues: InputIssue[] = []) {
    super('INVALID_INPUT', message);
    this.issues = issues;
  }
}

export function isVerificationError(error: unknown): error is VerificationError {
  return error instanceof VerificationError;
}
