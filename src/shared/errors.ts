/**
 * Error taxonomy for bank clients.
 *
 * - `ConfigurationError` - missing credentials or bad settings, raised before any request
 * - `SessionError` - network and portal faults (HTTP status, missing form, empty responses)
 * - `ParseError` - export text that does not match the expected layout
 */

export type BankClientErrorCode = 'CONFIGURATION' | 'SESSION' | 'PARSE';

export abstract class BankClientError extends Error {
  abstract readonly code: BankClientErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends BankClientError {
  readonly code = 'CONFIGURATION' as const;
}

export interface SessionErrorDetails {
  /** HTTP status of the failing response, when there was one */
  status?: number;
  /** URL of the failing request */
  url?: string;
  cause?: unknown;
}

export class SessionError extends BankClientError {
  readonly code = 'SESSION' as const;
  readonly status?: number;
  readonly url?: string;

  constructor(message: string, details: SessionErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.status = details.status;
    this.url = details.url;
  }
}

/** Which part of an export the parser rejected */
export type ParseErrorField = 'header' | 'line' | 'date' | 'amount';

export interface ParseErrorDetails {
  field: ParseErrorField;
  /** The raw input that failed (a whole line, or a single field value) */
  line?: string;
  /** 1-based line number inside the export body */
  lineNumber?: number;
  cause?: unknown;
}

export class ParseError extends BankClientError {
  readonly code = 'PARSE' as const;
  readonly field: ParseErrorField;
  readonly line?: string;
  readonly lineNumber?: number;

  constructor(message: string, details: ParseErrorDetails) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.field = details.field;
    this.line = details.line;
    this.lineNumber = details.lineNumber;
  }
}
