import { ERROR_CATALOG, type BaseErrorType, type ErrorCode, type ErrorDomain } from "./catalog.js";
import type { InterconnectErrorOptions } from "./types.js";

/**
 * Serialized form of an InterconnectError (for logs and diagnostics)
 */
export interface ErrorJSON {
  readonly _tag: BaseErrorType;
  readonly code: ErrorCode;
  readonly domain: ErrorDomain;
  readonly message: string;
  readonly isExpected: boolean;
  readonly metadata?: Readonly<Record<string, string>> | undefined;
  readonly timestamp: string;
}

/**
 * Root of the error hierarchy.
 *
 * Subclasses fix `_tag`; the `.code` discriminates the specific condition and
 * pulls `domain` and `isExpected` from the catalog.
 */
export abstract class InterconnectError<C extends ErrorCode = ErrorCode> extends Error {
  abstract readonly _tag: BaseErrorType;
  readonly code: C;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly metadata: Readonly<Record<string, string>> | undefined;
  readonly timestamp: string;

  constructor(options: InterconnectErrorOptions<C>) {
    super(options.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    const entry = ERROR_CATALOG[options.code];
    this.name = new.target.name;
    this.code = options.code;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.metadata = options.metadata;
    this.timestamp = new Date().toISOString();
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      code: this.code,
      domain: this.domain,
      message: this.message,
      isExpected: this.isExpected,
      ...(this.metadata ? { metadata: this.metadata } : {}),
      timestamp: this.timestamp,
    };
  }
}

/**
 * Check if a value is an InterconnectError
 */
export function isInterconnectError(error: unknown): error is InterconnectError {
  return error instanceof InterconnectError;
}

/**
 * Check if a value is any Error
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}
