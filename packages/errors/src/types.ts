import type { BaseErrorType, CodesForBase, ErrorCode } from "./catalog.js";

/**
 * Constructor options shared by every base error. Domain and isExpected are
 * looked up in the catalog by code.
 */
export interface InterconnectErrorOptions<C extends ErrorCode> {
  readonly code: C;
  readonly message: string;
  /** String-valued context, e.g. the fault kind a wire error was rebuilt from */
  readonly metadata?: Record<string, string> | undefined;
  readonly cause?: unknown;
}

export type { BaseErrorType, CodesForBase };

export type ValidationCodes = CodesForBase<"ValidationError">;
export type NotFoundCodes = CodesForBase<"NotFoundError">;
export type PermissionCodes = CodesForBase<"PermissionError">;
export type ConflictCodes = CodesForBase<"ConflictError">;
export type RateLimitCodes = CodesForBase<"RateLimitError">;
export type TimeoutCodes = CodesForBase<"TimeoutError">;
export type ExternalCodes = CodesForBase<"ExternalError">;
export type InternalCodes = CodesForBase<"InternalError">;
