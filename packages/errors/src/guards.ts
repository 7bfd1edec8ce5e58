import { InterconnectError } from "./base.js";
import { ConflictError } from "./bases/conflict-error.js";
import { ExternalError } from "./bases/external-error.js";
import { InternalError } from "./bases/internal-error.js";
import { NotFoundError } from "./bases/not-found-error.js";
import { PermissionError } from "./bases/permission-error.js";
import { RateLimitError } from "./bases/rate-limit-error.js";
import { TimeoutError } from "./bases/timeout-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ErrorCode } from "./catalog.js";

// ============================================================================
// BASE TYPE GUARDS
// ============================================================================

type ErrorClass<E extends InterconnectError> = abstract new (...args: never[]) => E;

function guardFor<E extends InterconnectError>(type: ErrorClass<E>) {
  return (error: unknown): error is E => error instanceof type;
}

/** Bad input: malformed envelopes, handshakes and config */
export const isValidationError = guardFor(ValidationError);
/** Recipient or method missing */
export const isNotFoundError = guardFor(NotFoundError);
/** Unknown credential, missing capability, spoofed sender */
export const isPermissionError = guardFor(PermissionError);
/** Identity already taken, duplicate message id */
export const isConflictError = guardFor(ConflictError);
export const isRateLimitError = guardFor(RateLimitError);
export const isTimeoutError = guardFor(TimeoutError);
/** A callee, transport or broker failed */
export const isExternalError = guardFor(ExternalError);
/** Invariant violations */
export const isInternalError = guardFor(InternalError);

// ============================================================================
// CODE GUARDS
// ============================================================================

/**
 * Narrow an error to one catalog code.
 */
export function hasCode<C extends ErrorCode>(
  error: InterconnectError,
  code: C,
): error is InterconnectError & { readonly code: C } {
  return error.code === code;
}

/**
 * Expected errors are converted to fault frames; anything else that reaches
 * the dispatch loop is fatal.
 */
export function isExpectedError(error: unknown): error is InterconnectError {
  return error instanceof InterconnectError && error.isExpected;
}
