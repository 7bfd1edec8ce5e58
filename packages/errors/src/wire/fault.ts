/**
 * Fault frame mapping.
 *
 * Routing errors and RPC faults travel as a `[kind, detail]` pair. The kind is
 * a stable lowercase token; this module maps it to and from catalog codes so
 * both ends of a link can work with typed errors.
 */

import type { InterconnectError } from "../base.js";
import { ConflictError } from "../bases/conflict-error.js";
import { ExternalError } from "../bases/external-error.js";
import { NotFoundError } from "../bases/not-found-error.js";
import { PermissionError } from "../bases/permission-error.js";
import { RateLimitError } from "../bases/rate-limit-error.js";
import { TimeoutError } from "../bases/timeout-error.js";
import { ValidationError } from "../bases/validation-error.js";
import type { ErrorCode } from "../catalog.js";
import { isValidationError } from "../guards.js";
import { isInterconnectError } from "../base.js";

// ============================================================================
// FAULT KINDS
// ============================================================================

export const FAULT_KINDS = [
  "application-error",
  "recipient-unavailable",
  "peer-unavailable",
  "timeout",
  "capability-denied",
  "identity-mismatch",
  "malformed",
  "rate-limited",
] as const;

export type FaultKind = (typeof FAULT_KINDS)[number];

const FAULT_KIND_BY_CODE: Partial<Record<ErrorCode, FaultKind>> = {
  RPC_APPLICATION_ERROR: "application-error",
  RPC_METHOD_NOT_FOUND: "application-error",
  ROUTING_RECIPIENT_UNAVAILABLE: "recipient-unavailable",
  RPC_PEER_UNAVAILABLE: "peer-unavailable",
  RPC_TIMEOUT: "timeout",
  AUTH_CAPABILITY_DENIED: "capability-denied",
  AUTH_SENDER_MISMATCH: "identity-mismatch",
  ROUTING_MALFORMED_ENVELOPE: "malformed",
  ROUTING_FRAME_TOO_LARGE: "malformed",
  RPC_DUPLICATE_MESSAGE_ID: "malformed",
  ROUTING_RATE_LIMITED: "rate-limited",
};

export function isFaultKind(value: string): value is FaultKind {
  return FAULT_KINDS.some((candidate) => candidate === value);
}

/**
 * Fault kind to report for an error.
 * Errors that are not InterconnectErrors were raised by application code.
 */
export function faultKindOf(error: unknown): FaultKind {
  if (!isInterconnectError(error)) {
    return "application-error";
  }
  const kind = FAULT_KIND_BY_CODE[error.code];
  if (kind) {
    return kind;
  }
  return isValidationError(error) ? "malformed" : "application-error";
}

/**
 * Rebuild a typed error from a received fault frame.
 */
export function faultToError(kind: FaultKind, detail: string): InterconnectError {
  const metadata = { faultKind: kind };
  switch (kind) {
    case "application-error":
      return new ExternalError({ code: "RPC_APPLICATION_ERROR", message: detail, metadata });
    case "recipient-unavailable":
      return new NotFoundError({ code: "ROUTING_RECIPIENT_UNAVAILABLE", message: detail, metadata });
    case "peer-unavailable":
      return new ExternalError({ code: "RPC_PEER_UNAVAILABLE", message: detail, metadata });
    case "timeout":
      return new TimeoutError({ code: "RPC_TIMEOUT", message: detail, metadata });
    case "capability-denied":
      return new PermissionError({ code: "AUTH_CAPABILITY_DENIED", message: detail, metadata });
    case "identity-mismatch":
      return new PermissionError({ code: "AUTH_SENDER_MISMATCH", message: detail, metadata });
    case "malformed":
      return new ValidationError({ code: "ROUTING_MALFORMED_ENVELOPE", message: detail, metadata });
    case "rate-limited":
      return new RateLimitError({ code: "ROUTING_RATE_LIMITED", message: detail, metadata });
  }
}

// ============================================================================
// AUTH REJECTION REASONS
// ============================================================================

export const AUTH_REJECTION_REASONS = ["unknown-credential", "identity-conflict", "malformed"] as const;

export type AuthRejectionReason = (typeof AUTH_REJECTION_REASONS)[number];

export function isAuthRejectionReason(value: string): value is AuthRejectionReason {
  return AUTH_REJECTION_REASONS.some((candidate) => candidate === value);
}

/**
 * Rebuild a typed error from an auth `error` frame.
 */
export function rejectionToError(reason: AuthRejectionReason, detail: string): InterconnectError {
  const metadata = { reason };
  switch (reason) {
    case "unknown-credential":
      return new PermissionError({ code: "AUTH_UNKNOWN_CREDENTIAL", message: detail, metadata });
    case "identity-conflict":
      return new ConflictError({ code: "AUTH_IDENTITY_CONFLICT", message: detail, metadata });
    case "malformed":
      return new ValidationError({ code: "AUTH_MALFORMED_HANDSHAKE", message: detail, metadata });
  }
}
