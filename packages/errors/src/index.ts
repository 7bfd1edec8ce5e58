/**
 * @interconnect/errors
 *
 * Shared error taxonomy for the interconnect router and its agents.
 *
 * Each error carries a `.code` from the catalog that discriminates the
 * specific condition. Use `hasCode(error, "XXX")` for fine-grained matching,
 * or `instanceof BaseType` for category matching. Fault frames on the wire map
 * to and from these errors through `faultKindOf` / `faultToError`.
 */

export { type ErrorJSON, InterconnectError, isError, isInterconnectError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorMessage,
  isValidErrorCode,
  toError,
  wrapError,
} from "./utils.js";

export {
  ConflictError,
  ExternalError,
  InternalError,
  NotFoundError,
  PermissionError,
  RateLimitError,
  TimeoutError,
  ValidationError,
} from "./bases/index.js";

export type {
  ConflictCodes,
  ExternalCodes,
  InterconnectErrorOptions,
  InternalCodes,
  NotFoundCodes,
  PermissionCodes,
  RateLimitCodes,
  TimeoutCodes,
  ValidationCodes,
} from "./types.js";

export {
  hasCode,
  isConflictError,
  isExpectedError,
  isExternalError,
  isInternalError,
  isNotFoundError,
  isPermissionError,
  isRateLimitError,
  isTimeoutError,
  isValidationError,
} from "./guards.js";

export {
  AUTH_REJECTION_REASONS,
  type AuthRejectionReason,
  FAULT_KINDS,
  type FaultKind,
  faultKindOf,
  faultToError,
  isAuthRejectionReason,
  isFaultKind,
  rejectionToError,
} from "./wire/fault.js";
