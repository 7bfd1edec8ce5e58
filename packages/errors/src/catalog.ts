/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code raised by the router, the agent client and the transports
 * is declared here. Each code maps to a base error type of the consolidated
 * hierarchy and states whether it represents an expected condition (one the
 * router turns into a fault frame) or a programming error.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: internal, auth, routing, rpc, config, transport
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "NotFoundError"
  | "PermissionError"
  | "ConflictError"
  | "RateLimitError"
  | "TimeoutError"
  | "ExternalError"
  | "InternalError";

interface CatalogEntryShape {
  readonly domain: string;
  readonly baseType: BaseErrorType;
  readonly isExpected: boolean;
  readonly title: string;
  readonly description: string;
}

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - Programming errors, always fatal
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    baseType: "InternalError",
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },
  INTERNAL_INVARIANT_VIOLATION: {
    domain: "internal",
    baseType: "InternalError",
    isExpected: false,
    title: "Invariant violation",
    description: "A routing invariant was broken; continuing would corrupt routing guarantees",
  },

  // ============================================================================
  // AUTH ERRORS - Admission and authorization
  // ============================================================================
  AUTH_UNKNOWN_CREDENTIAL: {
    domain: "auth",
    baseType: "PermissionError",
    isExpected: true,
    title: "Unknown credential",
    description: "The presented credential is not in the credential store or its proof is invalid",
  },
  AUTH_IDENTITY_CONFLICT: {
    domain: "auth",
    baseType: "ConflictError",
    isExpected: true,
    title: "Identity conflict",
    description: "The identity is held by a live connection or bound to another credential",
  },
  AUTH_MALFORMED_HANDSHAKE: {
    domain: "auth",
    baseType: "ValidationError",
    isExpected: true,
    title: "Malformed handshake",
    description: "The hello frame is missing fields or carries an invalid identity",
  },
  AUTH_CAPABILITY_DENIED: {
    domain: "auth",
    baseType: "PermissionError",
    isExpected: true,
    title: "Capability denied",
    description: "The identity holds no capability covering the requested operation",
  },
  AUTH_SENDER_MISMATCH: {
    domain: "auth",
    baseType: "PermissionError",
    isExpected: true,
    title: "Sender mismatch",
    description: "The envelope names a sender other than the authenticated identity",
  },
  AUTH_HANDSHAKE_TIMEOUT: {
    domain: "auth",
    baseType: "TimeoutError",
    isExpected: true,
    title: "Handshake timed out",
    description: "No welcome arrived before the handshake deadline",
  },

  // ============================================================================
  // ROUTING ERRORS - Surfaced to the sender as fault frames
  // ============================================================================
  ROUTING_MALFORMED_ENVELOPE: {
    domain: "routing",
    baseType: "ValidationError",
    isExpected: true,
    title: "Malformed envelope",
    description: "The frame is not a valid envelope or its subsystem arguments are invalid",
  },
  ROUTING_RECIPIENT_UNAVAILABLE: {
    domain: "routing",
    baseType: "NotFoundError",
    isExpected: true,
    title: "Recipient unavailable",
    description: "No connection is registered for the recipient identity",
  },
  ROUTING_IDENTITY_IN_USE: {
    domain: "routing",
    baseType: "ConflictError",
    isExpected: true,
    title: "Identity in use",
    description: "The identity is registered to a connection that is still alive",
  },
  ROUTING_RATE_LIMITED: {
    domain: "routing",
    baseType: "RateLimitError",
    isExpected: true,
    title: "Rate limited",
    description: "The connection exceeded its frames-per-second allowance",
  },
  ROUTING_FRAME_TOO_LARGE: {
    domain: "routing",
    baseType: "ValidationError",
    isExpected: true,
    title: "Frame too large",
    description: "The frame exceeds the configured maximum frame size",
  },

  // ============================================================================
  // RPC ERRORS - Typed faults delivered to callers
  // ============================================================================
  RPC_APPLICATION_ERROR: {
    domain: "rpc",
    baseType: "ExternalError",
    isExpected: true,
    title: "Application error",
    description: "The callee raised an error while handling the call",
  },
  RPC_METHOD_NOT_FOUND: {
    domain: "rpc",
    baseType: "NotFoundError",
    isExpected: true,
    title: "Method not found",
    description: "The callee exports no method with that name",
  },
  RPC_PEER_UNAVAILABLE: {
    domain: "rpc",
    baseType: "ExternalError",
    isExpected: true,
    title: "Peer unavailable",
    description: "The peer disconnected before the call resolved",
  },
  RPC_TIMEOUT: {
    domain: "rpc",
    baseType: "TimeoutError",
    isExpected: true,
    title: "Call timed out",
    description: "The call deadline passed without a reply",
  },
  RPC_DUPLICATE_MESSAGE_ID: {
    domain: "rpc",
    baseType: "ConflictError",
    isExpected: true,
    title: "Duplicate message id",
    description: "A call with the same message id is already in flight",
  },

  // ============================================================================
  // CONFIG ERRORS
  // ============================================================================
  CONFIG_INVALID: {
    domain: "config",
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid configuration",
    description: "The configuration file failed schema validation",
  },
  CONFIG_CREDENTIALS_INVALID: {
    domain: "config",
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid credential file",
    description: "The credential file failed schema validation",
  },

  // ============================================================================
  // TRANSPORT ERRORS
  // ============================================================================
  TRANSPORT_NOT_CONNECTED: {
    domain: "transport",
    baseType: "ExternalError",
    isExpected: true,
    title: "Not connected",
    description: "The link to the router is not open",
  },
  TRANSPORT_CONNECT_FAILED: {
    domain: "transport",
    baseType: "ExternalError",
    isExpected: true,
    title: "Connect failed",
    description: "The link to the router could not be established",
  },
} as const satisfies Record<string, CatalogEntryShape>;

// ============================================================================
// DERIVED TYPES
// ============================================================================

/**
 * Union of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Catalog entry for an error code
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union of all error domains
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * Error codes whose catalog entry maps to base type B
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
