import { ValidationError } from "@interconnect/errors";
import { IdentitySchema, type WelcomeMessage } from "@interconnect/protocol";
import { z } from "zod";

// ---------------------------------------------------------------------------
// Agent State
// ---------------------------------------------------------------------------

export const AGENT_STATES = ["disconnected", "connecting", "connected", "reconnecting"] as const;
export type AgentState = (typeof AGENT_STATES)[number];

// ---------------------------------------------------------------------------
// Credentials
// ---------------------------------------------------------------------------

/**
 * Credential presented in the hello: a static token or public key, or a
 * factory called fresh on each connection attempt.
 */
export type CredentialProvider = string | (() => string | Promise<string>);

/**
 * Produces the proof-of-possession JWT for an ed25519 credential.
 * Called on each handshake with the identity being proposed.
 */
export type ProofSigner = (identity: string) => Promise<string>;

// ---------------------------------------------------------------------------
// Reconnect Config
// ---------------------------------------------------------------------------

export interface ReconnectConfig {
  readonly maxRetries: number;
  readonly baseDelay: number;
  readonly maxDelay: number;
}

export const DEFAULT_RECONNECT_CONFIG: ReconnectConfig = {
  maxRetries: 10,
  baseDelay: 1_000,
  maxDelay: 30_000,
} as const;

export const ReconnectConfigSchema = z
  .object({
    maxRetries: z.number().int().nonnegative().default(DEFAULT_RECONNECT_CONFIG.maxRetries),
    baseDelay: z.number().int().positive().default(DEFAULT_RECONNECT_CONFIG.baseDelay),
    maxDelay: z.number().int().positive().default(DEFAULT_RECONNECT_CONFIG.maxDelay),
  })
  .default({});

// ---------------------------------------------------------------------------
// Agent Config
// ---------------------------------------------------------------------------

export const DEFAULT_HANDSHAKE_TIMEOUT = 10_000;
export const DEFAULT_CALL_TIMEOUT = 30_000;

export interface AgentConfig {
  readonly identity: string;
  readonly credential: CredentialProvider;
  /** Required when the credential is an ed25519 public key */
  readonly signProof?: ProofSigner;
  readonly reconnect?: Partial<ReconnectConfig>;
  /** Time allowed between opening the link and the welcome (default: 10s) */
  readonly handshakeTimeout?: number;
  /** Timeout for calls that request none (default: 30s) */
  readonly defaultCallTimeout?: number;
}

export const AgentConfigSchema = z.object({
  identity: IdentitySchema,
  credential: z.union([z.string().min(1), z.function()]),
  signProof: z.function().optional(),
  reconnect: ReconnectConfigSchema,
  handshakeTimeout: z.number().int().positive().default(DEFAULT_HANDSHAKE_TIMEOUT),
  defaultCallTimeout: z.number().int().positive().default(DEFAULT_CALL_TIMEOUT),
});

/**
 * Config after parsing: all defaults applied.
 */
export interface ResolvedAgentConfig {
  readonly identity: string;
  readonly credential: CredentialProvider;
  readonly signProof: ProofSigner | undefined;
  readonly reconnect: ReconnectConfig;
  readonly handshakeTimeout: number;
  readonly defaultCallTimeout: number;
}

/**
 * Validate an AgentConfig and apply defaults.
 * Throws CONFIG_INVALID with the first issue when the config is invalid.
 */
export function resolveAgentConfig(config: AgentConfig): ResolvedAgentConfig {
  const result = AgentConfigSchema.safeParse(config);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new ValidationError({
      code: "CONFIG_INVALID",
      message: `Invalid agent config: ${path}${issue?.message ?? "unknown"}`,
      cause: result.error,
    });
  }
  // zod re-wraps functions; keep the caller's own
  return {
    identity: result.data.identity,
    credential: config.credential,
    signProof: config.signProof,
    reconnect: result.data.reconnect,
    handshakeTimeout: result.data.handshakeTimeout,
    defaultCallTimeout: result.data.defaultCallTimeout,
  };
}

// ---------------------------------------------------------------------------
// Event Handler Types
// ---------------------------------------------------------------------------

export type ConnectedHandler = (welcome: WelcomeMessage) => void;
export type DisconnectedHandler = (reason: string) => void;
export type ReconnectingHandler = (attempt: number, delay: number) => void;
export type ReconnectedHandler = (welcome: WelcomeMessage) => void;
export type PeerHandler = (identity: string) => void;
export type ErrorHandler = (error: Error, context?: string) => void;

/** Receives a publish; `payload` is the JSON-decoded body, or the raw text if it is not JSON */
export type TopicHandler = (topic: string, payload: unknown, sender: string) => void | Promise<void>;

/** An exported method. Receives the decoded call arguments and the caller's identity. */
export type MethodHandler = (args: readonly unknown[], caller: string) => unknown;

export interface CallOptions {
  /** Deadline in ms, clamped by the router to its maximum */
  readonly timeout?: number;
}
