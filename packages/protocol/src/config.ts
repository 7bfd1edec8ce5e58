import { ValidationError } from "@interconnect/errors";
import { z } from "zod";
import { IdentitySchema } from "./envelope.js";

// ---------------------------------------------------------------------------
// Log Levels
// ---------------------------------------------------------------------------

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

// ---------------------------------------------------------------------------
// Transport Configuration
// ---------------------------------------------------------------------------

export interface WsTransportConfig {
  readonly port: number;
  readonly host?: string | undefined;
}

export interface BrokerTransportConfig {
  /** Redis connection URL, e.g. redis://localhost:6379 */
  readonly url: string;
  /** Channel prefix shared by the router and its agents */
  readonly prefix: string;
}

export interface TransportsConfig {
  readonly ws?: WsTransportConfig | undefined;
  readonly inproc: boolean;
  readonly broker?: BrokerTransportConfig | undefined;
}

export const DEFAULT_BROKER_PREFIX = "interconnect:";

export const TransportsConfigSchema = z
  .object({
    ws: z
      .object({
        port: z.number().int().min(0).max(65535),
        host: z.string().min(1).optional(),
      })
      .optional(),
    inproc: z.boolean().default(false),
    broker: z
      .object({
        url: z.string().min(1),
        prefix: z.string().default(DEFAULT_BROKER_PREFIX),
      })
      .optional(),
  })
  .default({});

// ---------------------------------------------------------------------------
// Router Configuration
// ---------------------------------------------------------------------------

/** Fields that can be hot-reloaded without restart */
export const HOT_RELOADABLE_FIELDS = [
  "heartbeatInterval",
  "sweepInterval",
  "rpcDefaultTimeout",
  "rpcMaxTimeout",
  "outboxCapacity",
  "logLevel",
] as const;
export type HotReloadableField = (typeof HOT_RELOADABLE_FIELDS)[number];

/** Fields that require a router restart to take effect */
export const RESTART_REQUIRED_FIELDS = [
  "identity",
  "maxFrameSize",
  "maxFramesPerSecond",
  "maxConnections",
  "highWaterMark",
  "credentialsPath",
  "transports",
] as const;
export type RestartRequiredField = (typeof RESTART_REQUIRED_FIELDS)[number];

/**
 * Router configuration. Durations are in milliseconds.
 */
export interface RouterConfig {
  /** Identity the router uses as sender of its own frames (default: "router") */
  readonly identity: string;
  /** Liveness interval; two missed intervals mark a connection dead (default: 10_000) */
  readonly heartbeatInterval: number;
  /** Period of the dispatch-loop sweep that expires RPC deadlines (default: 250) */
  readonly sweepInterval: number;
  /** Timeout for calls that request none (default: 30_000) */
  readonly rpcDefaultTimeout: number;
  /** Upper bound on requested call timeouts (default: 300_000) */
  readonly rpcMaxTimeout: number;
  /** Soft capacity of each connection's outbound queue (default: 1024) */
  readonly outboxCapacity: number;
  /** Largest accepted frame in bytes (default: 1 MiB) */
  readonly maxFrameSize: number;
  /** Per-connection inbound frame rate limit; 0 = unlimited (default: 0) */
  readonly maxFramesPerSecond: number;
  /** Max concurrent WebSocket connections; 0 = unlimited (default: 1024) */
  readonly maxConnections: number;
  /** Socket buffer level above which a connection is not writable (default: 1 MiB) */
  readonly highWaterMark: number;
  /** Credential file, loaded at start and hot-reloaded */
  readonly credentialsPath?: string | undefined;
  readonly transports: TransportsConfig;
  readonly logLevel: LogLevel;
}

export const RouterConfigSchema = z
  .object({
    identity: IdentitySchema.default("router"),
    heartbeatInterval: z.number().int().positive().default(10_000),
    sweepInterval: z.number().int().positive().default(250),
    rpcDefaultTimeout: z.number().int().positive().default(30_000),
    rpcMaxTimeout: z.number().int().positive().default(300_000),
    outboxCapacity: z.number().int().positive().default(1024),
    maxFrameSize: z.number().int().positive().default(1_048_576),
    maxFramesPerSecond: z.number().int().nonnegative().default(0),
    maxConnections: z.number().int().nonnegative().default(1024),
    highWaterMark: z.number().int().positive().default(1_048_576),
    credentialsPath: z.string().min(1).optional(),
    transports: TransportsConfigSchema,
    logLevel: z.enum(LOG_LEVELS).default("info"),
  })
  .refine((config) => config.rpcDefaultTimeout <= config.rpcMaxTimeout, {
    message: "rpcDefaultTimeout must not exceed rpcMaxTimeout",
    path: ["rpcDefaultTimeout"],
  }) satisfies z.ZodType<RouterConfig, z.ZodTypeDef, unknown>;

export type RouterConfigInput = z.input<typeof RouterConfigSchema>;

/**
 * Parse a router configuration, applying defaults.
 * Throws CONFIG_INVALID with the first issue when the input is invalid.
 */
export function resolveRouterConfig(input: unknown = {}): RouterConfig {
  const result = RouterConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new ValidationError({
      code: "CONFIG_INVALID",
      message: `Invalid router config: ${path}${issue?.message ?? "unknown"}`,
      cause: result.error,
    });
  }
  return result.data;
}

export const DEFAULT_ROUTER_CONFIG: RouterConfig = resolveRouterConfig();
