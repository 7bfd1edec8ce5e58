/**
 * @interconnect/router
 *
 * Message bus router: authenticates agents, routes pub/sub and RPC traffic
 * between them, and tracks their liveness.
 */

export const PACKAGE_NAME = "@interconnect/router" as const;

// Auth
export {
  type Admission,
  type AdmitResult,
  AuthGate,
  type AuthOperation,
  type AuthResult,
  type Rejection,
} from "./auth/auth-gate.js";
export {
  CredentialStore,
  type CredentialStoreOptions,
  readCredentialFile,
  type StoredCredential,
} from "./auth/credential-store.js";
export {
  importBase64urlPublicKey,
  type ProofResult,
  timingSafeTokenCompare,
  verifyIdentityProof,
} from "./auth/device-auth.js";
// Config
export {
  type ConfigErrorHandler,
  type ConfigRestartRequiredHandler,
  type ConfigUpdatedHandler,
  ConfigWatcher,
  type ConfigWatcherDeps,
  pickHotFields,
} from "./config-watcher.js";
// Dispatch
export type { DispatchContext, Outcome, SenderInfo, SubsystemHandler } from "./dispatch/context.js";
export { SUBSYSTEM_HANDLERS } from "./dispatch/handlers.js";
// Logging
export { createConsoleLogger, type Logger, silentLogger } from "./logger.js";
// Pub/sub
export { type Subscription, SubscriptionTree } from "./pubsub/subscription-tree.js";
// Queue
export { Outbox } from "./queue/outbox.js";
// Router
export { MessageRouter, type MessageRouterDeps } from "./router.js";
// Routing
export { HealthMonitor, type PingSender, type RouteDeadHandler } from "./routing/health-monitor.js";
export {
  type Route,
  type RouteBinding,
  RoutingTable,
  type RoutingTableOptions,
} from "./routing/routing-table.js";
// RPC
export {
  type CallRequest,
  type CancelledCalls,
  clampTimeout,
  type PendingCall,
  RpcCorrelator,
  type RpcTimeouts,
} from "./rpc/rpc-correlator.js";
// Server
export {
  loadRouterConfig,
  type RouterServer,
  type RouterServerOptions,
  startRouterServer,
} from "./server.js";
// Transports
export {
  BrokerTransport,
  type BrokerClientFactory,
  type BrokerTransportOptions,
} from "./transports/broker-transport.js";
export {
  MemoryLink,
  MemoryTransport,
  type MemoryTransportConfig,
} from "./transports/memory-transport.js";
export type { Transport } from "./transports/types.js";
export {
  rawDataToString,
  type WebSocketLike,
  type WebSocketServerLike,
  type WsServerFactory,
  WsTransport,
  type WsTransportOptions,
} from "./transports/ws-transport.js";
