/**
 * @interconnect/agent
 *
 * Client library for agents on the interconnect bus.
 */

export const PACKAGE_NAME = "@interconnect/agent" as const;

export { BusAgent, type BusAgentDeps, CALL_GRACE_PERIOD } from "./agent.js";
export {
  createIdentityProof,
  createProofSigner,
  exportPublicKeyBase64url,
  generateKeyPair,
  type KeyPair,
  loadOrCreateKeyPair,
} from "./device-auth.js";
export { HeartbeatResponder } from "./heartbeat-responder.js";
export { BrokerLink, type BrokerLinkOptions } from "./links/broker-link.js";
export {
  type WebSocketClientLike,
  type WsClientFactory,
  WsLink,
  type WsLinkOptions,
} from "./links/ws-link.js";
export { ReconnectStrategy } from "./reconnect.js";
export {
  AGENT_STATES,
  type AgentConfig,
  AgentConfigSchema,
  type AgentState,
  type CallOptions,
  type ConnectedHandler,
  type CredentialProvider,
  DEFAULT_CALL_TIMEOUT,
  DEFAULT_HANDSHAKE_TIMEOUT,
  DEFAULT_RECONNECT_CONFIG,
  type DisconnectedHandler,
  type ErrorHandler,
  type MethodHandler,
  type PeerHandler,
  type ProofSigner,
  type ReconnectConfig,
  ReconnectConfigSchema,
  type ReconnectedHandler,
  type ReconnectingHandler,
  type ResolvedAgentConfig,
  resolveAgentConfig,
  type TopicHandler,
} from "./types.js";
