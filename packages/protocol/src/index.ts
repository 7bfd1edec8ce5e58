export {
  createMessageIdGenerator,
  decodeEnvelope,
  type Envelope,
  type EnvelopeDecodeResult,
  EnvelopeFramesSchema,
  encodeEnvelope,
  IDENTITY_PATTERN,
  IdentitySchema,
  isIssuedBy,
  isValidIdentity,
  PROTOCOL_VERSION,
  SUBSYSTEMS,
  type Subsystem,
  safeDecodeEnvelope,
} from "./envelope.js";
export {
  type AckMessage,
  type AuthErrorMessage,
  type BusMessage,
  type CallMessage,
  type EnvelopeHeader,
  type ErrorFaultMessage,
  encodeArgs,
  type FaultMessage,
  type GoodbyeMessage,
  type HelloMessage,
  isMessageKind,
  type ListingMessage,
  type ListingWithTransportMessage,
  type ListPeersMessage,
  type ListPeersWithTransportMessage,
  MESSAGE_KINDS,
  type MessageKind,
  type MessageOf,
  type MessageParseResult,
  type PeerAddedMessage,
  type PeerDroppedMessage,
  type PeerInfo,
  type PingMessage,
  type PongMessage,
  type PublishMessage,
  parseMessage,
  type ReplyMessage,
  type SubscribeMessage,
  subsystemOf,
  toEnvelope,
  type UnsubscribeMessage,
  type WelcomeMessage,
} from "./messages.js";
export {
  formatPattern,
  PREFIX_WILDCARD,
  parsePattern,
  parseTopic,
  patternCovers,
  patternMatches,
  TOPIC_SEPARATOR,
  type TopicPattern,
} from "./topics.js";
export {
  type BrokerTransportConfig,
  DEFAULT_BROKER_PREFIX,
  DEFAULT_ROUTER_CONFIG,
  HOT_RELOADABLE_FIELDS,
  type HotReloadableField,
  LOG_LEVELS,
  type LogLevel,
  RESTART_REQUIRED_FIELDS,
  type RestartRequiredField,
  type RouterConfig,
  type RouterConfigInput,
  RouterConfigSchema,
  resolveRouterConfig,
  type TransportsConfig,
  TransportsConfigSchema,
  type WsTransportConfig,
} from "./config.js";
export {
  CAPABILITY_OPERATIONS,
  type Capability,
  type CapabilityOperation,
  CapabilitySchema,
  CREDENTIAL_TYPES,
  type CredentialFile,
  CredentialFileSchema,
  type CredentialRecord,
  CredentialRecordSchema,
  type CredentialType,
  EMPTY_CREDENTIAL_FILE,
  parseCapability,
  parseCredentialFile,
} from "./credentials.js";
export type { AgentLink, LinkFactory } from "./link.js";
