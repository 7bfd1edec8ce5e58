export type { BrokerClient, BrokerDisconnectHandler, BrokerMessageHandler } from "./types.js";
export {
  type AgentChannelMessage,
  AgentChannelMessageSchema,
  BROKER_CONNECTION_ID_PATTERN,
  connectionChannel,
  decodeAgentChannelMessage,
  decodeRouterChannelMessage,
  encodeChannelMessage,
  type RouterChannelMessage,
  RouterChannelMessageSchema,
  routerChannel,
} from "./channels.js";
export {
  createRedisBrokerClient,
  type RedisBrokerClientOptions,
  type RedisConnectionFactory,
  type RedisConnectionLike,
} from "./redis.js";
export { MemoryBrokerBus } from "./memory.js";
