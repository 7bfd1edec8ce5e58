import { z } from "zod";

// ---------------------------------------------------------------------------
// Channel Naming
// ---------------------------------------------------------------------------

/** Agent-chosen connection ids: short, channel-safe tokens */
export const BROKER_CONNECTION_ID_PATTERN = /^[A-Za-z0-9-]{1,64}$/;

/** Channel every agent publishes to; only the router subscribes */
export function routerChannel(prefix: string): string {
  return `${prefix}router`;
}

/** Channel the router publishes to for one agent connection */
export function connectionChannel(prefix: string, connectionId: string): string {
  return `${prefix}conn.${connectionId}`;
}

// ---------------------------------------------------------------------------
// Channel Messages
// ---------------------------------------------------------------------------

const ConnectionIdSchema = z.string().regex(BROKER_CONNECTION_ID_PATTERN);

export const AgentChannelMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("open"), connectionId: ConnectionIdSchema }),
  z.object({ type: z.literal("frame"), connectionId: ConnectionIdSchema, data: z.string() }),
  z.object({
    type: z.literal("close"),
    connectionId: ConnectionIdSchema,
    reason: z.string().optional(),
  }),
]);

/** Agent → router */
export type AgentChannelMessage = z.infer<typeof AgentChannelMessageSchema>;

export const RouterChannelMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("frame"), data: z.string() }),
  z.object({ type: z.literal("close"), reason: z.string().optional() }),
]);

/** Router → agent */
export type RouterChannelMessage = z.infer<typeof RouterChannelMessageSchema>;

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * Decode a message published on the router channel.
 * Returns undefined for anything that is not a well-formed agent message.
 */
export function decodeAgentChannelMessage(raw: string): AgentChannelMessage | undefined {
  const result = AgentChannelMessageSchema.safeParse(parseJson(raw));
  return result.success ? result.data : undefined;
}

export function decodeRouterChannelMessage(raw: string): RouterChannelMessage | undefined {
  const result = RouterChannelMessageSchema.safeParse(parseJson(raw));
  return result.success ? result.data : undefined;
}

export function encodeChannelMessage(message: AgentChannelMessage | RouterChannelMessage): string {
  return JSON.stringify(message);
}
