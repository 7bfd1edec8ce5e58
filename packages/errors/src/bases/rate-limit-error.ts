import { InterconnectError } from "../base.js";
import type { RateLimitCodes } from "../types.js";

/**
 * Resource exhaustion on a single connection.
 */
export class RateLimitError<C extends RateLimitCodes = RateLimitCodes> extends InterconnectError<C> {
  readonly _tag = "RateLimitError" as const;
}
