import { InterconnectError } from "../base.js";
import type { TimeoutCodes } from "../types.js";

/**
 * A deadline passed before the operation completed.
 */
export class TimeoutError<C extends TimeoutCodes = TimeoutCodes> extends InterconnectError<C> {
  readonly _tag = "TimeoutError" as const;
}
