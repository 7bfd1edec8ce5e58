import { InterconnectError } from "../base.js";
import type { InternalCodes } from "../types.js";

/**
 * Programming errors. Never converted into fault frames.
 */
export class InternalError<C extends InternalCodes = InternalCodes> extends InterconnectError<C> {
  readonly _tag = "InternalError" as const;
}
