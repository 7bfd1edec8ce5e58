import { InterconnectError } from "../base.js";
import type { ExternalCodes } from "../types.js";

/**
 * Failures on the far side of a link: the callee or the transport.
 */
export class ExternalError<C extends ExternalCodes = ExternalCodes> extends InterconnectError<C> {
  readonly _tag = "ExternalError" as const;
}
