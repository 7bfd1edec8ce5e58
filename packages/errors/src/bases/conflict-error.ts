import { InterconnectError } from "../base.js";
import type { ConflictCodes } from "../types.js";

/**
 * State conflicts such as an identity held by a live connection.
 */
export class ConflictError<C extends ConflictCodes = ConflictCodes> extends InterconnectError<C> {
  readonly _tag = "ConflictError" as const;
}
