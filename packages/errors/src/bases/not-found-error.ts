import { InterconnectError } from "../base.js";
import type { NotFoundCodes } from "../types.js";

/**
 * A recipient or exported method that does not exist.
 */
export class NotFoundError<C extends NotFoundCodes = NotFoundCodes> extends InterconnectError<C> {
  readonly _tag = "NotFoundError" as const;
}
