import { InterconnectError } from "../base.js";
import type { ValidationCodes } from "../types.js";

/**
 * Bad input: malformed envelopes, handshakes, configuration files.
 */
export class ValidationError<C extends ValidationCodes = ValidationCodes> extends InterconnectError<C> {
  readonly _tag = "ValidationError" as const;
}
