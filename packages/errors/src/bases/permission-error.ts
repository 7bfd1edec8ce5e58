import { InterconnectError } from "../base.js";
import type { PermissionCodes } from "../types.js";

/**
 * Authentication and authorization failures.
 */
export class PermissionError<C extends PermissionCodes = PermissionCodes> extends InterconnectError<C> {
  readonly _tag = "PermissionError" as const;
}
