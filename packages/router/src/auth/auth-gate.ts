import type { KeyObject } from "node:crypto";
import { type AuthRejectionReason, InternalError, isConflictError } from "@interconnect/errors";
import {
  type Capability,
  isValidIdentity,
  parseCapability,
  parsePattern,
  parseTopic,
  patternCovers,
  patternMatches,
} from "@interconnect/protocol";
import { createConsoleLogger, type Logger } from "../logger.js";
import type { Route, RouteBinding, RoutingTable } from "../routing/routing-table.js";
import { mapDelete, mapSet } from "../utils/immutable-map.js";
import type { CredentialStore, StoredCredential } from "./credential-store.js";
import { importBase64urlPublicKey, verifyIdentityProof } from "./device-auth.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type AuthOperation =
  | { readonly kind: "publish"; readonly topic: string }
  | { readonly kind: "subscribe"; readonly pattern: string }
  | { readonly kind: "call"; readonly callee: string; readonly method: string };

/**
 * A verified identity and what it may do. `capabilities` is the snapshot
 * taken at admission; `authorize` prefers the live store when the
 * credential is still present.
 */
export interface Admission {
  readonly identity: string;
  readonly userId: string;
  /** Store key of the credential the identity was admitted with */
  readonly credential: string;
  readonly capabilities: readonly string[];
}

export interface Rejection {
  readonly reason: AuthRejectionReason;
  readonly detail: string;
}

export type AuthResult =
  | { readonly ok: true; readonly admission: Admission }
  | { readonly ok: false; readonly rejection: Rejection };

export type AdmitResult =
  | { readonly ok: true; readonly route: Route }
  | { readonly ok: false; readonly rejection: Rejection };

function reject(reason: AuthRejectionReason, detail: string): AuthResult & { ok: false } {
  return { ok: false, rejection: { reason, detail } };
}

// ---------------------------------------------------------------------------
// AuthGate
// ---------------------------------------------------------------------------

/**
 * Admission and authorization.
 *
 * `authenticate` is asynchronous (proof verification). `admit` re-checks
 * availability and registers the route in one synchronous step, so two
 * handshakes racing for the same identity cannot both succeed.
 */
export class AuthGate {
  private sessions: ReadonlyMap<string, Admission> = new Map();
  private readonly store: CredentialStore;
  private readonly table: RoutingTable;
  private readonly logger: Logger;

  constructor(store: CredentialStore, table: RoutingTable, logger?: Logger) {
    this.store = store;
    this.table = table;
    this.logger = logger ?? createConsoleLogger("AuthGate");
  }

  /**
   * Validate a credential for a proposed identity.
   */
  async authenticate(credential: string, identity: string, proof?: string): Promise<AuthResult> {
    if (!isValidIdentity(identity)) {
      return reject("malformed", `Invalid identity "${identity}"`);
    }
    if (credential.length === 0) {
      return reject("malformed", "Missing credential");
    }

    const found = this.store.find(credential);
    if (!found) {
      return reject("unknown-credential", "Unknown credential");
    }

    if (found.record.type === "ed25519") {
      const failure = await this.verifyProof(found, identity, proof);
      if (failure) {
        return reject("unknown-credential", failure);
      }
    }

    const conflict = this.checkAvailability(found.key, found.record.identity, identity);
    if (conflict) return { ok: false, rejection: conflict };

    return {
      ok: true,
      admission: {
        identity,
        userId: found.record.identity ?? identity,
        credential: found.key,
        capabilities: this.store.expand(found.record),
      },
    };
  }

  /**
   * Register an authenticated identity. The credential and availability are
   * checked again because the store and other handshakes may have changed
   * since `authenticate`.
   */
  admit(admission: Admission, binding: RouteBinding): AdmitResult {
    // Revoked or reloaded away while the hello was being verified
    const record = this.store.get(admission.credential);
    if (!record) {
      return { ok: false, rejection: { reason: "unknown-credential", detail: "Unknown credential" } };
    }
    const conflict = this.checkAvailability(
      admission.credential,
      record.identity,
      admission.identity,
    );
    if (conflict) return { ok: false, rejection: conflict };

    try {
      this.table.register(admission.identity, binding);
    } catch (err) {
      if (isConflictError(err)) {
        return { ok: false, rejection: { reason: "identity-conflict", detail: err.message } };
      }
      throw err;
    }
    this.sessions = mapSet(this.sessions, admission.identity, admission);
    const route = this.table.lookup(admission.identity);
    if (!route) {
      throw new InternalError({
        code: "INTERNAL_INVARIANT_VIOLATION",
        message: `Route for "${admission.identity}" vanished during admission`,
      });
    }
    return { ok: true, route };
  }

  /**
   * Forget the session of a departed identity.
   */
  release(identity: string): void {
    this.sessions = mapDelete(this.sessions, identity);
  }

  sessionOf(identity: string): Admission | undefined {
    return this.sessions.get(identity);
  }

  /**
   * Whether the identity may perform the operation.
   *
   * Capabilities are re-read from the store on every call. If the session's
   * credential has since been removed, the admission snapshot applies.
   */
  authorize(identity: string, operation: AuthOperation): boolean {
    const session = this.sessions.get(identity);
    if (!session) return false;
    const granted = this.store.capabilitiesOf(session.credential) ?? session.capabilities;

    const capabilities: Capability[] = [];
    for (const source of granted) {
      const capability = parseCapability(source);
      if (capability && capability.operation === operation.kind) {
        capabilities.push(capability);
      }
    }
    if (capabilities.length === 0) return false;

    switch (operation.kind) {
      case "publish": {
        const topic = parseTopic(operation.topic);
        return topic !== undefined && capabilities.some((c) => patternMatches(c.pattern, topic));
      }
      case "subscribe": {
        const requested = parsePattern(operation.pattern);
        return (
          requested !== undefined && capabilities.some((c) => patternCovers(c.pattern, requested))
        );
      }
      case "call": {
        const target = parseTopic(`${operation.callee}/${operation.method}`);
        return target !== undefined && capabilities.some((c) => patternMatches(c.pattern, target));
      }
    }
  }

  /**
   * Remove a credential from the store. Returns the identities of live
   * sessions admitted with it; the caller tears those down.
   */
  revoke(credential: string): readonly string[] {
    const removed = this.store.remove(credential);
    const identities = [...this.sessions.values()]
      .filter((session) => session.credential === credential)
      .map((session) => session.identity);
    if (removed || identities.length > 0) {
      this.logger.info(`Revoked credential for ${identities.length} live session(s)`);
    }
    return identities;
  }

  clear(): void {
    this.sessions = new Map();
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private async verifyProof(
    found: StoredCredential,
    identity: string,
    proof: string | undefined,
  ): Promise<string | undefined> {
    if (proof === undefined) {
      return "Credential requires a proof of key possession";
    }
    let publicKey: KeyObject;
    try {
      publicKey = importBase64urlPublicKey(found.key);
    } catch (err) {
      this.logger.warn(`Stored ed25519 credential is not a valid public key: ${String(err)}`);
      return "Unknown credential";
    }
    const result = await verifyIdentityProof(proof, publicKey, identity);
    return result.valid ? undefined : `Invalid proof: ${result.error ?? "unknown"}`;
  }

  private checkAvailability(
    credential: string,
    boundIdentity: string | undefined,
    identity: string,
  ): Rejection | undefined {
    if (boundIdentity !== undefined && boundIdentity !== identity) {
      return {
        reason: "identity-conflict",
        detail: `Credential is bound to identity "${boundIdentity}"`,
      };
    }
    for (const session of this.sessions.values()) {
      if (session.credential !== credential || session.identity === identity) continue;
      const route = this.table.lookup(session.identity);
      if (route && !this.table.isDead(route)) {
        return {
          reason: "identity-conflict",
          detail: `Credential is in use by live identity "${session.identity}"`,
        };
      }
    }
    const route = this.table.lookup(identity);
    if (route && !this.table.isDead(route)) {
      return { reason: "identity-conflict", detail: `Identity "${identity}" is in use` };
    }
    return undefined;
  }
}
