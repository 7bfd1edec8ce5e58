import { createPublicKey, type KeyObject, timingSafeEqual } from "node:crypto";
import { ValidationError } from "@interconnect/errors";
import { jwtVerify } from "jose";

// ---------------------------------------------------------------------------
// Proof Verification
// ---------------------------------------------------------------------------

export interface ProofResult {
  readonly valid: boolean;
  readonly error?: string | undefined;
}

/**
 * Verify a proof of key possession: an EdDSA JWT whose `sub` is the identity
 * the agent is claiming, signed with the credential's private key.
 */
export async function verifyIdentityProof(
  proof: string,
  publicKey: KeyObject,
  identity: string,
): Promise<ProofResult> {
  try {
    await jwtVerify(proof, publicKey, {
      algorithms: ["EdDSA"],
      subject: identity,
      requiredClaims: ["exp"],
    });
    return { valid: true };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { valid: false, error: message };
  }
}

// ---------------------------------------------------------------------------
// Timing-Safe Token Comparison
// ---------------------------------------------------------------------------

/**
 * Compare two tokens in constant time for equal lengths.
 * Different lengths are never equal; the comparison still runs once.
 */
export function timingSafeTokenCompare(a: string, b: string): boolean {
  const bufA = Buffer.from(a, "utf-8");
  const bufB = Buffer.from(b, "utf-8");
  if (bufA.length !== bufB.length) {
    timingSafeEqual(bufA, bufA);
    return false;
  }
  return timingSafeEqual(bufA, bufB);
}

// ---------------------------------------------------------------------------
// Key Import
// ---------------------------------------------------------------------------

/** SPKI DER header for an Ed25519 public key; the 32 raw key bytes follow it */
const ED25519_SPKI_PREFIX = Buffer.from("302a300506032b6570032100", "hex");

/**
 * Import a base64url raw Ed25519 public key (32 bytes).
 * Throws CONFIG_CREDENTIALS_INVALID if the key has the wrong length.
 */
export function importBase64urlPublicKey(base64url: string): KeyObject {
  const raw = Buffer.from(base64url, "base64url");
  if (raw.length !== 32) {
    throw new ValidationError({
      code: "CONFIG_CREDENTIALS_INVALID",
      message: `Ed25519 public key must be 32 bytes, got ${raw.length}`,
    });
  }
  const der = Buffer.concat([ED25519_SPKI_PREFIX, raw]);
  return createPublicKey({ key: der, format: "der", type: "spki" });
}
