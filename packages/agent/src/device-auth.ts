import { createPrivateKey, createPublicKey, generateKeyPairSync } from "node:crypto";
import { readFile, writeFile } from "node:fs/promises";
import { isError } from "@interconnect/errors";
import { SignJWT } from "jose";
import type { ProofSigner } from "./types.js";

// ---------------------------------------------------------------------------
// Key Generation
// ---------------------------------------------------------------------------

export interface KeyPair {
  /** PKCS#8 PEM */
  readonly privateKey: string;
  /** SPKI PEM */
  readonly publicKey: string;
}

export function generateKeyPair(): KeyPair {
  const { privateKey, publicKey } = generateKeyPairSync("ed25519");
  return {
    privateKey: privateKey.export({ type: "pkcs8", format: "pem" }).toString(),
    publicKey: publicKey.export({ type: "spki", format: "pem" }).toString(),
  };
}

/**
 * Load the agent's Ed25519 key from disk, or generate and persist one
 * readable only by its owner.
 */
export async function loadOrCreateKeyPair(keyPath: string): Promise<KeyPair> {
  let pem: string;
  try {
    pem = await readFile(keyPath, "utf-8");
  } catch (err) {
    if (!isError(err) || !("code" in err) || err.code !== "ENOENT") throw err;
    const pair = generateKeyPair();
    await writeFile(keyPath, pair.privateKey, { mode: 0o600 });
    return pair;
  }
  const privateKey = createPrivateKey(pem);
  return {
    privateKey: privateKey.export({ type: "pkcs8", format: "pem" }).toString(),
    publicKey: createPublicKey(privateKey).export({ type: "spki", format: "pem" }).toString(),
  };
}

// ---------------------------------------------------------------------------
// Proof Signing
// ---------------------------------------------------------------------------

/**
 * EdDSA JWT proving possession of the key, valid for five minutes.
 * `sub` is the identity proposed in the hello.
 */
export async function createIdentityProof(privateKeyPem: string, identity: string): Promise<string> {
  return new SignJWT({})
    .setProtectedHeader({ alg: "EdDSA" })
    .setSubject(identity)
    .setIssuedAt()
    .setExpirationTime("5m")
    .sign(createPrivateKey(privateKeyPem));
}

export function createProofSigner(privateKeyPem: string): ProofSigner {
  return (identity) => createIdentityProof(privateKeyPem, identity);
}

// ---------------------------------------------------------------------------
// Public Key Export
// ---------------------------------------------------------------------------

/**
 * The raw 32-byte public key as base64url: the credential string an
 * ed25519 entry is stored under.
 */
export function exportPublicKeyBase64url(publicKeyPem: string): string {
  const der = createPublicKey(publicKeyPem).export({ type: "spki", format: "der" });
  // Ed25519 SPKI DER is a 12-byte header followed by the key
  return der.subarray(12).toString("base64url");
}
