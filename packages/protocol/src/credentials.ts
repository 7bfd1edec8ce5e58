import { ValidationError } from "@interconnect/errors";
import { z } from "zod";
import { IdentitySchema } from "./envelope.js";
import { parsePattern, type TopicPattern } from "./topics.js";

// ---------------------------------------------------------------------------
// Capabilities
// ---------------------------------------------------------------------------

export const CAPABILITY_OPERATIONS = ["publish", "subscribe", "call"] as const;
export type CapabilityOperation = (typeof CAPABILITY_OPERATIONS)[number];

/**
 * A parsed capability such as `publish:devices/#` or `call:drv1/set_point`.
 * For `call`, the pattern is matched against `<callee>/<method>`.
 */
export interface Capability {
  readonly operation: CapabilityOperation;
  readonly pattern: TopicPattern;
  readonly source: string;
}

function isCapabilityOperation(value: string): value is CapabilityOperation {
  return CAPABILITY_OPERATIONS.some((candidate) => candidate === value);
}

export function parseCapability(source: string): Capability | undefined {
  const colon = source.indexOf(":");
  if (colon <= 0) return undefined;
  const operation = source.slice(0, colon);
  if (!isCapabilityOperation(operation)) return undefined;
  const pattern = parsePattern(source.slice(colon + 1));
  return pattern ? { operation, pattern, source } : undefined;
}

export const CapabilitySchema = z
  .string()
  .refine((value) => parseCapability(value) !== undefined, {
    message: "Expected <publish|subscribe|call>:<pattern>",
  });

// ---------------------------------------------------------------------------
// Credential Records
// ---------------------------------------------------------------------------

/**
 * - "token": the key is a shared secret compared in constant time
 * - "ed25519": the key is a base64url raw public key; hello must carry a proof JWT
 */
export const CREDENTIAL_TYPES = ["token", "ed25519"] as const;
export type CredentialType = (typeof CREDENTIAL_TYPES)[number];

export interface CredentialRecord {
  /** Identity the credential is bound to; unbound credentials admit any free identity */
  readonly identity?: string | undefined;
  readonly type: CredentialType;
  readonly capabilities: readonly string[];
  readonly groups: readonly string[];
}

export const CredentialRecordSchema = z.object({
  identity: IdentitySchema.optional(),
  type: z.enum(CREDENTIAL_TYPES).default("token"),
  capabilities: z.array(CapabilitySchema).default([]),
  groups: z.array(z.string().min(1)).default([]),
});

// ---------------------------------------------------------------------------
// Credential File
// ---------------------------------------------------------------------------

/**
 * Persisted credential store layout.
 */
export interface CredentialFile {
  readonly groups: Readonly<Record<string, readonly string[]>>;
  readonly credentials: Readonly<Record<string, CredentialRecord>>;
}

export const CredentialFileSchema = z
  .object({
    groups: z.record(z.string().min(1), z.array(CapabilitySchema)).default({}),
    credentials: z.record(z.string().min(1), CredentialRecordSchema).default({}),
  })
  .superRefine((file, ctx) => {
    for (const [key, record] of Object.entries(file.credentials)) {
      for (const group of record.groups) {
        if (!Object.hasOwn(file.groups, group)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Unknown group "${group}"`,
            path: ["credentials", key, "groups"],
          });
        }
      }
    }
  }) satisfies z.ZodType<CredentialFile, z.ZodTypeDef, unknown>;

export const EMPTY_CREDENTIAL_FILE: CredentialFile = { groups: {}, credentials: {} };

/**
 * Validate a parsed credential file.
 * Throws CONFIG_CREDENTIALS_INVALID with the first issue on failure.
 */
export function parseCredentialFile(raw: unknown): CredentialFile {
  const result = CredentialFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new ValidationError({
      code: "CONFIG_CREDENTIALS_INVALID",
      message: `Invalid credential file: ${path}${issue?.message ?? "unknown"}`,
      cause: result.error,
    });
  }
  return result.data;
}
