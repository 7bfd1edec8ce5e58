import { readFile, writeFile } from "node:fs/promises";
import { getErrorMessage, ValidationError } from "@interconnect/errors";
import {
  type CredentialFile,
  type CredentialRecord,
  EMPTY_CREDENTIAL_FILE,
  parseCredentialFile,
} from "@interconnect/protocol";
import { createConsoleLogger, type Logger } from "../logger.js";
import { createEmitter, type Emitter } from "../utils/emitter.js";
import type { DebouncedWatch, FileWatcherFactory } from "../utils/file-watcher.js";
import { watchDebounced } from "../utils/file-watcher.js";
import { timingSafeTokenCompare } from "./device-auth.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CredentialStoreOptions {
  readonly logger?: Logger;
  /** Debounce for file change events in ms (default: 300) */
  readonly debounceMs?: number;
  readonly watch?: FileWatcherFactory;
}

export interface StoredCredential {
  /** The key the record is stored under: a token or a public key */
  readonly key: string;
  readonly record: CredentialRecord;
}

type CredentialStoreEvents = {
  changed: [file: CredentialFile];
  error: [error: Error];
};

// ---------------------------------------------------------------------------
// CredentialStore
// ---------------------------------------------------------------------------

/**
 * Credential → {identity binding, capabilities, groups}, plus group
 * definitions. Optionally backed by a JSON file that is hot-reloaded;
 * an invalid file is rejected and the current contents kept.
 */
export class CredentialStore {
  private file: CredentialFile;
  private path: string | undefined;
  private watcher: DebouncedWatch | undefined;
  private readonly events: Emitter<CredentialStoreEvents> = createEmitter();
  private readonly logger: Logger;
  private readonly debounceMs: number;
  private readonly watchFactory: FileWatcherFactory | undefined;

  constructor(initial: CredentialFile = EMPTY_CREDENTIAL_FILE, options: CredentialStoreOptions = {}) {
    this.file = initial;
    this.logger = options.logger ?? createConsoleLogger("CredentialStore");
    this.debounceMs = options.debounceMs ?? 300;
    this.watchFactory = options.watch;
  }

  /**
   * Create a store from a credential file.
   * Throws CONFIG_CREDENTIALS_INVALID if the file is unreadable or invalid.
   */
  static async fromFile(path: string, options: CredentialStoreOptions = {}): Promise<CredentialStore> {
    const store = new CredentialStore(await readCredentialFile(path), options);
    store.path = path;
    return store;
  }

  // -------------------------------------------------------------------------
  // Lookup
  // -------------------------------------------------------------------------

  /**
   * Find the credential matching a presented secret. Every stored key is
   * compared in constant time.
   */
  find(presented: string): StoredCredential | undefined {
    let found: StoredCredential | undefined;
    for (const [key, record] of Object.entries(this.file.credentials)) {
      if (timingSafeTokenCompare(key, presented) && !found) {
        found = { key, record };
      }
    }
    return found;
  }

  get(key: string): CredentialRecord | undefined {
    return Object.hasOwn(this.file.credentials, key) ? this.file.credentials[key] : undefined;
  }

  /**
   * Capability strings granted to a credential: its own plus those of its
   * groups, expanded against the current group definitions.
   * Returns undefined when the credential is not in the store.
   */
  capabilitiesOf(key: string): readonly string[] | undefined {
    const record = this.get(key);
    return record ? this.expand(record) : undefined;
  }

  expand(record: CredentialRecord): readonly string[] {
    const capabilities = new Set(record.capabilities);
    for (const group of record.groups) {
      for (const capability of this.file.groups[group] ?? []) {
        capabilities.add(capability);
      }
    }
    return [...capabilities];
  }

  snapshot(): CredentialFile {
    return this.file;
  }

  get size(): number {
    return Object.keys(this.file.credentials).length;
  }

  // -------------------------------------------------------------------------
  // Mutation
  // -------------------------------------------------------------------------

  replace(file: CredentialFile): void {
    this.file = file;
    this.events.emit("changed", file);
  }

  /**
   * Remove a credential. A file-backed store writes the change back.
   * Returns false when the credential was not present.
   */
  remove(key: string): boolean {
    if (!Object.hasOwn(this.file.credentials, key)) return false;
    const credentials = Object.fromEntries(
      Object.entries(this.file.credentials).filter(([candidate]) => candidate !== key),
    );
    this.replace({ groups: this.file.groups, credentials });
    if (this.path !== undefined) {
      void this.persist(this.path);
    }
    return true;
  }

  // -------------------------------------------------------------------------
  // File Watching
  // -------------------------------------------------------------------------

  /**
   * Watch the backing file and reload it on change.
   */
  async watch(path: string | undefined = this.path): Promise<void> {
    if (path === undefined) {
      throw new ValidationError({
        code: "CONFIG_INVALID",
        message: "Credential store has no file to watch",
      });
    }
    this.path = path;
    await this.watcher?.stop();
    this.watcher = await watchDebounced(path, this.debounceMs, () => void this.reload(), this.watchFactory);
  }

  async stop(): Promise<void> {
    await this.watcher?.stop();
    this.watcher = undefined;
    this.events.clear();
  }

  /**
   * Re-read the backing file. On failure the current contents are kept and
   * the error is logged and emitted.
   */
  async reload(): Promise<void> {
    if (this.path === undefined) return;
    try {
      const file = await readCredentialFile(this.path);
      this.replace(file);
      this.logger.info(`Reloaded ${Object.keys(file.credentials).length} credentials`);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error(`Rejected credential file, keeping previous contents: ${error.message}`);
      this.events.emit("error", error);
    }
  }

  onChanged(handler: (file: CredentialFile) => void): () => void {
    return this.events.on("changed", handler);
  }

  onError(handler: (error: Error) => void): () => void {
    return this.events.on("error", handler);
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private async persist(path: string): Promise<void> {
    try {
      await writeFile(path, `${JSON.stringify(this.file, null, 2)}\n`, "utf-8");
    } catch (err) {
      this.logger.error(`Failed to write credential file: ${getErrorMessage(err)}`);
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Read and validate a credential file.
 * Throws CONFIG_CREDENTIALS_INVALID on any failure.
 */
export async function readCredentialFile(path: string): Promise<CredentialFile> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf-8"));
  } catch (err) {
    throw new ValidationError({
      code: "CONFIG_CREDENTIALS_INVALID",
      message: `Cannot read credential file ${path}: ${getErrorMessage(err)}`,
      cause: err,
    });
  }
  return parseCredentialFile(raw);
}
