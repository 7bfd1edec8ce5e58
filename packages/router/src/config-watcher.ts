import { readFile } from "node:fs/promises";
import { toError } from "@interconnect/errors";
import {
  HOT_RELOADABLE_FIELDS,
  type HotReloadableField,
  RESTART_REQUIRED_FIELDS,
  type RestartRequiredField,
  type RouterConfig,
  resolveRouterConfig,
} from "@interconnect/protocol";
import { createEmitter, type Emitter } from "./utils/emitter.js";
import type { DebouncedWatch, FileWatcherFactory } from "./utils/file-watcher.js";
import { watchDebounced } from "./utils/file-watcher.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ConfigUpdatedHandler = (
  newConfig: RouterConfig,
  changedFields: readonly HotReloadableField[],
) => void;
export type ConfigErrorHandler = (error: Error) => void;
export type ConfigRestartRequiredHandler = (fields: readonly RestartRequiredField[]) => void;

export interface ConfigWatcherDeps {
  /** File watcher factory (chokidar by default) */
  readonly watch: FileWatcherFactory;
}

type ConfigWatcherEvents = {
  updated: [newConfig: RouterConfig, changedFields: readonly HotReloadableField[]];
  error: [error: Error];
  restartRequired: [fields: readonly RestartRequiredField[]];
};

// ---------------------------------------------------------------------------
// ConfigWatcher
// ---------------------------------------------------------------------------

/**
 * Watches the router config file with debounce and zod validation.
 *
 * Hot-reloadable fields are applied immediately.
 * Restart-required fields emit a warning and keep their running values.
 * Invalid configs are rejected (old config retained).
 */
export class ConfigWatcher {
  private currentConfig: RouterConfig;
  private watcher: DebouncedWatch | undefined;
  private configPath: string | undefined;

  private readonly events: Emitter<ConfigWatcherEvents> = createEmitter();
  private readonly debounceMs: number;
  private readonly deps: ConfigWatcherDeps | undefined;

  constructor(initialConfig: RouterConfig, debounceMs = 300, deps?: ConfigWatcherDeps) {
    this.currentConfig = initialConfig;
    this.debounceMs = debounceMs;
    this.deps = deps;
  }

  async watch(path: string): Promise<void> {
    this.configPath = path;
    await this.watcher?.stop();
    this.watcher = await watchDebounced(
      path,
      this.debounceMs,
      () => void this.reload(),
      this.deps?.watch,
    );
  }

  async stop(): Promise<void> {
    await this.watcher?.stop();
    this.watcher = undefined;
    this.events.clear();
  }

  getConfig(): RouterConfig {
    return this.currentConfig;
  }

  onUpdated(handler: ConfigUpdatedHandler): () => void {
    return this.events.on("updated", handler);
  }

  onError(handler: ConfigErrorHandler): () => void {
    return this.events.on("error", handler);
  }

  onRestartRequired(handler: ConfigRestartRequiredHandler): () => void {
    return this.events.on("restartRequired", handler);
  }

  /** @internal Reload now instead of waiting for a change event */
  triggerReload(): Promise<void> {
    return this.reload();
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private async reload(): Promise<void> {
    if (!this.configPath) return;

    let newConfig: RouterConfig;
    try {
      const content = await readFile(this.configPath, "utf-8");
      newConfig = resolveRouterConfig(JSON.parse(content));
    } catch (err) {
      this.events.emit("error", toError(err));
      return;
    }

    const hotReloadable = HOT_RELOADABLE_FIELDS.filter((field) =>
      changed(this.currentConfig[field], newConfig[field]),
    );
    const restartRequired = RESTART_REQUIRED_FIELDS.filter((field) =>
      changed(this.currentConfig[field], newConfig[field]),
    );

    if (restartRequired.length > 0) {
      this.events.emit("restartRequired", restartRequired);
    }

    if (hotReloadable.length > 0) {
      this.currentConfig = { ...this.currentConfig, ...pickHotFields(newConfig) };
      this.events.emit("updated", this.currentConfig, hotReloadable);
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function changed(previous: unknown, next: unknown): boolean {
  return JSON.stringify(previous) !== JSON.stringify(next);
}

export function pickHotFields(config: RouterConfig): Pick<RouterConfig, HotReloadableField> {
  return {
    heartbeatInterval: config.heartbeatInterval,
    sweepInterval: config.sweepInterval,
    rpcDefaultTimeout: config.rpcDefaultTimeout,
    rpcMaxTimeout: config.rpcMaxTimeout,
    outboxCapacity: config.outboxCapacity,
    logLevel: config.logLevel,
  };
}
