// ---------------------------------------------------------------------------
// File Watching
// ---------------------------------------------------------------------------

export interface FileWatcherLike {
  on(event: "change", handler: () => void): unknown;
  close(): Promise<void>;
}

/** File watcher (chokidar by default). Injectable for testing. */
export type FileWatcherFactory = (path: string) => FileWatcherLike;

export interface DebouncedWatch {
  stop(): Promise<void>;
}

/**
 * Watch a file and call `onChange` once per burst of change events.
 */
export async function watchDebounced(
  path: string,
  debounceMs: number,
  onChange: () => void,
  factory?: FileWatcherFactory,
): Promise<DebouncedWatch> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  let watcher: FileWatcherLike;
  if (factory) {
    watcher = factory(path);
  } else {
    // Dynamic import keeps chokidar out of processes that never watch files
    const { watch } = await import("chokidar");
    watcher = watch(path, { ignoreInitial: true });
  }

  watcher.on("change", () => {
    if (timer !== undefined) clearTimeout(timer);
    timer = setTimeout(() => {
      timer = undefined;
      onChange();
    }, debounceMs);
  });

  return {
    async stop() {
      if (timer !== undefined) {
        clearTimeout(timer);
        timer = undefined;
      }
      await watcher.close();
    },
  };
}
