import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ValidationError } from "@interconnect/errors";
import type { CredentialFile } from "@interconnect/protocol";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Logger } from "../../logger.js";
import { CredentialStore } from "../credential-store.js";

const FILE: CredentialFile = {
  groups: { readers: ["subscribe:devices/#"] },
  credentials: {
    "hist-token": {
      identity: "hist1",
      type: "token",
      capabilities: ["publish:analysis/#"],
      groups: ["readers"],
    },
    "ui-token": { type: "token", capabilities: [], groups: ["readers"] },
  },
};

function createLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("CredentialStore", () => {
  describe("lookup", () => {
    it("finds a credential by its secret", () => {
      const store = new CredentialStore(FILE);
      expect(store.find("hist-token")?.record.identity).toBe("hist1");
      expect(store.find("nope")).toBeUndefined();
    });

    it("expands group capabilities after its own", () => {
      const store = new CredentialStore(FILE);
      expect(store.capabilitiesOf("hist-token")).toEqual([
        "publish:analysis/#",
        "subscribe:devices/#",
      ]);
      expect(store.capabilitiesOf("missing")).toBeUndefined();
    });

    it("uses the group definitions current at lookup time", () => {
      const store = new CredentialStore(FILE);
      store.replace({ ...FILE, groups: { readers: ["subscribe:devices/building1/#"] } });
      expect(store.capabilitiesOf("ui-token")).toEqual(["subscribe:devices/building1/#"]);
    });

    it("does not resolve inherited object keys", () => {
      const store = new CredentialStore(FILE);
      expect(store.get("toString")).toBeUndefined();
    });
  });

  describe("remove", () => {
    it("removes the credential and notifies listeners", () => {
      const store = new CredentialStore(FILE);
      const changed = vi.fn();
      store.onChanged(changed);

      expect(store.remove("ui-token")).toBe(true);
      expect(store.remove("ui-token")).toBe(false);
      expect(store.size).toBe(1);
      expect(changed).toHaveBeenCalledOnce();
    });
  });

  describe("file backing", () => {
    let dir: string;
    let path: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "credentials-"));
      path = join(dir, "credentials.json");
      await writeFile(path, JSON.stringify(FILE));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("loads and validates the file", async () => {
      const store = await CredentialStore.fromFile(path, { logger: createLogger() });
      expect(store.size).toBe(2);
    });

    it("refuses an invalid file at load", async () => {
      await writeFile(path, JSON.stringify({ credentials: { t: { groups: ["ghosts"] } } }));
      try {
        await CredentialStore.fromFile(path);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        expect(error).toMatchObject({
          code: "CONFIG_CREDENTIALS_INVALID",
          message: 'Invalid credential file: credentials.t.groups: Unknown group "ghosts"',
        });
      }
    });

    it("reloads a changed file", async () => {
      const store = await CredentialStore.fromFile(path, { logger: createLogger() });
      await writeFile(path, JSON.stringify({ credentials: { "new-token": {} } }));
      await store.reload();
      expect(store.find("new-token")).toBeDefined();
      expect(store.find("hist-token")).toBeUndefined();
    });

    it("keeps the previous contents when the new file is invalid", async () => {
      const logger = createLogger();
      const store = await CredentialStore.fromFile(path, { logger });
      const onError = vi.fn();
      store.onError(onError);

      await writeFile(path, "{ not json");
      await store.reload();

      expect(store.size).toBe(2);
      expect(onError).toHaveBeenCalledOnce();
      expect(logger.error).toHaveBeenCalledOnce();
    });

    it("reloads after a debounced change event", async () => {
      let fire: (() => void) | undefined;
      const store = await CredentialStore.fromFile(path, {
        logger: createLogger(),
        debounceMs: 50,
        watch: () => ({
          on: (_event, handler) => {
            fire = handler;
          },
          close: vi.fn().mockResolvedValue(undefined),
        }),
      });
      vi.useFakeTimers();
      try {
        const reload = vi.spyOn(store, "reload").mockResolvedValue(undefined);
        await store.watch();

        fire?.();
        fire?.();
        vi.advanceTimersByTime(49);
        expect(reload).not.toHaveBeenCalled();
        vi.advanceTimersByTime(1);
        expect(reload).toHaveBeenCalledOnce();
        await store.stop();
      } finally {
        vi.useRealTimers();
      }
    });

    it("writes removals back to the file", async () => {
      const store = await CredentialStore.fromFile(path, { logger: createLogger() });
      store.remove("ui-token");
      await vi.waitFor(async () => {
        const saved: unknown = JSON.parse(await readFile(path, "utf-8"));
        expect(saved).toEqual({
          groups: FILE.groups,
          credentials: { "hist-token": FILE.credentials["hist-token"] },
        });
      });
    });
  });
});
