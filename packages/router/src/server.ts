import { readFile } from "node:fs/promises";
import { type BrokerClient, createRedisBrokerClient } from "@interconnect/broker";
import { getErrorMessage, ValidationError } from "@interconnect/errors";
import { resolveRouterConfig, type RouterConfig } from "@interconnect/protocol";
import { CredentialStore } from "./auth/credential-store.js";
import { ConfigWatcher } from "./config-watcher.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { MessageRouter } from "./router.js";
import { BrokerTransport } from "./transports/broker-transport.js";
import { MemoryTransport } from "./transports/memory-transport.js";
import type { Transport } from "./transports/types.js";
import { type WsServerFactory, WsTransport } from "./transports/ws-transport.js";
import type { FileWatcherFactory } from "./utils/file-watcher.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RouterServerOptions {
  /** Config file to hot-reload; without it the configuration is fixed */
  readonly configPath?: string;
  readonly logger?: Logger;
  readonly wsServerFactory?: WsServerFactory;
  readonly createBrokerClient?: (url: string) => Promise<BrokerClient>;
  readonly watch?: FileWatcherFactory;
}

export interface RouterServer {
  readonly router: MessageRouter;
  readonly store: CredentialStore;
  /** Present when `transports.inproc` is enabled */
  readonly inproc: MemoryTransport | undefined;
  stop(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/**
 * Read and validate a JSON router config. Throws CONFIG_INVALID.
 */
export async function loadRouterConfig(path: string): Promise<RouterConfig> {
  const content = await readFile(path, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ValidationError({
      code: "CONFIG_INVALID",
      message: `Invalid router config: ${getErrorMessage(err)}`,
      cause: err,
    });
  }
  return resolveRouterConfig(raw);
}

// ---------------------------------------------------------------------------
// Assembly
// ---------------------------------------------------------------------------

/**
 * Build the credential store, transports and router described by a config,
 * start them, and wire hot reload of both files.
 */
export async function startRouterServer(
  config: RouterConfig,
  options: RouterServerOptions = {},
): Promise<RouterServer> {
  let running: MessageRouter | undefined;
  const level = () => running?.getConfig().logLevel ?? config.logLevel;
  const logger = options.logger ?? createConsoleLogger("RouterServer", level);

  const store = config.credentialsPath
    ? await CredentialStore.fromFile(config.credentialsPath, {
        logger: options.logger ?? createConsoleLogger("CredentialStore", level),
        ...(options.watch ? { watch: options.watch } : {}),
      })
    : new CredentialStore(undefined, { logger });

  const transports: Transport[] = [];
  const { ws, broker } = config.transports;
  if (ws) {
    transports.push(
      new WsTransport(
        {
          port: ws.port,
          host: ws.host,
          maxConnections: config.maxConnections,
          maxFramesPerSecond: config.maxFramesPerSecond,
          maxFrameSize: config.maxFrameSize,
          highWaterMark: config.highWaterMark,
          logger: options.logger ?? createConsoleLogger("WsTransport", level),
        },
        options.wsServerFactory,
      ),
    );
  }
  const inproc = config.transports.inproc
    ? new MemoryTransport({ maxFrameSize: config.maxFrameSize })
    : undefined;
  if (inproc) transports.push(inproc);
  if (broker) {
    const connect =
      options.createBrokerClient ??
      ((url: string) =>
        createRedisBrokerClient({
          url,
          onError: (error) => logger.warn(`Broker connection error: ${error.message}`),
        }));
    transports.push(
      new BrokerTransport({
        prefix: broker.prefix,
        createClient: () => connect(broker.url),
        maxFrameSize: config.maxFrameSize,
        logger: options.logger ?? createConsoleLogger("BrokerTransport", level),
      }),
    );
  }

  const router = new MessageRouter(config, {
    store,
    transports,
    ...(options.logger ? { logger: options.logger } : {}),
  });
  running = router;
  await router.start();
  if (config.credentialsPath) {
    await store.watch(config.credentialsPath);
  }

  let watcher: ConfigWatcher | undefined;
  if (options.configPath) {
    watcher = new ConfigWatcher(config, 300, options.watch ? { watch: options.watch } : undefined);
    watcher.onUpdated((next, fields) => {
      router.applyConfig(next);
      logger.info(`Applied config changes: ${fields.join(", ")}`);
    });
    watcher.onRestartRequired((fields) => {
      logger.warn(`Config changes need a restart to take effect: ${fields.join(", ")}`);
    });
    watcher.onError((error) => {
      logger.error(`Rejected config reload: ${error.message}`);
    });
    await watcher.watch(options.configPath);
  }

  return {
    router,
    store,
    inproc,
    async stop() {
      await watcher?.stop();
      await store.stop();
      await router.stop();
    },
  };
}
