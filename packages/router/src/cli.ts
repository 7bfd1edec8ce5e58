#!/usr/bin/env tsx

import { getErrorMessage } from "@interconnect/errors";
import { LOG_LEVELS, type LogLevel, type RouterConfig } from "@interconnect/protocol";
import { loadRouterConfig, startRouterServer } from "./server.js";

// ---------------------------------------------------------------------------
// Argument parsing (minimal, no external CLI lib)
// ---------------------------------------------------------------------------

interface CliArgs {
  readonly config?: string;
  readonly logLevel?: LogLevel;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parseArgs(argv: readonly string[]): CliArgs {
  let config: string | undefined;
  let logLevel: LogLevel | undefined;

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    switch (arg) {
      case "--config":
        if (next) {
          config = next;
          i++;
        }
        break;
      case "--log-level":
        if (isLogLevel(next)) {
          logLevel = next;
          i++;
        }
        break;
      case "--help":
        printHelp();
        process.exit(0);
        break;
    }
  }

  return {
    ...(config ? { config } : {}),
    ...(logLevel ? { logLevel } : {}),
  };
}

function printHelp(): void {
  const help = `
interconnect-router - message bus router for building automation agents

Usage: interconnect-router --config <path> [options]

Options:
  --config <path>                 Router config file (JSON, hot-reloaded)
  --log-level debug|info|warn|error  Override the configured log level
  --help                          Show this help message
`;
  console.log(help);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const args = parseArgs(process.argv);
  if (!args.config) {
    printHelp();
    process.exit(2);
  }

  const loaded = await loadRouterConfig(args.config);
  const config: RouterConfig = args.logLevel ? { ...loaded, logLevel: args.logLevel } : loaded;
  const server = await startRouterServer(config, { configPath: args.config });

  server.router.onFatal((error) => {
    console.error(`Fatal: ${error.message}`);
    void server.stop().finally(() => process.exit(1));
  });

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.info(`Received ${signal}, shutting down`);
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(`Shutdown failed: ${getErrorMessage(err)}`);
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  console.error("Fatal:", getErrorMessage(err));
  process.exit(1);
});
