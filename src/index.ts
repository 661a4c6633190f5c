#!/usr/bin/env node

import { watch } from "node:fs";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig, parseCliArgs } from "./config/loader.js";
import type { AppConfig, HttpTransportConfig } from "./config/types.js";
import type { AppContext } from "./context.js";
import { createServer, SERVER_NAME, SERVER_VERSION } from "./server.js";
import { startHttpTransport } from "./transport/http.js";
import { errorMessage } from "./utils/errors.js";
import { getLogger, initLogger } from "./utils/logger.js";

const SHUTDOWN_TIMEOUT_MS = 10_000;
const RELOAD_DEBOUNCE_MS = 500;

interface RunningServer {
  context: AppContext;
  stop(): Promise<void>;
}

function httpSettings(config: AppConfig): HttpTransportConfig {
  if (config.transport.type === "http") return config.transport;
  return { type: "http", port: 3000, host: "127.0.0.1", stateless: false, sessionTimeout: 30 * 60 * 1000 };
}

async function startStdio(config: AppConfig): Promise<RunningServer> {
  const { server, context } = createServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  return {
    context,
    stop: async () => {
      await server.close();
      await transport.close();
    },
  };
}

async function startHttp(config: AppConfig): Promise<RunningServer> {
  const handle = await startHttpTransport(config, httpSettings(config));
  return { context: handle.context, stop: handle.close };
}

function installShutdown(running: RunningServer) {
  let stopping = false;
  const shutdown = async (signal: string) => {
    const logger = getLogger();
    if (stopping) {
      logger.warn("Second shutdown signal, exiting now", { signal });
      process.exit(1);
    }
    stopping = true;
    logger.info("Shutting down", { signal });

    const timer = setTimeout(() => {
      logger.error("Shutdown timed out, exiting", { timeoutMs: SHUTDOWN_TIMEOUT_MS });
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    timer.unref();

    try {
      await running.stop();
    } catch (err) {
      logger.error("Error during shutdown", { error: errorMessage(err) });
    }
    clearTimeout(timer);
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

/** Re-read the config file after it settles; a file that fails validation leaves the running settings in place. */
function watchConfig(configPath: string, context: AppContext) {
  let pending: ReturnType<typeof setTimeout> | undefined;
  const watcher = watch(configPath, () => {
    clearTimeout(pending);
    pending = setTimeout(() => {
      try {
        const next = loadConfig(configPath);
        context.reload(next);
        initLogger(next.defaults.logLevel).info("Config reloaded", { model: next.ollama.model });
      } catch (err) {
        getLogger().error("Config reload rejected", { path: configPath, error: errorMessage(err) });
      }
    }, RELOAD_DEBOUNCE_MS);
  });
  watcher.unref();
}

async function main() {
  const args = parseCliArgs(process.argv.slice(2));
  const config = loadConfig(args.configPath);
  const logger = initLogger(config.defaults.logLevel);

  const transport = args.transport ?? config.transport.type;
  logger.info(`Starting ${SERVER_NAME} ${SERVER_VERSION}`, {
    transport,
    ollama: config.ollama.url,
    model: config.ollama.model,
  });

  const running = transport === "http" ? await startHttp(config) : await startStdio(config);
  installShutdown(running);

  if (args.configPath) watchConfig(args.configPath, running.context);
}

main().catch((err: unknown) => {
  console.error(`Failed to start ${SERVER_NAME}:`, err);
  process.exit(1);
});
