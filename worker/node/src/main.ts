/**
 * Firewall worker process: loads config, registers endpoints behind the
 * firewall, serves them over NATS. Supports hot reload via SIGHUP.
 */

import "dotenv/config";
import { RemoteHandler } from "@remote-firewall/common";
import { errorMessage } from "@remote-firewall/core";
import { createNodeJSLogger } from "./logger.js";
import { loadConfig } from "./config.js";
import { registerExampleHandlers } from "./example-handlers.js";
import { RemoteServer } from "./remote-server.js";

const SERVICE_NAME = "firewall-worker";

async function main(): Promise<void> {
  const loggerFactory = createNodeJSLogger(SERVICE_NAME);
  const log = loggerFactory.get(`${SERVICE_NAME}:main`);

  const config = loadConfig({ log });
  const handler = new RemoteHandler({ loggerFactory });
  const bannedCallers = (process.env.BANNED_CALLERS ?? "")
    .split(",")
    .map((id) => id.trim())
    .filter(Boolean);
  registerExampleHandlers({ handler, bannedCallers });

  const server = new RemoteServer({ config, handler, log: loggerFactory.get(`${SERVICE_NAME}:server`) });
  await server.start();
  log.info?.(
    { endpoints: handler.endpointNames().length, prefix: config.subjectPrefix },
    `${SERVICE_NAME}:main - Started`
  );

  const shutdown = (signal: string): void => {
    log.info?.({ signal }, `${SERVICE_NAME}:main - Shutting down`);
    server
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error?.({ error: errorMessage(err) }, `${SERVICE_NAME}:main - Shutdown failed`);
        process.exit(1);
      });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));

  process.on("SIGHUP", () => {
    log.info?.({}, `${SERVICE_NAME}:main - Hot reload requested`);
    Promise.resolve()
      .then(() => server.reload(loadConfig({ log })))
      .then(() => log.info?.({}, `${SERVICE_NAME}:main - Hot reload done`))
      .catch((err: unknown) => {
        log.error?.(
          { error: errorMessage(err) },
          `${SERVICE_NAME}:main - Hot reload failed, keeping previous configuration`
        );
      });
  });
}

main().catch((err) => {
  console.error(`${SERVICE_NAME}:main - Fatal:`, err);
  process.exit(1);
});
