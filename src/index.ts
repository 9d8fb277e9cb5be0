import "dotenv/config";
import type { Server as HttpServer } from "http";

import { ConfigError, loadConfig, maskToken } from "./config";
import { createLogger } from "./logger";
import { createDispatcher } from "./tools";
import { createApp } from "./transports/http";
import { createMcpServer, serveStdio } from "./transports/mcp";

async function main(): Promise<void> {
  const config = loadConfig(process.env, { transport: process.argv[2] });
  const logger = createLogger(config.serverName, config.logLevel);
  const dispatcher = createDispatcher(config, createLogger("tools", config.logLevel));
  logger.info(
    { token: maskToken(config.authToken), identifier: config.identifier, tools: dispatcher.listTools().length, transport: config.transport },
    "starting text utilities server",
  );

  let close: () => Promise<void>;
  if (config.transport === "stdio") {
    const server = createMcpServer(dispatcher, { name: config.serverName, version: config.version });
    await serveStdio(server);
    close = () => server.close();
  } else {
    const app = createApp(dispatcher, { serverName: config.serverName, logger });
    const { host, port } = config.http;
    const server = await new Promise<HttpServer>((resolve, reject) => {
      const s = app.listen(port, host, () => resolve(s));
      s.once("error", reject);
    });
    logger.info({ host, port }, "HTTP front listening");
    close = () => new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
  }

  const shutdown = (signal: string) => {
    logger.info({ signal }, "server stopping");
    close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, "shutdown failed");
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  const logger = createLogger("startup");
  logger.fatal({ err }, err instanceof ConfigError ? "invalid configuration" : "server failed to start");
  process.exitCode = 1;
});
