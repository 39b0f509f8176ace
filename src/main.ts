import "dotenv/config";
import register from "../index.js";
import { loadConfig } from "./config.js";
import { createAppContext } from "./context.js";
import { errorMessage } from "./errors.js";
import { createLogger, setDefaultLogLevel } from "./logger.js";
import { HttpHost } from "./server.js";

async function main(): Promise<void> {
  const config = loadConfig();
  setDefaultLogLevel(config.logLevel);
  const log = createLogger("main");

  const app = createAppContext(config);
  if (!config.auth0) {
    log.warn("AUTH0_DOMAIN / AUTH0_CLIENT_ID not set: authenticated routes will answer 503");
  }

  const host = new HttpHost(createLogger("http"));
  register(host, app);
  await host.listen(config.port, config.host);
  log.info("Food planner started", { url: config.baseUrl, database: config.databasePath });

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) {
      return;
    }
    stopping = true;
    log.info("Shutting down", { signal });
    host
      .close()
      .catch((err: unknown) => log.error("Server close failed", { error: errorMessage(err) }))
      .finally(() => {
        app.db.close();
        process.exit(0);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
