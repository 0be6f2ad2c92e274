// src/main.ts
import "dotenv/config"; // MUST be first

import { Env } from "./config/env.js";
import { Logger } from "./infra/logger.js";
import { App } from "./app.js";

async function bootstrap() {
  const env = Env.load(); // reads process.env (now dotenv already loaded)
  const logger = Logger.create(env);

  logger.info({ env: env.nodeEnv, port: env.port }, "✅ Booting");

  const app = new App(env, logger);
  await app.start();

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, "⏳ Shutting down");
    app.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.fatal({ err }, "❌ Shutdown failed");
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

bootstrap().catch((err) => {
  console.error("FATAL:", err);
  process.exit(1);
});
