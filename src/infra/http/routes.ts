// src/infra/http/routes.ts
import type { FastifyInstance } from "fastify";
import type { KvStore } from "../kv/kv-store.js";
import type { StatsSource } from "../kv/kv-server.js";
import { notFound } from "./errors.js";

type Deps = {
  store: KvStore;
  server: StatsSource;
};

type KeyParams = { key: string };

export function registerRoutes(app: FastifyInstance, deps: Deps): void {
  app.get("/health", async () => ({ status: "ok" }));

  app.get("/stats", async () => ({
    keys: deps.store.size(),
    ...deps.server.stats(),
  }));

  app.get<{ Params: KeyParams }>("/keys/:key", async (req) => {
    const key = req.params.key;
    const value = deps.store.get(key);
    if (value === null) throw notFound("KEY_NOT_FOUND", { key });

    return {
      key,
      size: value.length,
      base64: value.toString("base64"),
    };
  });
}
