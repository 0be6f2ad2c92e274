// src/app.ts
import type { AddressInfo } from "node:net";
import type { AppEnv } from "./config/env.js";
import type { Logger } from "./infra/logger.js";

import { MemoryStore } from "./infra/kv/kv-store.js";
import { KvServer } from "./infra/kv/kv-server.js";
import { HttpServer } from "./infra/http/http-server.js";
import { registerRoutes } from "./infra/http/routes.js";

export class App {
  private kv: KvServer | null = null;
  private admin: HttpServer | null = null;

  constructor(
    private readonly env: AppEnv,
    private readonly logger: Logger,
  ) {}

  async start(): Promise<AddressInfo> {
    this.logger.info({}, "✅ App.start()");

    const store = new MemoryStore();

    const kv = new KvServer(this.env, store, this.logger);
    const addr = await kv.listen();
    this.kv = kv;

    if (this.env.adminPort !== undefined) {
      const admin = new HttpServer(
        { ...this.env, adminPort: this.env.adminPort },
        this.logger,
      );
      registerRoutes(admin.app, { store, server: kv });
      await admin.listen();
      this.admin = admin;
    }

    return addr;
  }

  async stop(): Promise<void> {
    const admin = this.admin;
    const kv = this.kv;
    this.admin = null;
    this.kv = null;

    if (admin) await admin.close();
    if (kv) await kv.close();
    this.logger.info({}, "👋 App stopped");
  }
}
