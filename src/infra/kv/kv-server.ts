// src/infra/kv/kv-server.ts
import net, { type AddressInfo } from "node:net";
import type { AppEnv } from "../../config/env.js";
import type { Logger } from "../logger.js";
import { ConnectionHandler } from "./connection-handler.js";
import { KvConnection } from "./kv-connection.js";
import type { KvStore } from "./kv-store.js";

export type KvServerOptions = Pick<AppEnv, "host" | "port" | "maxFrameBytes">;

export type ServerStats = Readonly<{
  activeConnections: number;
  totalConnections: number;
  commandsProcessed: number;
}>;

export interface StatsSource {
  stats(): ServerStats;
}

export class KvServer implements StatsSource {
  private readonly server: net.Server;
  private readonly sockets = new Set<net.Socket>();
  private readonly tasks = new Set<Promise<void>>();

  private connSeq = 0;
  private commands = 0;

  constructor(
    private readonly opts: KvServerOptions,
    private readonly store: KvStore,
    private readonly logger: Logger,
  ) {
    // half-open: a client may send its last request and FIN together
    this.server = net.createServer({ allowHalfOpen: true }, (sock) =>
      this.accept(sock),
    );

    this.server.on("error", (err: unknown) => {
      this.logger.error({ err }, "❌ KV listener error");
    });
  }

  async listen(): Promise<AddressInfo> {
    const { host, port } = this.opts;

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      this.server.once("error", onError);
      this.server.listen(port, host, () => {
        this.server.off("error", onError);
        resolve();
      });
    });

    const addr = this.server.address();
    if (addr === null || typeof addr === "string") {
      throw new Error("KV listener has no TCP address");
    }

    this.logger.info(
      { host: addr.address, port: addr.port },
      `✅ KV server listening on ${addr.address}:${addr.port}`,
    );
    return addr;
  }

  stats(): ServerStats {
    return Object.freeze({
      activeConnections: this.sockets.size,
      totalConnections: this.connSeq,
      commandsProcessed: this.commands,
    });
  }

  /** Stop accepting, drop open connections, wait for their handlers. */
  async close(): Promise<void> {
    const closed = new Promise<void>((resolve) => {
      this.server.close(() => resolve());
    });

    for (const sock of this.sockets) sock.destroy();

    await Promise.all([closed, ...this.tasks]);
    this.logger.info({}, "🔌 KV server closed");
  }

  private accept(sock: net.Socket): void {
    this.connSeq += 1;
    const log = this.logger.child({ conn: this.connSeq });

    sock.setNoDelay(true);
    this.sockets.add(sock);

    sock.on("error", (err: unknown) => {
      log.debug({ err }, "socket error");
    });

    sock.on("close", () => {
      this.sockets.delete(sock);
    });

    log.debug(
      { remote: `${sock.remoteAddress}:${sock.remotePort}` },
      "🔌 accepted",
    );

    const conn = new KvConnection(sock, {
      maxFrameBytes: this.opts.maxFrameBytes,
    });
    const handler = new ConnectionHandler(conn, this.store, log, () => {
      this.commands += 1;
    });

    const task = handler.run().finally(() => {
      this.tasks.delete(task);
    });
    this.tasks.add(task);
  }
}
