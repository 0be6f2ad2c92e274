// src/infra/http/http-server.ts
import fastify, {
  type FastifyInstance,
  type FastifyReply,
  type FastifyRequest,
} from "fastify";

import type { AppEnv } from "../../config/env.js";
import type { Logger } from "../logger.js";
import { toHttpError } from "./errors.js";

export type HttpServerOptions = Pick<AppEnv, "host" | "logLevel"> &
  Readonly<{ adminPort: number }>;

/** Read-only admin surface next to the KV listener. */
export class HttpServer {
  public readonly app: FastifyInstance;

  constructor(
    private readonly opts: HttpServerOptions,
    private readonly logger: Logger,
  ) {
    this.app = fastify({
      logger: {
        level: opts.logLevel,
        base: null,
        timestamp: () => `,"time":"${new Date().toISOString()}"`,
      },
    });

    this.app.addHook("onRequest", async (req, reply) => {
      reply.header("x-request-id", req.id);
    });

    this.app.setErrorHandler(
      (err: unknown, req: FastifyRequest, reply: FastifyReply) => {
        const httpErr = toHttpError(err);

        const logBase = {
          reqId: req.id,
          method: req.method,
          url: req.url,
          status: httpErr.status,
        };

        if (httpErr.status >= 500) {
          this.logger.error({ ...logBase, err }, "Unhandled admin error");
        } else {
          this.logger.warn(logBase, "Admin request error");
        }

        if (reply.sent) return;

        return reply.status(httpErr.status).send({
          error: httpErr.message,
          details: httpErr.details ?? null,
          requestId: req.id,
        });
      },
    );
  }

  async listen(): Promise<void> {
    const host = this.opts.host;
    const port = this.opts.adminPort;

    try {
      await this.app.listen({ host, port });
      this.logger.info(
        { host, port },
        `✅ admin listening on http://${host}:${port}`,
      );
    } catch (err) {
      this.logger.error({ err, host, port }, "❌ Failed to start admin server");
      throw err;
    }
  }

  async close(): Promise<void> {
    await this.app.close();
  }
}
