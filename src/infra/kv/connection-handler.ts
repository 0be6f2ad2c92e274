// src/infra/kv/connection-handler.ts
import type { Logger } from "../logger.js";
import { parseCommand, type Command } from "./command.js";
import { CommandError, ConnectionError, DecodeError } from "./errors.js";
import type { KvConnection } from "./kv-connection.js";
import type { KvStore } from "./kv-store.js";
import {
  NULL_FRAME,
  bulk,
  error,
  simple,
  type Frame,
} from "./protocol/frame.js";

export type HandlerState =
  | "await-frame"
  | "decode-command"
  | "apply"
  | "respond"
  | "closed";

/** Error frame text; CR/LF from client-supplied names are flattened. */
export function errorFrame(message: string): Frame {
  return error(`ERR ${message}`.replace(/[\r\n]+/g, " "));
}

/**
 * Serves one connection: read a frame, run it against the store, write
 * exactly one response, repeat until the stream ends.
 */
export class ConnectionHandler {
  private current: HandlerState = "await-frame";
  private served = 0;

  constructor(
    private readonly connection: KvConnection,
    private readonly store: KvStore,
    private readonly logger: Logger,
    private readonly onCommand: (cmd: Command) => void = () => {},
  ) {}

  get state(): HandlerState {
    return this.current;
  }

  /** Number of request frames answered so far. */
  get commandsServed(): number {
    return this.served;
  }

  /** Resolves once the connection is closed; never rejects. */
  async run(): Promise<void> {
    try {
      for (;;) {
        this.current = "await-frame";
        const frame = await this.connection.readFrame();
        if (frame === null) {
          this.logger.debug({ served: this.served }, "peer closed");
          break;
        }

        const response = this.respond(frame);

        this.current = "respond";
        await this.connection.writeFrame(response);
        this.served += 1;
      }
    } catch (err) {
      this.logFailure(err);
    } finally {
      this.current = "closed";
      this.connection.close();
    }
  }

  /** Turn one request frame into its response frame. */
  respond(frame: Frame): Frame {
    this.current = "decode-command";

    let cmd: Command;
    try {
      cmd = parseCommand(frame);
    } catch (err) {
      if (err instanceof CommandError) {
        this.logger.debug({ kind: err.kind }, err.message);
        return errorFrame(err.message);
      }
      throw err;
    }

    this.current = "apply";
    this.onCommand(cmd);
    return this.apply(cmd);
  }

  private apply(cmd: Command): Frame {
    switch (cmd.kind) {
      case "set":
        this.store.set(cmd.key, cmd.value);
        this.logger.debug({ key: cmd.key, bytes: cmd.value.length }, "SET");
        return simple("OK");

      case "get": {
        const value = this.store.get(cmd.key);
        this.logger.debug({ key: cmd.key, hit: value !== null }, "GET");
        return value === null ? NULL_FRAME : bulk(value);
      }

      case "unknown":
        this.logger.debug({ name: cmd.name }, "unknown command");
        return errorFrame(`unknown command '${cmd.name}'`);
    }
  }

  private logFailure(err: unknown): void {
    if (err instanceof DecodeError) {
      this.logger.warn({ reason: err.reason }, "closing on malformed frame");
    } else if (err instanceof ConnectionError && err.kind === "reset") {
      this.logger.debug({}, err.message);
    } else if (err instanceof ConnectionError) {
      this.logger.warn({ err, kind: err.kind }, "connection failed");
    } else {
      this.logger.error({ err }, "unexpected handler failure");
    }
  }
}
