// src/infra/kv/command.ts
import { CommandError } from "./errors.js";
import { decodeUtf8, frameBytes, type Frame } from "./protocol/frame.js";

export type Command =
  | Readonly<{ kind: "get"; key: string }>
  | Readonly<{ kind: "set"; key: string; value: Buffer }>
  | Readonly<{ kind: "unknown"; name: string }>;

function textArg(frame: Frame, what: string): string {
  if (frame.kind === "simple") return frame.value;
  if (frame.kind !== "bulk") throw CommandError.wrongType(what);

  const text = decodeUtf8(frame.value);
  if (text === null) throw CommandError.invalidString(what);
  return text;
}

function bytesArg(frame: Frame, what: string): Buffer {
  const bytes = frameBytes(frame);
  if (bytes === null) throw CommandError.wrongType(what);
  return bytes;
}

/**
 * Interpret an array frame as a command.
 *
 * Unsupported operation names come back as `unknown` rather than throwing;
 * shape and arity problems throw `CommandError`.
 */
export function parseCommand(frame: Frame): Command {
  if (frame.kind !== "array") throw CommandError.notArray();

  const [head, ...args] = frame.items;
  if (!head) throw CommandError.empty();

  const name = textArg(head, "command name");

  switch (name.toLowerCase()) {
    case "get": {
      const [key] = args;
      if (args.length !== 1 || !key) throw CommandError.arity("get");
      return { kind: "get", key: textArg(key, "key") };
    }
    case "set": {
      const [key, value] = args;
      if (args.length !== 2 || !key || !value) throw CommandError.arity("set");
      return {
        kind: "set",
        key: textArg(key, "key"),
        value: bytesArg(value, "value"),
      };
    }
    default:
      return { kind: "unknown", name };
  }
}
