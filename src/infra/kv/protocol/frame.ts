// src/infra/kv/protocol/frame.ts
import { TextDecoder } from "node:util";

/** One self-delimited unit of the wire protocol. */
export type Frame =
  | Readonly<{ kind: "simple"; value: string }>
  | Readonly<{ kind: "error"; value: string }>
  | Readonly<{ kind: "integer"; value: bigint }>
  | Readonly<{ kind: "bulk"; value: Buffer }>
  | Readonly<{ kind: "null" }>
  | Readonly<{ kind: "array"; items: readonly Frame[] }>;

export const I64_MIN = -(2n ** 63n);
export const I64_MAX = 2n ** 63n - 1n;

export function simple(value: string): Frame {
  return { kind: "simple", value };
}

export function error(value: string): Frame {
  return { kind: "error", value };
}

export function integer(value: bigint | number): Frame {
  return { kind: "integer", value: BigInt(value) };
}

export function bulk(value: Buffer | string): Frame {
  return {
    kind: "bulk",
    value: typeof value === "string" ? Buffer.from(value, "utf8") : value,
  };
}

export const NULL_FRAME: Frame = Object.freeze({ kind: "null" });

export function array(items: readonly Frame[]): Frame {
  return { kind: "array", items };
}

// fatal and ignoreBOM: distinct byte strings never decode to the same text
const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/** Strict UTF-8 decode; null when `bytes` is not valid UTF-8. */
export function decodeUtf8(bytes: Uint8Array): string | null {
  try {
    return utf8.decode(bytes);
  } catch {
    return null;
  }
}

/** Bytes carried by a simple or bulk frame; null for every other kind. */
export function frameBytes(frame: Frame): Buffer | null {
  switch (frame.kind) {
    case "simple":
      return Buffer.from(frame.value, "utf8");
    case "bulk":
      return frame.value;
    default:
      return null;
  }
}
