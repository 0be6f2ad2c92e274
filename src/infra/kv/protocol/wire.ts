// src/infra/kv/protocol/wire.ts
import { I64_MAX, I64_MIN, NULL_FRAME, decodeUtf8, type Frame } from "./frame.js";

export type DecodeOutcome =
  | Readonly<{ status: "ready"; frame: Frame; consumed: number }>
  | Readonly<{ status: "incomplete" }>
  | Readonly<{ status: "malformed"; reason: string }>;

type Step =
  | Readonly<{ status: "ready"; frame: Frame; end: number }>
  | Readonly<{ status: "incomplete" }>
  | Readonly<{ status: "malformed"; reason: string }>;

const SIMPLE = 0x2b; // +
const ERROR = 0x2d; // -
const INTEGER = 0x3a; // :
const BULK = 0x24; // $
const ARRAY = 0x2a; // *

const CRLF = Buffer.from("\r\n", "latin1");
const NULL_BULK = Buffer.from("$-1\r\n", "latin1");

export const MAX_BULK_LENGTH = 512 * 1024 * 1024;
export const MAX_ARRAY_DEPTH = 32;

const INCOMPLETE: Step = Object.freeze({ status: "incomplete" });

function malformed(reason: string): Step {
  return { status: "malformed", reason };
}

function readLine(
  buf: Buffer,
  start: number,
): { line: Buffer; next: number } | null {
  const idx = buf.indexOf(CRLF, start);
  if (idx < 0) return null;
  return { line: buf.subarray(start, idx), next: idx + CRLF.length };
}

const LENGTH = /^-?[0-9]+$/;
const SIGNED = /^[-+]?[0-9]+$/;

function parseDecimal(line: Buffer, pattern: RegExp = LENGTH): bigint | null {
  const text = line.toString("latin1");
  if (!pattern.test(text)) return null;
  return BigInt(text);
}

function lineStep(kind: "simple" | "error", line: Buffer, end: number): Step {
  const value = decodeUtf8(line);
  if (value === null) return malformed(`invalid UTF-8 in ${kind} string`);
  return { status: "ready", frame: { kind, value }, end };
}

function parseAt(buf: Buffer, offset: number, depth: number): Step {
  if (offset >= buf.length) return INCOMPLETE;

  const marker = buf[offset];
  if (
    marker !== SIMPLE &&
    marker !== ERROR &&
    marker !== INTEGER &&
    marker !== BULK &&
    marker !== ARRAY
  ) {
    return malformed(`unexpected marker byte 0x${marker.toString(16)}`);
  }

  const header = readLine(buf, offset + 1);
  if (!header) return INCOMPLETE;

  switch (marker) {
    case SIMPLE:
      return lineStep("simple", header.line, header.next);

    case ERROR:
      return lineStep("error", header.line, header.next);

    case INTEGER: {
      const value = parseDecimal(header.line, SIGNED);
      if (value === null) return malformed("invalid integer");
      if (value < I64_MIN || value > I64_MAX) {
        return malformed("integer out of 64-bit range");
      }
      return {
        status: "ready",
        frame: { kind: "integer", value },
        end: header.next,
      };
    }

    case BULK: {
      const len = parseDecimal(header.line);
      if (len === null) return malformed("invalid bulk length");
      if (len === -1n) {
        return { status: "ready", frame: NULL_FRAME, end: header.next };
      }
      if (len < 0n) return malformed("negative bulk length");
      if (len > BigInt(MAX_BULK_LENGTH)) {
        return malformed("bulk length exceeds limit");
      }

      const start = header.next;
      const stop = start + Number(len);
      if (buf.length < stop + CRLF.length) return INCOMPLETE;
      if (buf[stop] !== CRLF[0] || buf[stop + 1] !== CRLF[1]) {
        return malformed("bulk payload not terminated by CRLF");
      }

      // copy: the payload outlives the connection's read buffer
      return {
        status: "ready",
        frame: { kind: "bulk", value: Buffer.from(buf.subarray(start, stop)) },
        end: stop + CRLF.length,
      };
    }

    default: {
      if (depth >= MAX_ARRAY_DEPTH) return malformed("array nesting too deep");

      const count = parseDecimal(header.line);
      if (count === null) return malformed("invalid array length");
      if (count < 0n) return malformed("negative array length");

      const items: Frame[] = [];
      let cursor = header.next;
      for (let i = 0n; i < count; i++) {
        const step = parseAt(buf, cursor, depth + 1);
        if (step.status !== "ready") return step;
        items.push(step.frame);
        cursor = step.end;
      }
      return {
        status: "ready",
        frame: { kind: "array", items },
        end: cursor,
      };
    }
  }
}

function assertLine(kind: string, text: string): void {
  if (text.includes("\r\n")) {
    throw new Error(`${kind} frame text must not contain CRLF`);
  }
}

function encodeInto(frame: Frame, out: Buffer[]): void {
  switch (frame.kind) {
    case "simple":
      assertLine("simple", frame.value);
      out.push(Buffer.from(`+${frame.value}\r\n`, "utf8"));
      return;
    case "error":
      assertLine("error", frame.value);
      out.push(Buffer.from(`-${frame.value}\r\n`, "utf8"));
      return;
    case "integer":
      out.push(Buffer.from(`:${frame.value}\r\n`, "latin1"));
      return;
    case "bulk":
      out.push(Buffer.from(`$${frame.value.length}\r\n`, "latin1"));
      out.push(frame.value, CRLF);
      return;
    case "null":
      out.push(NULL_BULK);
      return;
    case "array":
      out.push(Buffer.from(`*${frame.items.length}\r\n`, "latin1"));
      for (const item of frame.items) encodeInto(item, out);
      return;
  }
}

export class Wire {
  static encode(frame: Frame): Buffer {
    const out: Buffer[] = [];
    encodeInto(frame, out);
    return Buffer.concat(out);
  }

  /**
   * Try to decode one frame from the start of `buf`.
   *
   * Never mutates `buf`. An `incomplete` outcome means every byte seen so far
   * is a valid prefix; call again once more bytes have been appended.
   */
  static decode(buf: Buffer): DecodeOutcome {
    const step = parseAt(buf, 0, 0);
    if (step.status !== "ready") return step;
    return { status: "ready", frame: step.frame, consumed: step.end };
  }
}
