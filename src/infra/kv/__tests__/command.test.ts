import { describe, it, expect } from "vitest";
import { parseCommand } from "../command.js";
import { CommandError } from "../errors.js";
import { NULL_FRAME, array, bulk, integer, simple, type Frame } from "../protocol/frame.js";

function commandError(frame: Frame): CommandError {
  try {
    parseCommand(frame);
  } catch (err) {
    if (err instanceof CommandError) return err;
    throw err;
  }
  throw new Error("expected parseCommand to throw");
}

describe("parseCommand", () => {
  it("parses SET with key and value", () => {
    expect(parseCommand(array([bulk("SET"), bulk("k"), bulk("v")]))).toEqual({
      kind: "set",
      key: "k",
      value: Buffer.from("v"),
    });
  });

  it("parses GET with a key", () => {
    expect(parseCommand(array([bulk("GET"), bulk("k")]))).toEqual({ kind: "get", key: "k" });
  });

  it("matches operation names case-insensitively", () => {
    expect(parseCommand(array([bulk("get"), bulk("k")]))).toEqual({ kind: "get", key: "k" });
    expect(parseCommand(array([simple("SeT"), simple("k"), simple("v")]))).toEqual({
      kind: "set",
      key: "k",
      value: Buffer.from("v"),
    });
  });

  it("keeps binary values intact", () => {
    const value = Buffer.from([0x00, 0x0d, 0x0a, 0xff]);
    expect(parseCommand(array([bulk("SET"), bulk("bin"), bulk(value)]))).toEqual({
      kind: "set",
      key: "bin",
      value,
    });
  });

  it("returns unknown for unsupported operations without checking arity", () => {
    expect(parseCommand(array([bulk("PING")]))).toEqual({ kind: "unknown", name: "PING" });
    expect(parseCommand(array([bulk("del"), bulk("a"), bulk("b")]))).toEqual({
      kind: "unknown",
      name: "del",
    });
  });

  it("rejects frames that are not arrays", () => {
    const err = commandError(bulk("GET"));
    expect(err.kind).toBe("not-array");
    expect(err.message).toBe("protocol error; expected array frame");
  });

  it("rejects an empty array", () => {
    expect(commandError(array([])).kind).toBe("empty");
  });

  it("rejects SET without a value", () => {
    const err = commandError(array([bulk("SET"), bulk("k")]));
    expect(err.kind).toBe("arity");
    expect(err.message).toBe("wrong number of arguments for 'set' command");
  });

  it("rejects SET with extra arguments", () => {
    expect(commandError(array([bulk("SET"), bulk("k"), bulk("v"), bulk("EX")])).kind).toBe(
      "arity",
    );
  });

  it("rejects GET with no key or too many keys", () => {
    expect(commandError(array([bulk("GET")])).message).toBe(
      "wrong number of arguments for 'get' command",
    );
    expect(commandError(array([bulk("GET"), bulk("a"), bulk("b")])).kind).toBe("arity");
  });

  it("rejects non-text command names and keys", () => {
    const name = commandError(array([integer(1), bulk("k")]));
    expect(name.kind).toBe("wrong-type");
    expect(name.message).toBe("protocol error; expected simple or bulk frame for command name");

    const key = commandError(array([bulk("GET"), NULL_FRAME]));
    expect(key.message).toBe("protocol error; expected simple or bulk frame for key");

    const value = commandError(array([bulk("SET"), bulk("k"), array([])]));
    expect(value.message).toBe("protocol error; expected simple or bulk frame for value");
  });

  it("rejects keys and command names that are not valid UTF-8", () => {
    const key = commandError(array([bulk("GET"), bulk(Buffer.from([0xff]))]));
    expect(key.kind).toBe("invalid-string");
    expect(key.message).toBe("protocol error; invalid string for key");

    const name = commandError(array([bulk(Buffer.from([0xc3])), bulk("k")]));
    expect(name.kind).toBe("invalid-string");
    expect(name.message).toBe("protocol error; invalid string for command name");
  });

  it("keeps keys that differ only by a leading byte-order mark distinct", () => {
    const bom = Buffer.from([0xef, 0xbb, 0xbf, 0x6b]);
    expect(parseCommand(array([bulk("GET"), bulk(bom)]))).toEqual({
      kind: "get",
      key: "\ufeffk",
    });
  });

  it("decodes multi-byte UTF-8 keys", () => {
    expect(parseCommand(array([bulk("GET"), bulk(Buffer.from("clé", "utf8"))]))).toEqual({
      kind: "get",
      key: "clé",
    });
  });
});
