// src/infra/kv/errors.ts

/** The peer sent bytes that can never form a valid frame. */
export class DecodeError extends Error {
  public readonly name = "DecodeError";

  constructor(public readonly reason: string) {
    super(`malformed frame: ${reason}`);
  }
}

export type ConnectionErrorKind = "reset" | "io" | "frame-too-large";

export class ConnectionError extends Error {
  public readonly name = "ConnectionError";

  constructor(
    public readonly kind: ConnectionErrorKind,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
  }

  static reset(): ConnectionError {
    return new ConnectionError("reset", "connection reset by peer");
  }

  static io(cause: unknown): ConnectionError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new ConnectionError("io", `i/o failure: ${detail}`, cause);
  }

  static frameTooLarge(limit: number): ConnectionError {
    return new ConnectionError(
      "frame-too-large",
      `incomplete frame exceeds ${limit} bytes`,
    );
  }
}

export type CommandErrorKind =
  | "not-array"
  | "empty"
  | "arity"
  | "wrong-type"
  | "invalid-string";

/** A frame that is well-formed on the wire but not a valid command. */
export class CommandError extends Error {
  public readonly name = "CommandError";

  constructor(
    public readonly kind: CommandErrorKind,
    message: string,
  ) {
    super(message);
  }

  static notArray(): CommandError {
    return new CommandError(
      "not-array",
      "protocol error; expected array frame",
    );
  }

  static empty(): CommandError {
    return new CommandError("empty", "protocol error; empty command");
  }

  static arity(command: string): CommandError {
    return new CommandError(
      "arity",
      `wrong number of arguments for '${command}' command`,
    );
  }

  static wrongType(what: string): CommandError {
    return new CommandError(
      "wrong-type",
      `protocol error; expected simple or bulk frame for ${what}`,
    );
  }

  static invalidString(what: string): CommandError {
    return new CommandError(
      "invalid-string",
      `protocol error; invalid string for ${what}`,
    );
  }
}
