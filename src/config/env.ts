// src/config/env.ts
export type NodeEnv = "development" | "test" | "production";
export type LogLevel =
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace"
  | "silent";

export type EnvSource = Readonly<Record<string, string | undefined>>;

export type AppEnv = Readonly<{
  nodeEnv: NodeEnv;
  host: string;
  port: number;
  adminPort: number | undefined;
  maxFrameBytes: number;
  logLevel: LogLevel;
}>;

export const DEFAULT_MAX_FRAME_BYTES = 64 * 1024 * 1024;

function optStr(source: EnvSource, name: string): string | undefined {
  const t = source[name]?.trim();
  return t ? t : undefined;
}

function parsePort(source: EnvSource, name: string, fallback?: number): number {
  const raw = optStr(source, name);
  const v = raw ? Number(raw) : fallback;
  if (!v || !Number.isInteger(v) || v < 1 || v > 65535) {
    throw new Error(`Invalid ${name} (must be 1..65535)`);
  }
  return v;
}

function parsePositiveInt(
  source: EnvSource,
  name: string,
  fallback: number,
): number {
  const raw = optStr(source, name);
  const v = raw ? Number(raw) : fallback;
  if (!Number.isSafeInteger(v) || v < 1) {
    throw new Error(`Invalid ${name} (must be a positive integer)`);
  }
  return v;
}

function asOneOf<T extends string>(
  name: string,
  v: string,
  allowed: readonly T[],
): T {
  const match = allowed.find((a) => a === v);
  if (match !== undefined) return match;
  throw new Error(`Invalid ${name}. Allowed: ${allowed.join(", ")}`);
}

export class Env {
  static load(source: EnvSource = process.env): AppEnv {
    const nodeEnv = asOneOf(
      "NODE_ENV",
      optStr(source, "NODE_ENV") ?? "development",
      ["development", "test", "production"] as const,
    );

    const logLevel = asOneOf(
      "LOG_LEVEL",
      optStr(source, "LOG_LEVEL") ??
        (nodeEnv === "development" ? "debug" : "info"),
      ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const,
    );

    const adminPort =
      optStr(source, "ADMIN_PORT") !== undefined
        ? parsePort(source, "ADMIN_PORT")
        : undefined;

    return Object.freeze({
      nodeEnv,
      host: optStr(source, "KV_HOST") ?? "127.0.0.1",
      port: parsePort(source, "KV_PORT", 6379),
      adminPort,
      maxFrameBytes: parsePositiveInt(
        source,
        "MAX_FRAME_BYTES",
        DEFAULT_MAX_FRAME_BYTES,
      ),
      logLevel,
    });
  }
}
