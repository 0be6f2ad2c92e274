// src/infra/http/errors.ts
export class HttpError extends Error {
  public readonly name = "HttpError";

  constructor(
    public readonly status: number,
    message: string,
    public readonly details?: unknown,
    public readonly cause?: unknown,
  ) {
    super(message);
  }
}

export const notFound = (msg: string, details?: unknown) =>
  new HttpError(404, msg, details);

function statusOf(err: object): number | undefined {
  const raw =
    "statusCode" in err ? err.statusCode : "status" in err ? err.status : null;
  const status = Number(raw);
  return Number.isInteger(status) && status >= 400 && status <= 599
    ? status
    : undefined;
}

/**
 * Normalize any thrown value into an HttpError.
 * Fastify's own errors (unknown route, bad params) carry a statusCode.
 */
export function toHttpError(err: unknown): HttpError {
  if (err instanceof HttpError) return err;

  if (err instanceof Error) {
    const status = statusOf(err);
    if (status !== undefined) {
      return new HttpError(status, err.message || "REQUEST_ERROR", undefined, err);
    }
  }

  return new HttpError(500, "INTERNAL_ERROR", undefined, err);
}
