/**
 * Request logging middleware.
 *
 * Hands one entry per request to the injected log function; main.ts
 * writes it through pino.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CALLER_HEADER } from "./caller.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;

  /** X-Caller as sent, if any */
  readonly caller?: string | undefined;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const caller = c.req.header(CALLER_HEADER);
    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      ...(caller !== undefined ? { caller } : {}),
    });
  };
}
