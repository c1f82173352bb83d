import type { FastifyRequest } from "fastify";
import type { Logger } from "pino";
import { v4 as uuidv4 } from "uuid";

export const TRACE_HEADER = "x-trace-id";

/** Trace id for lifecycle work that belongs to no approval request. */
export const SYSTEM_TRACE_ID = "system";

function normalizeHeader(value: string | string[] | undefined): string | undefined {
  if (Array.isArray(value)) {
    return value[0];
  }
  return value;
}

export function ensureTraceId(headers?: Record<string, string | string[] | undefined>): string {
  const candidate = headers ? normalizeHeader(headers[TRACE_HEADER]) : undefined;
  if (candidate && candidate.trim().length > 0) {
    return candidate;
  }
  return uuidv4();
}

export function getTraceIdFromRequest(request: Pick<FastifyRequest, "headers">): string {
  return ensureTraceId(request.headers);
}

/** Item work is traced by its approval request id. */
export function withTraceId(logger: Logger, traceId: string): Logger {
  return logger.child({ traceId });
}
