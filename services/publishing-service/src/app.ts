import Fastify, { FastifyInstance } from "fastify";
import { registerRoutes } from "./api/routes";
import type { RouteDeps } from "./api/routes";
import { registerHealthRoutes } from "./health";
import type { ReadinessCheck } from "./health";
import { getTraceIdFromRequest, TRACE_HEADER } from "./trace/trace";

export async function buildApp(deps: RouteDeps, checks: ReadinessCheck[] = []): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });
  app.addHook("onRequest", (request, reply, done) => {
    const traceId = getTraceIdFromRequest(request);
    reply.header(TRACE_HEADER, traceId);
    request.headers[TRACE_HEADER] = traceId;
    done();
  });
  await registerHealthRoutes(app, checks);
  await registerRoutes(app, deps);
  return app;
}
