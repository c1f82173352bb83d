import { FastifyInstance } from "fastify";
import { z } from "zod";
import type { ApprovalCoordinator } from "../approvals/coordinator";
import type { ApprovalRequest, CoordinatorErrorCode } from "../approvals/types";
import { decisionSchema } from "../events/messages";
import type { Ledger } from "../ledger/types";
import type { Orchestrator } from "../orchestrator/orchestrator";
import { getTraceIdFromRequest } from "../trace/trace";

export type RouteDeps = {
  orchestrator: Orchestrator;
  coordinator: ApprovalCoordinator;
  ledger: Ledger;
};

const requestParamsSchema = z.object({
  requestId: z.string().min(1)
});

const ledgerQuerySchema = z.object({
  key: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().max(500).optional()
});

const errorStatus: Record<CoordinatorErrorCode, number> = {
  DUPLICATE_REQUEST: 409,
  UNKNOWN_REQUEST: 404,
  INVALID_TRANSITION: 409,
  ALREADY_RESOLVED: 409
};

function toApprovalView(request: ApprovalRequest) {
  return {
    requestId: request.id,
    itemKey: request.itemKey,
    title: request.item.title,
    source: request.item.source,
    summary: request.summary,
    state: request.state,
    createdAt: request.createdAt.toISOString(),
    expiresAt: request.expiresAt.toISOString()
  };
}

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  const { orchestrator, coordinator, ledger } = deps;

  app.post("/v1/passes", async () => orchestrator.runPass());

  app.get("/v1/approvals", async () => ({
    approvals: coordinator.listOpen().map((request) => toApprovalView(request))
  }));

  app.get("/v1/approvals/:requestId", async (request, reply) => {
    const { requestId } = requestParamsSchema.parse(request.params);
    const lookup = coordinator.get(requestId);
    if (!lookup) {
      reply.code(404);
      return { message: "Approval request not found", requestId };
    }
    if (lookup.status === "OPEN") {
      return { status: lookup.status, approval: toApprovalView(lookup.request) };
    }
    return {
      status: lookup.status,
      approval: toApprovalView(lookup.resolution.request),
      outcome: lookup.resolution.outcome,
      resolvedAt: lookup.resolution.resolvedAt.toISOString()
    };
  });

  app.post("/v1/approvals/:requestId/decisions", async (request, reply) => {
    const traceId = getTraceIdFromRequest(request);
    const { requestId } = requestParamsSchema.parse(request.params);
    const body = decisionSchema.safeParse(request.body ?? {});
    if (!body.success) {
      reply.code(400);
      return { message: "Invalid decision", issues: body.error.issues, traceId };
    }

    const result = orchestrator.dispatchDecision({ requestId, decision: body.data, receivedAt: new Date() });
    if (!result.ok) {
      reply.code(errorStatus[result.error]);
      return { error: result.error, message: result.message, requestId, traceId };
    }
    return {
      approval: toApprovalView(result.request),
      outcome: result.resolution?.outcome ?? null,
      traceId
    };
  });

  app.get("/v1/ledger", async (request, reply) => {
    const query = ledgerQuerySchema.safeParse(request.query ?? {});
    if (!query.success) {
      reply.code(400);
      return { message: "Invalid ledger query", issues: query.error.issues };
    }
    if (query.data.key) {
      const record = await ledger.get(query.data.key);
      if (!record) {
        reply.code(404);
        return { message: "Item not processed", itemKey: query.data.key };
      }
      return { record };
    }
    return { records: await ledger.list({ limit: query.data.limit }) };
  });
}
