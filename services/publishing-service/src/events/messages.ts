import { z } from "zod";
import type { InboundDecision } from "../approvals/types";
import type { ContentItem } from "../items";

export const decisionSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("APPROVE") }),
  z.object({ kind: z.literal("IGNORE") }),
  z.object({ kind: z.literal("EDIT_REQUEST") }),
  z.object({ kind: z.literal("EDIT_SUBMIT"), text: z.string().min(1) })
]);

const decisionEnvelopeSchema = z.object({
  id: z.string().min(1),
  type: z.string(),
  time: z.string().datetime().optional(),
  traceId: z.string().optional(),
  data: z.object({
    requestId: z.string().min(1),
    decision: decisionSchema
  })
});

const itemEnvelopeSchema = z.object({
  id: z.string().min(1),
  type: z.string(),
  traceId: z.string().optional(),
  data: z.object({
    key: z.string().min(1),
    title: z.string().min(1),
    source: z.string().min(1),
    contentRef: z.string().default(""),
    discoveredAt: z.string().datetime().optional()
  })
});

export type ParsedMessage<T> = { ok: true; value: T } | { ok: false; error: string };

function parseJson(raw: string): ParsedMessage<unknown> {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : "Invalid JSON" };
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

export function parseDecisionMessage(raw: string, receivedAt: Date): ParsedMessage<InboundDecision> {
  const json = parseJson(raw);
  if (!json.ok) {
    return json;
  }
  const parsed = decisionEnvelopeSchema.safeParse(json.value);
  if (!parsed.success) {
    return { ok: false, error: describeIssues(parsed.error) };
  }
  return {
    ok: true,
    value: { requestId: parsed.data.data.requestId, decision: parsed.data.data.decision, receivedAt }
  };
}

export function parseItemMessage(raw: string, receivedAt: Date): ParsedMessage<ContentItem> {
  const json = parseJson(raw);
  if (!json.ok) {
    return json;
  }
  const parsed = itemEnvelopeSchema.safeParse(json.value);
  if (!parsed.success) {
    return { ok: false, error: describeIssues(parsed.error) };
  }
  const { data } = parsed.data;
  return {
    ok: true,
    value: {
      key: data.key,
      title: data.title,
      source: data.source,
      contentRef: data.contentRef,
      discoveredAt: data.discoveredAt ? new Date(data.discoveredAt) : receivedAt
    }
  };
}
