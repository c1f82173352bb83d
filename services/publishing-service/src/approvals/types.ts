import type { ContentItem } from "../items";

export type ApprovalState = "PENDING" | "EDITING" | "APPROVED" | "IGNORED" | "TIMED_OUT";

export type OpenApprovalState = Extract<ApprovalState, "PENDING" | "EDITING">;

export type TerminalApprovalState = Exclude<ApprovalState, OpenApprovalState>;

export type ApprovalRequest = {
  id: string;
  itemKey: string;
  item: ContentItem;
  summary: string;
  state: ApprovalState;
  ttlMs: number;
  createdAt: Date;
  expiresAt: Date;
};

export type ApprovalDecision =
  | { kind: "APPROVE" }
  | { kind: "IGNORE" }
  | { kind: "EDIT_REQUEST" }
  | { kind: "EDIT_SUBMIT"; text: string };

export type ApprovalDecisionKind = ApprovalDecision["kind"];

/** A decision as delivered by a transport, addressed to one request. */
export type InboundDecision = {
  requestId: string;
  decision: ApprovalDecision;
  receivedAt: Date;
};

export type ApprovalResolution = {
  request: ApprovalRequest;
  outcome: TerminalApprovalState;
  resolvedAt: Date;
};

export type CoordinatorErrorCode = "DUPLICATE_REQUEST" | "UNKNOWN_REQUEST" | "INVALID_TRANSITION" | "ALREADY_RESOLVED";

export type RequestResult =
  | { ok: true; request: ApprovalRequest }
  | { ok: false; error: "DUPLICATE_REQUEST"; message: string; existing: ApprovalRequest };

export type DecideFailure =
  | { ok: false; error: "UNKNOWN_REQUEST"; message: string }
  | { ok: false; error: "INVALID_TRANSITION"; message: string; state: ApprovalState }
  | { ok: false; error: "ALREADY_RESOLVED"; message: string; resolution: ApprovalResolution };

export type DecideResult =
  | { ok: true; request: ApprovalRequest; resolution: ApprovalResolution | null }
  | DecideFailure;

export type ApprovalLookup =
  | { status: "OPEN"; request: ApprovalRequest }
  | { status: "RESOLVED"; resolution: ApprovalResolution };
