import type { ApprovalDecision, ApprovalState, OpenApprovalState } from "./types";

export type Transition =
  | { ok: true; next: ApprovalState; summary: string | null; refreshDeadline: boolean }
  | { ok: false; reason: string };

export function isOpenState(state: ApprovalState): state is OpenApprovalState {
  return state === "PENDING" || state === "EDITING";
}

/**
 * PENDING -> APPROVED | EDITING | IGNORED
 * EDITING -> APPROVED | PENDING (edit submitted) | IGNORED
 * TIMED_OUT is reached only through expiry, never through a decision.
 */
export function applyDecision(current: OpenApprovalState, decision: ApprovalDecision): Transition {
  switch (decision.kind) {
    case "APPROVE":
      return { ok: true, next: "APPROVED", summary: null, refreshDeadline: false };
    case "IGNORE":
      return { ok: true, next: "IGNORED", summary: null, refreshDeadline: false };
    case "EDIT_REQUEST":
      if (current !== "PENDING") {
        return { ok: false, reason: "An edit is already in progress" };
      }
      return { ok: true, next: "EDITING", summary: null, refreshDeadline: true };
    case "EDIT_SUBMIT":
      if (current !== "EDITING") {
        return { ok: false, reason: "No edit was requested" };
      }
      if (decision.text.trim().length === 0) {
        return { ok: false, reason: "Edited summary is empty" };
      }
      return { ok: true, next: "PENDING", summary: decision.text, refreshDeadline: true };
  }
}
