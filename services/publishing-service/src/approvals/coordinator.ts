import { randomUUID } from "node:crypto";
import type { ContentItem } from "../items";
import { applyDecision, isOpenState } from "./transitions";
import type {
  ApprovalDecision,
  ApprovalLookup,
  ApprovalRequest,
  ApprovalResolution,
  DecideResult,
  RequestResult,
  TerminalApprovalState
} from "./types";

const DEFAULT_RESOLVED_HISTORY = 10_000;

export type ApprovalCoordinatorOptions = {
  defaultTtlMs: number;
  now?: () => number;
  generateId?: () => string;
  /** How many resolved request ids are remembered to answer late decisions. */
  resolvedHistoryLimit?: number;
};

function snapshot(request: ApprovalRequest): ApprovalRequest {
  return { ...request };
}

/**
 * Owns every open approval request. All operations are synchronous, so a
 * state check and the following update never interleave with another call;
 * a request id can be resolved at most once.
 */
export class ApprovalCoordinator {
  private readonly open = new Map<string, ApprovalRequest>();
  private readonly openByItemKey = new Map<string, string>();
  private readonly resolved = new Map<string, ApprovalResolution>();
  private readonly defaultTtlMs: number;
  private readonly now: () => number;
  private readonly generateId: () => string;
  private readonly resolvedHistoryLimit: number;

  constructor(options: ApprovalCoordinatorOptions) {
    this.defaultTtlMs = options.defaultTtlMs;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? randomUUID;
    this.resolvedHistoryLimit = options.resolvedHistoryLimit ?? DEFAULT_RESOLVED_HISTORY;
  }

  request(item: ContentItem, summary: string, ttlMs: number = this.defaultTtlMs): RequestResult {
    const existingId = this.openByItemKey.get(item.key);
    const existing = existingId ? this.open.get(existingId) : undefined;
    if (existing) {
      return {
        ok: false,
        error: "DUPLICATE_REQUEST",
        message: `Item ${item.key} already has open request ${existing.id}`,
        existing: snapshot(existing)
      };
    }

    const createdAt = this.now();
    const request: ApprovalRequest = {
      id: this.generateId(),
      itemKey: item.key,
      item,
      summary,
      state: "PENDING",
      ttlMs,
      createdAt: new Date(createdAt),
      expiresAt: new Date(createdAt + ttlMs)
    };
    this.open.set(request.id, request);
    this.openByItemKey.set(item.key, request.id);
    return { ok: true, request: snapshot(request) };
  }

  decide(requestId: string, decision: ApprovalDecision): DecideResult {
    const request = this.open.get(requestId);
    if (!request) {
      const resolution = this.resolved.get(requestId);
      if (resolution) {
        return {
          ok: false,
          error: "ALREADY_RESOLVED",
          message: `Request ${requestId} was already resolved as ${resolution.outcome}`,
          resolution
        };
      }
      return { ok: false, error: "UNKNOWN_REQUEST", message: `No approval request with id ${requestId}` };
    }

    if (!isOpenState(request.state)) {
      // Terminal requests leave the open table in the same call that resolves them.
      throw new Error(`Open request ${requestId} is in terminal state ${request.state}`);
    }

    const transition = applyDecision(request.state, decision);
    if (!transition.ok) {
      return {
        ok: false,
        error: "INVALID_TRANSITION",
        message: `${decision.kind} is not allowed while ${request.state}: ${transition.reason}`,
        state: request.state
      };
    }

    const now = this.now();
    if (transition.next === "APPROVED" || transition.next === "IGNORED") {
      const resolution = this.resolve(request, transition.next, now);
      return { ok: true, request: resolution.request, resolution };
    }

    request.state = transition.next;
    if (transition.summary !== null) {
      request.summary = transition.summary;
    }
    if (transition.refreshDeadline) {
      request.expiresAt = new Date(now + request.ttlMs);
    }
    return { ok: true, request: snapshot(request), resolution: null };
  }

  /** Times out every open request whose deadline is at or before `now`. */
  sweepExpired(now: number = this.now()): ApprovalResolution[] {
    const expired = Array.from(this.open.values()).filter((request) => request.expiresAt.getTime() <= now);
    return expired.map((request) => this.resolve(request, "TIMED_OUT", now));
  }

  /**
   * Drops an open request without resolving it, so its item can be offered
   * again. Later decisions for the id are reported as unknown.
   */
  withdraw(requestId: string): ApprovalRequest | null {
    const request = this.open.get(requestId);
    if (!request) {
      return null;
    }
    this.open.delete(requestId);
    this.openByItemKey.delete(request.itemKey);
    return snapshot(request);
  }

  get(requestId: string): ApprovalLookup | null {
    const request = this.open.get(requestId);
    if (request) {
      return { status: "OPEN", request: snapshot(request) };
    }
    const resolution = this.resolved.get(requestId);
    if (resolution) {
      return { status: "RESOLVED", resolution };
    }
    return null;
  }

  listOpen(): ApprovalRequest[] {
    return Array.from(this.open.values())
      .map((request) => snapshot(request))
      .sort((a, b) => a.expiresAt.getTime() - b.expiresAt.getTime() || a.id.localeCompare(b.id));
  }

  hasOpenRequest(itemKey: string): boolean {
    return this.openByItemKey.has(itemKey);
  }

  private resolve(request: ApprovalRequest, outcome: TerminalApprovalState, now: number): ApprovalResolution {
    this.open.delete(request.id);
    this.openByItemKey.delete(request.itemKey);
    const resolution: ApprovalResolution = {
      request: { ...request, state: outcome },
      outcome,
      resolvedAt: new Date(now)
    };
    this.resolved.set(request.id, resolution);
    if (this.resolved.size > this.resolvedHistoryLimit) {
      const oldest = this.resolved.keys().next();
      if (!oldest.done) {
        this.resolved.delete(oldest.value);
      }
    }
    return resolution;
  }
}
