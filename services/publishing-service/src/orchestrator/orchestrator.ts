import type { ApprovalCoordinator } from "../approvals/coordinator";
import type { ApprovalResolution, DecideResult, InboundDecision } from "../approvals/types";
import { SummarizationError } from "../collaborators/types";
import type { Notifier, Source, Summarizer } from "../collaborators/types";
import type { ContentItem } from "../items";
import type { Ledger, ProcessedOutcome } from "../ledger/types";
import type { Logger } from "../logger";
import type { PublisherGateway } from "../publisher/gateway";
import { SYSTEM_TRACE_ID, withTraceId } from "../trace/trace";

export type OrchestratorDeps = {
  source: Source;
  summarizer: Summarizer;
  notifier: Notifier;
  ledger: Ledger;
  coordinator: ApprovalCoordinator;
  gateway: PublisherGateway;
  logger: Logger;
  sweepIntervalMs: number;
  now?: () => number;
};

export type SkipReason =
  | "ALREADY_PROCESSED"
  | "IN_FLIGHT"
  | "SUMMARIZATION_FAILED"
  | "REQUEST_REJECTED"
  | "NOTIFICATION_FAILED"
  | "ERROR";

export type PassSummary = {
  discovered: number;
  requested: Array<{ itemKey: string; requestId: string }>;
  skipped: Array<{ itemKey: string; reason: SkipReason }>;
  discoveryError: string | null;
};

type OfferResult = { requested: true; requestId: string } | { requested: false; reason: SkipReason };

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Drives items from discovery to a ledger record. Decisions and expiry
 * sweeps are applied synchronously on the coordinator; everything after a
 * terminal state (publishing, recording) runs as a separate task per item.
 */
export class Orchestrator {
  private readonly settling = new Map<string, Promise<void>>();
  // Keys between their first dedup check and an open request.
  private readonly offering = new Set<string>();
  private readonly now: () => number;
  private sweepTimer: NodeJS.Timeout | null = null;
  private decisionLoop: Promise<void> | null = null;
  private running = false;

  constructor(private readonly deps: OrchestratorDeps) {
    this.now = deps.now ?? Date.now;
  }

  async runPass(): Promise<PassSummary> {
    const summary: PassSummary = { discovered: 0, requested: [], skipped: [], discoveryError: null };
    const { logger } = this.deps;
    logger.info({ traceId: SYSTEM_TRACE_ID }, "Discovery pass started");

    try {
      for await (const item of this.deps.source.discover()) {
        summary.discovered += 1;
        const result = await this.offerItem(item);
        if (result.requested) {
          summary.requested.push({ itemKey: item.key, requestId: result.requestId });
        } else {
          summary.skipped.push({ itemKey: item.key, reason: result.reason });
        }
      }
    } catch (error) {
      summary.discoveryError = describeError(error);
      logger.error({ error, traceId: SYSTEM_TRACE_ID }, "Discovery failed; pass ended early");
    }

    logger.info(
      {
        traceId: SYSTEM_TRACE_ID,
        discovered: summary.discovered,
        requested: summary.requested.length,
        skipped: summary.skipped.length
      },
      "Discovery pass finished"
    );
    return summary;
  }

  dispatchDecision(inbound: InboundDecision): DecideResult {
    const log = withTraceId(this.deps.logger, inbound.requestId);
    const result = this.deps.coordinator.decide(inbound.requestId, inbound.decision);
    if (!result.ok) {
      log.warn(
        { error: result.error, kind: inbound.decision.kind, receivedAt: inbound.receivedAt.toISOString() },
        result.message
      );
      return result;
    }

    log.info({ itemKey: result.request.itemKey, kind: inbound.decision.kind, state: result.request.state }, "Decision applied");
    if (result.resolution) {
      this.settle(result.resolution);
    }
    return result;
  }

  sweep(now: number = this.now()): ApprovalResolution[] {
    const expired = this.deps.coordinator.sweepExpired(now);
    for (const resolution of expired) {
      withTraceId(this.deps.logger, resolution.request.id).info(
        { itemKey: resolution.request.itemKey, expiresAt: resolution.request.expiresAt.toISOString() },
        "Approval request timed out"
      );
      this.settle(resolution);
    }
    return expired;
  }

  /** Starts the decision dispatch loop and the expiry sweep timer. */
  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.sweepTimer = setInterval(() => {
      try {
        this.sweep();
      } catch (error) {
        this.deps.logger.error({ error, traceId: SYSTEM_TRACE_ID }, "Approval sweep failed");
      }
    }, this.deps.sweepIntervalMs);
    this.decisionLoop = this.consumeDecisions();
  }

  /**
   * Stops the sweep timer, then waits for the decision stream to end and for
   * in-flight publishes to finish. The owner of the stream closes it.
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    if (this.decisionLoop) {
      await this.decisionLoop;
      this.decisionLoop = null;
    }
    await this.whenIdle();
  }

  async whenIdle(): Promise<void> {
    while (this.settling.size > 0) {
      await Promise.all(Array.from(this.settling.values()));
    }
  }

  /**
   * One pass followed by sweeps until every request it issued is resolved
   * and recorded. Decisions must be flowing, i.e. `start()` was called.
   */
  async runUntilSettled(options?: { pollIntervalMs?: number; sleep?: (ms: number) => Promise<void> }): Promise<PassSummary> {
    const pollIntervalMs = options?.pollIntervalMs ?? 1000;
    const sleep = options?.sleep ?? ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)));
    const summary = await this.runPass();
    const isOpen = (requestId: string) => this.deps.coordinator.get(requestId)?.status === "OPEN";

    while (summary.requested.some(({ requestId }) => isOpen(requestId))) {
      await sleep(pollIntervalMs);
      this.sweep();
    }
    await this.whenIdle();
    return summary;
  }

  isSettling(itemKey: string): boolean {
    return this.settling.has(itemKey);
  }

  isOffering(itemKey: string): boolean {
    return this.offering.has(itemKey);
  }

  private async offerItem(item: ContentItem): Promise<OfferResult> {
    if (this.isInFlight(item.key)) {
      return { requested: false, reason: "IN_FLIGHT" };
    }
    this.offering.add(item.key);
    try {
      return await this.offerReserved(item);
    } finally {
      this.offering.delete(item.key);
    }
  }

  private isInFlight(itemKey: string): boolean {
    return this.deps.coordinator.hasOpenRequest(itemKey) || this.settling.has(itemKey) || this.offering.has(itemKey);
  }

  private async offerReserved(item: ContentItem): Promise<OfferResult> {
    const { coordinator, ledger, logger, notifier, summarizer } = this.deps;
    try {
      if (await ledger.has(item.key)) {
        logger.debug({ itemKey: item.key, traceId: SYSTEM_TRACE_ID }, "Item already processed");
        return { requested: false, reason: "ALREADY_PROCESSED" };
      }

      let summary: string;
      try {
        summary = await summarizer.summarize(item);
      } catch (error) {
        const level = error instanceof SummarizationError ? "warn" : "error";
        logger[level]({ error, itemKey: item.key, traceId: SYSTEM_TRACE_ID }, "Summarization failed; item left for next pass");
        return { requested: false, reason: "SUMMARIZATION_FAILED" };
      }

      if (await ledger.has(item.key)) {
        logger.info({ itemKey: item.key, traceId: SYSTEM_TRACE_ID }, "Item recorded while summarizing; not requested");
        return { requested: false, reason: "ALREADY_PROCESSED" };
      }

      const requested = coordinator.request(item, summary);
      if (!requested.ok) {
        logger.error(
          { error: requested.error, itemKey: item.key, existingRequestId: requested.existing.id, traceId: SYSTEM_TRACE_ID },
          requested.message
        );
        return { requested: false, reason: "REQUEST_REJECTED" };
      }

      const { request } = requested;
      const log = withTraceId(logger, request.id);
      try {
        const deliveryId = await notifier.send(request);
        log.info({ itemKey: item.key, deliveryId, expiresAt: request.expiresAt.toISOString() }, "Approval requested");
      } catch (error) {
        coordinator.withdraw(request.id);
        log.error({ error, itemKey: item.key }, "Approval notice not delivered; request withdrawn");
        return { requested: false, reason: "NOTIFICATION_FAILED" };
      }
      return { requested: true, requestId: request.id };
    } catch (error) {
      logger.error({ error, itemKey: item.key, traceId: SYSTEM_TRACE_ID }, "Failed to offer item");
      return { requested: false, reason: "ERROR" };
    }
  }

  private async consumeDecisions(): Promise<void> {
    try {
      for await (const inbound of this.deps.notifier.receiveDecisions()) {
        this.dispatchDecision(inbound);
        if (!this.running) {
          break;
        }
      }
    } catch (error) {
      this.deps.logger.error({ error, traceId: SYSTEM_TRACE_ID }, "Decision stream failed");
    }
  }

  private settle(resolution: ApprovalResolution): void {
    const { itemKey, id } = resolution.request;
    const task = this.finalize(resolution)
      .catch((error: unknown) => {
        withTraceId(this.deps.logger, id).error({ error, itemKey }, "Failed to settle approval request");
      })
      .finally(() => {
        this.settling.delete(itemKey);
      });
    this.settling.set(itemKey, task);
  }

  private async finalize(resolution: ApprovalResolution): Promise<void> {
    const { request } = resolution;
    const log = withTraceId(this.deps.logger, request.id);

    if (resolution.outcome === "IGNORED" || resolution.outcome === "TIMED_OUT") {
      await this.record(request.itemKey, resolution.outcome, log);
      return;
    }

    const outcome = await this.deps.gateway.publish(request.item, request.summary);
    if (outcome.status === "PUBLISHED") {
      await this.record(request.itemKey, "POSTED", log);
      return;
    }

    await this.record(request.itemKey, "FAILED", log);
    try {
      await this.deps.notifier.notifyFailure(request.item, {
        requestId: request.id,
        attempts: outcome.attempts,
        lastError: outcome.lastError,
        classification: outcome.classification,
        diagnosticRef: outcome.diagnosticRef
      });
    } catch (error) {
      log.error({ error, itemKey: request.itemKey, lastError: outcome.lastError }, "Failed to report publish failure");
    }
  }

  // A failed write leaves the item unrecorded and the next pass offers it
  // again, so a published item may be posted a second time.
  private async record(itemKey: string, outcome: ProcessedOutcome, log: Logger): Promise<void> {
    try {
      const result = await this.deps.ledger.record(itemKey, outcome, new Date(this.now()));
      if (!result.ok) {
        log.info({ itemKey, outcome, recordedOutcome: result.existing.outcome }, "Item already recorded");
        return;
      }
      log.info({ itemKey, outcome }, "Item outcome recorded");
    } catch (error) {
      log.error({ error, itemKey, outcome }, "Ledger write failed; item will be offered again next pass");
    }
  }
}
