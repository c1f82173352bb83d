import pino from "pino";
import { ApprovalCoordinator } from "../src/approvals/coordinator";
import type { ApprovalRequest, InboundDecision } from "../src/approvals/types";
import { StaticSource } from "../src/collaborators/static-source";
import { SummarizationError } from "../src/collaborators/types";
import type { FailureDiagnostic, Notifier, Source, Summarizer } from "../src/collaborators/types";
import { DecisionQueue } from "../src/events/decision-queue";
import type { ContentItem } from "../src/items";
import { InMemoryLedger } from "../src/ledger/ledger.memory";
import type { Ledger } from "../src/ledger/types";
import { Orchestrator } from "../src/orchestrator/orchestrator";
import { PublisherGateway } from "../src/publisher/gateway";
import type { PublishAttemptResult, PublishCapability } from "../src/publisher/types";

export const silentLogger = pino({ level: "silent" });

export function makeItem(key: string, overrides?: Partial<ContentItem>): ContentItem {
  return {
    key,
    title: `Title ${key}`,
    source: "test-feed",
    contentRef: `ref:${key}`,
    discoveredAt: new Date(0),
    ...overrides
  };
}

export function createClock(start = 0) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
    set: (value: number) => {
      current = value;
    }
  };
}

export function sequentialIds(prefix = "req") {
  let counter = 0;
  return () => {
    counter += 1;
    return `${prefix}-${counter}`;
  };
}

export class FakeSummarizer implements Summarizer {
  readonly calls: string[] = [];
  readonly failing = new Set<string>();

  async summarize(item: ContentItem): Promise<string> {
    this.calls.push(item.key);
    if (this.failing.has(item.key)) {
      throw new SummarizationError("model unavailable", item.key);
    }
    return `Summary of ${item.title}`;
  }
}

export class FakeNotifier implements Notifier {
  readonly sent: ApprovalRequest[] = [];
  readonly failures: Array<{ item: ContentItem; diagnostic: FailureDiagnostic }> = [];
  readonly decisions = new DecisionQueue();
  failSend = false;

  async send(request: ApprovalRequest): Promise<string> {
    if (this.failSend) {
      throw new Error("chat bridge offline");
    }
    this.sent.push(request);
    return `delivery-${this.sent.length}`;
  }

  receiveDecisions(): AsyncIterable<InboundDecision> {
    return this.decisions;
  }

  async notifyFailure(item: ContentItem, diagnostic: FailureDiagnostic): Promise<void> {
    this.failures.push({ item, diagnostic });
  }
}

/** Plays back queued attempt results, then succeeds. */
export class ScriptedCapability implements PublishCapability {
  readonly published: Array<{ key: string; text: string }> = [];
  readonly script: PublishAttemptResult[] = [];

  async publish(item: ContentItem, text: string): Promise<PublishAttemptResult> {
    this.published.push({ key: item.key, text });
    return this.script.shift() ?? { status: "OK", postRef: `post-${item.key}` };
  }

  async captureDiagnostic(item: ContentItem): Promise<string | null> {
    return `snapshot-${item.key}`;
  }
}

export class FlakyLedger extends InMemoryLedger {
  failNextWrite = false;

  async record(...args: Parameters<InMemoryLedger["record"]>) {
    if (this.failNextWrite) {
      this.failNextWrite = false;
      throw new Error("connection reset");
    }
    return super.record(...args);
  }
}

export function buildHarness(options?: { items?: ContentItem[]; source?: Source; ttlMs?: number; ledger?: Ledger }) {
  const clock = createClock();
  const ledger = options?.ledger ?? new InMemoryLedger();
  const summarizer = new FakeSummarizer();
  const notifier = new FakeNotifier();
  const capability = new ScriptedCapability();
  const coordinator = new ApprovalCoordinator({
    defaultTtlMs: options?.ttlMs ?? 1000,
    now: clock.now,
    generateId: sequentialIds()
  });
  const gateway = new PublisherGateway({
    capability,
    policy: { maxAttempts: 3, baseDelayMs: 10, maxDelayMs: 100 },
    logger: silentLogger,
    sleep: async () => undefined
  });
  const orchestrator = new Orchestrator({
    source: options?.source ?? new StaticSource(options?.items ?? []),
    summarizer,
    notifier,
    ledger,
    coordinator,
    gateway,
    logger: silentLogger,
    sweepIntervalMs: 60_000,
    now: clock.now
  });
  return { clock, ledger, summarizer, notifier, capability, coordinator, gateway, orchestrator };
}
