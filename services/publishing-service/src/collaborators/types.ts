import type { ApprovalRequest, InboundDecision } from "../approvals/types";
import type { ContentItem } from "../items";
import type { FailureClassification } from "../publisher/types";

export type Source = {
  /** Lazy and finite per call; safe to call again for the next pass. */
  discover: () => AsyncIterable<ContentItem> | Iterable<ContentItem>;
};

export type Summarizer = {
  summarize: (item: ContentItem) => Promise<string>;
};

export type FailureDiagnostic = {
  requestId: string;
  attempts: number;
  lastError: string;
  classification: FailureClassification;
  diagnosticRef: string | null;
};

export type Notifier = {
  /** Delivers the approval request to a human and returns a delivery id. */
  send: (request: ApprovalRequest) => Promise<string>;
  receiveDecisions: () => AsyncIterable<InboundDecision>;
  notifyFailure: (item: ContentItem, diagnostic: FailureDiagnostic) => Promise<void>;
};

export class SummarizationError extends Error {
  constructor(
    message: string,
    public readonly itemKey: string
  ) {
    super(message);
    this.name = "SummarizationError";
  }
}
