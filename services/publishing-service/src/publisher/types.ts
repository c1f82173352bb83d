import type { ContentItem } from "../items";

export type PublishAttemptResult =
  | { status: "OK"; postRef: string | null }
  | { status: "TRANSIENT_ERROR"; error: string }
  | { status: "PERMANENT_ERROR"; error: string };

export type FailureClassification = "TRANSIENT" | "PERMANENT";

/** The side-effecting publish step behind the gateway. */
export type PublishCapability = {
  publish: (item: ContentItem, text: string) => Promise<PublishAttemptResult>;
  /** Returns a reference to a captured failure snapshot, if the capability can take one. */
  captureDiagnostic?: (item: ContentItem, error: string) => Promise<string | null>;
};

export type PublishOutcome =
  | { status: "PUBLISHED"; attempts: number; postRef: string | null }
  | {
      status: "PUBLISH_FAILED";
      attempts: number;
      lastError: string;
      classification: FailureClassification;
      diagnosticRef: string | null;
    };

export class PermanentPublishError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PermanentPublishError";
  }
}
