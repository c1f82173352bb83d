import type { ContentItem } from "../items";
import type { Logger } from "../logger";
import type { FailureClassification, PublishAttemptResult, PublishCapability, PublishOutcome } from "./types";
import { PermanentPublishError } from "./types";

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export type PublisherGatewayOptions = {
  capability: PublishCapability;
  policy: RetryPolicy;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
};

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function backoffDelay(policy: RetryPolicy, failedAttempt: number): number {
  return Math.min(policy.baseDelayMs * 2 ** (failedAttempt - 1), policy.maxDelayMs);
}

export class PublisherGateway {
  private readonly capability: PublishCapability;
  private readonly policy: RetryPolicy;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: PublisherGatewayOptions) {
    this.capability = options.capability;
    this.policy = { ...options.policy, maxAttempts: Math.max(1, Math.floor(options.policy.maxAttempts)) };
    this.logger = options.logger;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Always resolves with a definite outcome. */
  async publish(item: ContentItem, text: string): Promise<PublishOutcome> {
    let lastError = "";
    let classification: FailureClassification = "TRANSIENT";
    let attempts = 0;

    while (attempts < this.policy.maxAttempts) {
      attempts += 1;
      const result = await this.attempt(item, text);
      if (result.status === "OK") {
        this.logger.info({ itemKey: item.key, attempts }, "Item published");
        return { status: "PUBLISHED", attempts, postRef: result.postRef };
      }

      lastError = result.error;
      if (result.status === "PERMANENT_ERROR") {
        classification = "PERMANENT";
        this.logger.error({ itemKey: item.key, attempts, error: lastError }, "Publish failed permanently");
        break;
      }

      if (attempts < this.policy.maxAttempts) {
        const delay = backoffDelay(this.policy, attempts);
        this.logger.warn({ itemKey: item.key, attempts, delay, error: lastError }, "Publish failed; retrying");
        await this.sleep(delay);
      } else {
        this.logger.error({ itemKey: item.key, attempts, error: lastError }, "Publish retries exhausted");
      }
    }

    const diagnosticRef = await this.captureDiagnostic(item, lastError);
    return { status: "PUBLISH_FAILED", attempts, lastError, classification, diagnosticRef };
  }

  private async attempt(item: ContentItem, text: string): Promise<PublishAttemptResult> {
    try {
      return await this.capability.publish(item, text);
    } catch (error) {
      if (error instanceof PermanentPublishError) {
        return { status: "PERMANENT_ERROR", error: error.message };
      }
      return { status: "TRANSIENT_ERROR", error: describeError(error) };
    }
  }

  private async captureDiagnostic(item: ContentItem, error: string): Promise<string | null> {
    if (!this.capability.captureDiagnostic) {
      return null;
    }
    try {
      return await this.capability.captureDiagnostic(item, error);
    } catch (captureError) {
      this.logger.warn({ itemKey: item.key, error: describeError(captureError) }, "Failed to capture publish diagnostic");
      return null;
    }
  }
}
