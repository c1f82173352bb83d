import type { Producer } from "kafkajs";
import type { ApprovalRequest, InboundDecision } from "../approvals/types";
import type { DecisionQueue } from "../events/decision-queue";
import { createEnvelope } from "../events/envelope";
import { topics } from "../events/topics";
import type { ContentItem } from "../items";
import type { FailureDiagnostic, Notifier } from "./types";

export type ApprovalRequestedPayload = {
  requestId: string;
  itemKey: string;
  title: string;
  source: string;
  summary: string;
  state: ApprovalRequest["state"];
  expiresAt: string;
};

export type PublishFailedPayload = FailureDiagnostic & {
  itemKey: string;
  title: string;
};

/**
 * Approval notices and failure reports go out on Kafka for the chat bridge to
 * render. Decisions come back through the decision queue that the
 * `approval.decided` consumer fills.
 */
export class KafkaNotifier implements Notifier {
  constructor(
    private readonly producer: Pick<Producer, "send">,
    private readonly decisions: DecisionQueue,
    private readonly serviceName: string
  ) {}

  async send(request: ApprovalRequest): Promise<string> {
    const event = createEnvelope<ApprovalRequestedPayload>(topics.approvalRequested, this.serviceName, {
      subject: request.itemKey,
      traceId: request.id,
      data: {
        requestId: request.id,
        itemKey: request.itemKey,
        title: request.item.title,
        source: request.item.source,
        summary: request.summary,
        state: request.state,
        expiresAt: request.expiresAt.toISOString()
      }
    });
    await this.producer.send({
      topic: topics.approvalRequested,
      messages: [{ key: request.itemKey, value: JSON.stringify(event) }]
    });
    return event.id;
  }

  receiveDecisions(): AsyncIterable<InboundDecision> {
    return this.decisions;
  }

  async notifyFailure(item: ContentItem, diagnostic: FailureDiagnostic): Promise<void> {
    const event = createEnvelope<PublishFailedPayload>(topics.publishFailed, this.serviceName, {
      subject: item.key,
      traceId: diagnostic.requestId,
      data: { ...diagnostic, itemKey: item.key, title: item.title }
    });
    await this.producer.send({
      topic: topics.publishFailed,
      messages: [{ key: item.key, value: JSON.stringify(event) }]
    });
  }
}
