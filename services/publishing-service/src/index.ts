import { config } from "./config";
import { logger } from "./logger";
import { buildApp } from "./app";
import type { ReadinessCheck } from "./health";
import { closeDb, getDb, migrate } from "./db";
import { kafka } from "./events/kafka";
import { consumer, startConsumer, stopConsumer } from "./events/consumer";
import { producer, startProducer, stopProducer } from "./events/producer";
import { topics } from "./events/topics";
import { DecisionQueue } from "./events/decision-queue";
import { parseDecisionMessage, parseItemMessage } from "./events/messages";
import { startTelemetry, stopTelemetry } from "./telemetry";
import { ApprovalCoordinator } from "./approvals/coordinator";
import { createLedger } from "./ledger/ledger";
import { PublisherGateway } from "./publisher/gateway";
import { HttpPublishCapability } from "./collaborators/http-publisher";
import { HttpSummarizer } from "./collaborators/http-summarizer";
import { KafkaNotifier } from "./collaborators/kafka-notifier";
import { QueuedSource } from "./collaborators/queued-source";
import { Orchestrator } from "./orchestrator/orchestrator";
import { SYSTEM_TRACE_ID } from "./trace/trace";

const decisions = new DecisionQueue();
const source = new QueuedSource();
const ledger = createLedger();
const coordinator = new ApprovalCoordinator({ defaultTtlMs: config.approval.ttlMs });
const gateway = new PublisherGateway({
  capability: new HttpPublishCapability(config.publisherUrl, config.post),
  policy: config.publish,
  logger
});
const orchestrator = new Orchestrator({
  source,
  summarizer: new HttpSummarizer(config.summarizerUrl),
  notifier: new KafkaNotifier(producer, decisions, config.serviceName),
  ledger,
  coordinator,
  gateway,
  logger,
  sweepIntervalMs: config.approval.sweepIntervalMs
});

const readinessChecks: ReadinessCheck[] = [
  {
    name: "kafka",
    check: async () => {
      const admin = kafka.admin();
      await admin.connect();
      await admin.listTopics();
      await admin.disconnect();
    }
  }
];
if (!config.useInMemoryStore) {
  readinessChecks.push({
    name: "db",
    check: async () => {
      await getDb().query("SELECT 1");
    }
  });
}

let app: Awaited<ReturnType<typeof buildApp>> | null = null;

async function start(): Promise<void> {
  await startTelemetry();
  await migrate();
  await startProducer();
  await startConsumer();

  await consumer.subscribe({ topics: [topics.approvalDecided, topics.contentItemDiscovered], fromBeginning: false });
  await consumer.run({
    eachMessage: async ({ topic, message }) => {
      if (!message.value) {
        logger.warn({ topic, traceId: SYSTEM_TRACE_ID }, "Received empty message");
        return;
      }
      const raw = message.value.toString();
      const receivedAt = new Date();

      if (topic === topics.approvalDecided) {
        const parsed = parseDecisionMessage(raw, receivedAt);
        if (!parsed.ok) {
          logger.warn({ topic, error: parsed.error, traceId: SYSTEM_TRACE_ID }, "Rejected malformed decision message");
          return;
        }
        decisions.push(parsed.value);
        return;
      }

      const parsed = parseItemMessage(raw, receivedAt);
      if (!parsed.ok) {
        logger.warn({ topic, error: parsed.error, traceId: SYSTEM_TRACE_ID }, "Rejected malformed item message");
        return;
      }
      source.offer(parsed.value);
      logger.debug({ itemKey: parsed.value.key, queued: source.size(), traceId: SYSTEM_TRACE_ID }, "Item queued for next pass");
    }
  });

  orchestrator.start();

  app = await buildApp({ orchestrator, coordinator, ledger }, readinessChecks);
  await app.listen({ port: config.port, host: "0.0.0.0" });
  logger.info({ port: config.port, traceId: SYSTEM_TRACE_ID }, "Publishing service listening");

  if (config.runPassOnStart) {
    await orchestrator.runPass();
  }
}

async function shutdown(): Promise<void> {
  logger.info({ traceId: SYSTEM_TRACE_ID }, "Shutting down publishing service");
  if (app) {
    await app.close();
  }
  await stopConsumer();
  decisions.close();
  await orchestrator.stop();
  await stopProducer();
  await closeDb();
  await stopTelemetry();
}

process.on("SIGINT", () => void shutdown());
process.on("SIGTERM", () => void shutdown());

start().catch((error) => {
  logger.error({ error, traceId: SYSTEM_TRACE_ID }, "Failed to start publishing service");
  process.exit(1);
});
