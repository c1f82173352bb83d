import { Kafka } from "kafkajs";
import { config } from "../config";
import { logger } from "../logger";
import { SYSTEM_TRACE_ID } from "../trace/trace";

export const kafka = new Kafka({ clientId: config.serviceName, brokers: config.brokerBrokers });

const initialDelayMs = 500;
const maxDelayMs = 5000;

export async function connectWithRetry(action: () => Promise<void>, label: string): Promise<void> {
  let delay = initialDelayMs;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    try {
      await action();
      logger.info({ label, traceId: SYSTEM_TRACE_ID }, "Connected to Kafka");
      return;
    } catch (error) {
      logger.warn({ error, label, delay, traceId: SYSTEM_TRACE_ID }, "Kafka connection failed; retrying");
      await new Promise((resolve) => setTimeout(resolve, delay));
      delay = Math.min(delay * 2, maxDelayMs);
    }
  }
}
