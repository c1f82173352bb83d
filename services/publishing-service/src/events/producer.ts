import { Producer } from "kafkajs";
import { connectWithRetry, kafka } from "./kafka";

export const producer: Producer = kafka.producer();

export async function startProducer(): Promise<void> {
  await connectWithRetry(() => producer.connect(), "Kafka producer");
}

export async function stopProducer(): Promise<void> {
  await producer.disconnect();
}
