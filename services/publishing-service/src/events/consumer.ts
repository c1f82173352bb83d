import { Consumer } from "kafkajs";
import { connectWithRetry, kafka } from "./kafka";

export const consumer: Consumer = kafka.consumer({ groupId: "publishing-service-group" });

export async function startConsumer(): Promise<void> {
  await connectWithRetry(() => consumer.connect(), "Kafka consumer");
}

export async function stopConsumer(): Promise<void> {
  await consumer.disconnect();
}
