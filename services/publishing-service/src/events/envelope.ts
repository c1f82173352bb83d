import { v4 as uuidv4 } from "uuid";

export type EventEnvelope<T> = {
  id: string;
  type: string;
  source: string;
  time: string;
  subject?: string;
  traceId: string;
  parentSpanId?: string;
  data: T;
};

export function createEnvelope<T>(
  type: string,
  source: string,
  options: { subject: string; traceId: string; data: T }
): EventEnvelope<T> {
  return {
    id: uuidv4(),
    type,
    source,
    time: new Date().toISOString(),
    subject: options.subject,
    traceId: options.traceId,
    data: options.data
  };
}
