export type ProcessedOutcome = "POSTED" | "IGNORED" | "TIMED_OUT" | "FAILED";

export type ProcessedRecord = {
  itemKey: string;
  outcome: ProcessedOutcome;
  recordedAt: Date;
};

export type LedgerWriteResult =
  | { ok: true; record: ProcessedRecord }
  | { ok: false; error: "ALREADY_RECORDED"; existing: ProcessedRecord };

/**
 * Durable record of every item that reached a final outcome.
 *
 * `record` resolves only once the row is committed and rejects on storage
 * failures; a rejected write means the item was not recorded.
 */
export type Ledger = {
  has: (itemKey: string) => Promise<boolean>;
  get: (itemKey: string) => Promise<ProcessedRecord | null>;
  record: (itemKey: string, outcome: ProcessedOutcome, recordedAt: Date) => Promise<LedgerWriteResult>;
  list: (filters?: { limit?: number }) => Promise<ProcessedRecord[]>;
};
