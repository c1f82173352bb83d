import type { Ledger, LedgerWriteResult, ProcessedOutcome, ProcessedRecord } from "./types";

function sortRecords(a: ProcessedRecord, b: ProcessedRecord): number {
  const timeDiff = b.recordedAt.getTime() - a.recordedAt.getTime();
  if (timeDiff !== 0) {
    return timeDiff;
  }
  return a.itemKey.localeCompare(b.itemKey);
}

/** Not durable across restarts; used by tests and `USE_INMEMORY_STORE` runs. */
export class InMemoryLedger implements Ledger {
  private readonly records = new Map<string, ProcessedRecord>();

  async has(itemKey: string): Promise<boolean> {
    return this.records.has(itemKey);
  }

  async get(itemKey: string): Promise<ProcessedRecord | null> {
    return this.records.get(itemKey) ?? null;
  }

  async record(itemKey: string, outcome: ProcessedOutcome, recordedAt: Date): Promise<LedgerWriteResult> {
    const existing = this.records.get(itemKey);
    if (existing) {
      return { ok: false, error: "ALREADY_RECORDED", existing };
    }
    const record: ProcessedRecord = { itemKey, outcome, recordedAt };
    this.records.set(itemKey, record);
    return { ok: true, record };
  }

  async list(filters?: { limit?: number }): Promise<ProcessedRecord[]> {
    const limit = filters?.limit ?? 100;
    return Array.from(this.records.values()).sort(sortRecords).slice(0, limit);
  }
}
