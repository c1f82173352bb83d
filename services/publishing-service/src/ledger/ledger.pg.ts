import type { Pool } from "pg";
import type { Ledger, LedgerWriteResult, ProcessedOutcome, ProcessedRecord } from "./types";

type Queryable = Pick<Pool, "query">;

type ProcessedRow = {
  item_key: string;
  outcome: ProcessedOutcome;
  recorded_at: Date | string;
};

function toDate(value: Date | string): Date {
  if (value instanceof Date) {
    return value;
  }
  return new Date(value);
}

function mapRow(row: ProcessedRow): ProcessedRecord {
  return {
    itemKey: row.item_key,
    outcome: row.outcome,
    recordedAt: toDate(row.recorded_at)
  };
}

export class PostgresLedger implements Ledger {
  constructor(private readonly db: Queryable) {}

  async has(itemKey: string): Promise<boolean> {
    const result = await this.db.query("SELECT 1 FROM processed_items WHERE item_key = $1 LIMIT 1", [itemKey]);
    return result.rows.length > 0;
  }

  async get(itemKey: string): Promise<ProcessedRecord | null> {
    const result = await this.db.query<ProcessedRow>(
      "SELECT item_key, outcome, recorded_at FROM processed_items WHERE item_key = $1",
      [itemKey]
    );
    if (result.rows.length === 0) {
      return null;
    }
    return mapRow(result.rows[0]);
  }

  async record(itemKey: string, outcome: ProcessedOutcome, recordedAt: Date): Promise<LedgerWriteResult> {
    const inserted = await this.db.query<ProcessedRow>(
      "INSERT INTO processed_items (item_key, outcome, recorded_at) VALUES ($1, $2, $3) ON CONFLICT (item_key) DO NOTHING RETURNING item_key, outcome, recorded_at",
      [itemKey, outcome, recordedAt]
    );
    if (inserted.rows.length > 0) {
      return { ok: true, record: mapRow(inserted.rows[0]) };
    }
    const existing = await this.get(itemKey);
    if (!existing) {
      throw new Error(`Ledger insert for ${itemKey} conflicted but no row was found`);
    }
    return { ok: false, error: "ALREADY_RECORDED", existing };
  }

  async list(filters?: { limit?: number }): Promise<ProcessedRecord[]> {
    const limit = filters?.limit ?? 100;
    const result = await this.db.query<ProcessedRow>(
      "SELECT item_key, outcome, recorded_at FROM processed_items ORDER BY recorded_at DESC, item_key ASC LIMIT $1",
      [limit]
    );
    return result.rows.map((row) => mapRow(row));
  }
}
