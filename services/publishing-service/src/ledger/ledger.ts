import { config } from "../config";
import { getDb } from "../db";
import { InMemoryLedger } from "./ledger.memory";
import { PostgresLedger } from "./ledger.pg";
import type { Ledger } from "./types";

// No memory fallback here: a fallback write would be acknowledged without being durable.
export function createLedger(): Ledger {
  if (config.useInMemoryStore) {
    return new InMemoryLedger();
  }
  return new PostgresLedger(getDb());
}
