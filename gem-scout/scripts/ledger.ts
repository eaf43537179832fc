import { PersistenceError, errorMessage } from "./errors";
import { readJsonFile, writeJsonAtomic } from "./artifacts";
import { identityKey } from "./cache";
import { ProcessedLedgerSchema } from "./schemas";
import type { ProcessedLedger } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

function nowISO(): string {
  return new Date().toISOString();
}

function createEmptyLedger(): ProcessedLedger {
  return {
    version: 1,
    updated_at: nowISO(),
    repos: {},
  };
}

export async function loadLedger(ledgerPath: string): Promise<ProcessedLedger> {
  const raw = await readJsonFile(ledgerPath);
  if (raw === undefined) {
    return createEmptyLedger();
  }
  const parsed = ProcessedLedgerSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PersistenceError(`Invalid ledger format at ${ledgerPath}`, { issues: parsed.error.issues.length });
  }
  return parsed.data;
}

export async function saveLedger(ledgerPath: string, ledger: ProcessedLedger): Promise<void> {
  ledger.updated_at = nowISO();
  try {
    await writeJsonAtomic(ledgerPath, ledger);
  } catch (error) {
    throw new PersistenceError(`Cannot write ledger at ${ledgerPath}: ${errorMessage(error)}`);
  }
}

export function markProcessed(ledger: ProcessedLedger, repoFullNames: string[], missionId: string): ProcessedLedger {
  const processedAt = nowISO();
  for (const fullName of repoFullNames) {
    ledger.repos[identityKey(fullName)] = { processed_at: processedAt, mission_id: missionId };
  }
  return ledger;
}

export function isProcessed(ledger: ProcessedLedger, repoFullName: string): boolean {
  return identityKey(repoFullName) in ledger.repos;
}

/** Drops entries processed more than `days` ago; returns how many were removed. */
export function purgeOlderThan(ledger: ProcessedLedger, days: number, now = Date.now()): number {
  const cutoff = now - days * DAY_MS;
  let removed = 0;
  for (const [key, entry] of Object.entries(ledger.repos)) {
    const processedAt = Date.parse(entry.processed_at);
    if (Number.isNaN(processedAt) || processedAt < cutoff) {
      delete ledger.repos[key];
      removed += 1;
    }
  }
  return removed;
}
