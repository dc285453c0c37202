// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * AuditJournal: an observer that persists every published audit record to
 * an append-only SQLite table. The ledger itself never consults it.
 */

import type Database from "better-sqlite3";
import { z } from "zod";

import { centersOf, type AuditRecord } from "../types.js";
import type { AuditEmitter } from "./emitter.js";

const CREATE_JOURNAL_SQL = `
  CREATE TABLE IF NOT EXISTS audit_journal (
    seq         INTEGER PRIMARY KEY AUTOINCREMENT,
    id          TEXT    NOT NULL UNIQUE,
    kind        TEXT    NOT NULL,
    epoch       INTEGER NOT NULL,
    payload     TEXT    NOT NULL,
    recorded_at TEXT    NOT NULL
  );

  CREATE TABLE IF NOT EXISTS audit_journal_centers (
    seq       INTEGER NOT NULL REFERENCES audit_journal(seq),
    center_id TEXT    NOT NULL,
    PRIMARY KEY (seq, center_id)
  );

  CREATE TRIGGER IF NOT EXISTS audit_journal_no_update
  BEFORE UPDATE ON audit_journal
  BEGIN
    SELECT RAISE(ABORT, 'audit journal is append-only');
  END;

  CREATE TRIGGER IF NOT EXISTS audit_journal_no_delete
  BEFORE DELETE ON audit_journal
  BEGIN
    SELECT RAISE(ABORT, 'audit journal is append-only');
  END;
`;

const base = {
  id: z.string(),
  epoch: z.number().int(),
  amount: z.number().int().positive(),
};

const AuditRecordSchema = z.discriminatedUnion("kind", [
  z.object({ ...base, kind: z.literal("DonationReceived"), centerId: z.string(), donor: z.string() }),
  z.object({
    ...base,
    kind: z.literal("TokensMinted"),
    centerId: z.string(),
    recipient: z.string(),
    creditId: z.string(),
  }),
  z.object({
    ...base,
    kind: z.literal("FundsTransferred"),
    fromCenterId: z.string(),
    toCenterId: z.string(),
    actor: z.string(),
  }),
  z.object({
    ...base,
    kind: z.literal("FundsWithdrawn"),
    centerId: z.string(),
    actor: z.string(),
    recipient: z.string(),
  }),
]);

export interface JournalEntry {
  seq: number;
  recordedAt: string;
  record: AuditRecord;
}

interface JournalRow {
  seq: number;
  payload: string;
  recorded_at: string;
}

function toEntry(row: JournalRow): JournalEntry {
  return {
    seq: row.seq,
    recordedAt: row.recorded_at,
    record: Object.freeze(AuditRecordSchema.parse(JSON.parse(row.payload))),
  };
}

export class AuditJournal {
  private detach: (() => void) | null = null;

  constructor(private readonly db: Database.Database) {
    this.db.exec(CREATE_JOURNAL_SQL);
  }

  /** Start journaling everything `emitter` publishes. Attaching twice is a no-op. */
  attach(emitter: AuditEmitter): void {
    if (this.detach) return;
    this.detach = emitter.subscribe((record) => this.append(record));
  }

  stop(): void {
    this.detach?.();
    this.detach = null;
  }

  // Append-only: the triggers above reject UPDATE and DELETE
  append(record: AuditRecord): number {
    return this.db.transaction(() => {
      const info = this.db
        .prepare<{ id: string; kind: string; epoch: number; payload: string; recordedAt: string }>(
          `INSERT INTO audit_journal (id, kind, epoch, payload, recorded_at)
           VALUES (@id, @kind, @epoch, @payload, @recordedAt)`,
        )
        .run({
          id: record.id,
          kind: record.kind,
          epoch: record.epoch,
          payload: JSON.stringify(record),
          recordedAt: new Date().toISOString(),
        });

      const seq = Number(info.lastInsertRowid);
      const link = this.db.prepare<[number, string]>(
        `INSERT INTO audit_journal_centers (seq, center_id) VALUES (?, ?)`,
      );
      for (const centerId of centersOf(record)) {
        link.run(seq, centerId);
      }
      return seq;
    })();
  }

  entries(limit: number = 100): JournalEntry[] {
    return this.db
      .prepare<[number], JournalRow>(
        `SELECT seq, payload, recorded_at FROM audit_journal ORDER BY seq ASC LIMIT ?`,
      )
      .all(limit)
      .map(toEntry);
  }

  forCenter(centerId: string, limit: number = 100): JournalEntry[] {
    return this.db
      .prepare<[string, number], JournalRow>(
        `SELECT j.seq, j.payload, j.recorded_at
           FROM audit_journal j
           JOIN audit_journal_centers c ON c.seq = j.seq
          WHERE c.center_id = ?
          ORDER BY j.seq ASC
          LIMIT ?`,
      )
      .all(centerId, limit)
      .map(toEntry);
  }
}
