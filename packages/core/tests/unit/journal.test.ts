// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type Database from "better-sqlite3";
import { AuditEmitter } from "../../src/audit/emitter.js";
import { AuditJournal } from "../../src/audit/journal.js";
import { IN_MEMORY, openDatabase } from "../../src/store/database.js";
import type { AuditRecord } from "../../src/types.js";

const donation: AuditRecord = {
  kind: "DonationReceived",
  id: "r1",
  epoch: 4,
  centerId: "center-a",
  donor: "donor-d",
  amount: 100,
};

const transfer: AuditRecord = {
  kind: "FundsTransferred",
  id: "r2",
  epoch: 5,
  fromCenterId: "center-a",
  toCenterId: "center-b",
  actor: "ops",
  amount: 40,
};

describe("AuditJournal", () => {
  let db: Database.Database;
  let journal: AuditJournal;

  beforeEach(() => {
    db = openDatabase(IN_MEMORY);
    journal = new AuditJournal(db);
  });

  afterEach(() => {
    db.close();
  });

  it("journals what the emitter publishes, in order", () => {
    const emitter = new AuditEmitter();
    journal.attach(emitter);

    emitter.publish([donation, transfer]);

    const entries = journal.entries();
    expect(entries.map((e) => e.seq)).toEqual([1, 2]);
    expect(entries.map((e) => e.record)).toEqual([donation, transfer]);
  });

  it("attaching twice still journals each record once", () => {
    const emitter = new AuditEmitter();
    journal.attach(emitter);
    journal.attach(emitter);

    emitter.publish([donation]);

    expect(journal.entries()).toHaveLength(1);
  });

  it("stops journaling once stopped", () => {
    const emitter = new AuditEmitter();
    journal.attach(emitter);
    journal.stop();

    emitter.publish([donation]);

    expect(journal.entries()).toEqual([]);
  });

  it("indexes transfers under both centers", () => {
    journal.append(donation);
    journal.append(transfer);

    expect(journal.forCenter("center-a").map((e) => e.record.id)).toEqual(["r1", "r2"]);
    expect(journal.forCenter("center-b").map((e) => e.record.id)).toEqual(["r2"]);
    expect(journal.forCenter("center-c")).toEqual([]);
  });

  it("rejects updates and deletes", () => {
    journal.append(donation);

    expect(() => db.prepare(`UPDATE audit_journal SET epoch = 0`).run()).toThrow(/append-only/);
    expect(() => db.prepare(`DELETE FROM audit_journal`).run()).toThrow(/append-only/);
    expect(journal.entries()).toHaveLength(1);
  });

  it("hands back frozen records", () => {
    journal.append(donation);
    expect(Object.isFrozen(journal.entries()[0]?.record)).toBe(true);
  });
});
