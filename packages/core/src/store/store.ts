// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * LedgerStore: Center records, their capabilities and the credits issued
 * against them, persisted in SQLite via better-sqlite3.
 *
 * The store holds data and nothing else: it never checks authorization or
 * amounts. The issuer and the transfer engine validate before they write,
 * and run their writes through `transaction()` so a throw rolls them back.
 */

import type Database from "better-sqlite3";
import { randomUUID } from "crypto";

import { CenterNotFoundError } from "../exceptions.js";
import type { AuthorizationCapability, Center, ContributionCredit } from "../types.js";

const CREATE_SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS centers (
    id                  TEXT    PRIMARY KEY,
    name                TEXT    NOT NULL,
    balance             INTEGER NOT NULL DEFAULT 0 CHECK (balance >= 0),
    total_contributions INTEGER NOT NULL DEFAULT 0 CHECK (total_contributions >= 0),
    token_supply        INTEGER NOT NULL DEFAULT 0 CHECK (token_supply >= 0),
    created_at          TEXT    NOT NULL
  );

  CREATE TABLE IF NOT EXISTS capabilities (
    id        TEXT PRIMARY KEY,
    center_id TEXT NOT NULL UNIQUE REFERENCES centers(id)
  );

  CREATE TABLE IF NOT EXISTS credits (
    id        TEXT    PRIMARY KEY,
    seq       INTEGER NOT NULL,
    center_id TEXT    NOT NULL REFERENCES centers(id),
    owner     TEXT    NOT NULL,
    quantity  INTEGER NOT NULL CHECK (quantity > 0),
    epoch     INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_credits_owner ON credits(owner, seq);
  CREATE INDEX IF NOT EXISTS idx_credits_center ON credits(center_id, seq);
`;

interface CenterRow {
  id: string;
  name: string;
  balance: number;
  total_contributions: number;
  token_supply: number;
  created_at: string;
}

interface CapabilityRow {
  id: string;
  center_id: string;
}

interface CreditRow {
  id: string;
  center_id: string;
  owner: string;
  quantity: number;
  epoch: number;
}

export interface NegativeBalanceRow {
  id: string;
  balance: number;
}

export interface SupplyMismatchRow {
  id: string;
  tokenSupply: number;
  totalContributions: number;
  issued: number;
}

export interface CreatedCenter {
  center: Center;
  capability: AuthorizationCapability;
}

function toCenter(row: CenterRow): Center {
  return {
    id: row.id,
    name: row.name,
    balance: row.balance,
    totalContributions: row.total_contributions,
    tokenSupply: row.token_supply,
    createdAt: row.created_at,
  };
}

function toCredit(row: CreditRow): ContributionCredit {
  return {
    id: row.id,
    centerId: row.center_id,
    owner: row.owner,
    quantity: row.quantity,
    epoch: row.epoch,
  };
}

export class LedgerStore {
  constructor(private readonly db: Database.Database) {
    this.db.exec(CREATE_SCHEMA_SQL);
  }

  /** Run `fn` as one SQLite transaction. Nested calls become savepoints. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  /** New center with zeroed counters and its one and only capability. */
  createCenter(name: string): CreatedCenter {
    const center: Center = {
      id: randomUUID(),
      name,
      balance: 0,
      totalContributions: 0,
      tokenSupply: 0,
      createdAt: new Date().toISOString(),
    };
    const capability: AuthorizationCapability = Object.freeze({
      id: `cap_${randomUUID()}`,
      centerId: center.id,
    });

    this.transaction(() => {
      this.db
        .prepare<[string, string, string]>(
          `INSERT INTO centers (id, name, created_at) VALUES (?, ?, ?)`,
        )
        .run(center.id, center.name, center.createdAt);
      this.db
        .prepare<[string, string]>(`INSERT INTO capabilities (id, center_id) VALUES (?, ?)`)
        .run(capability.id, capability.centerId);
    });

    return { center, capability };
  }

  getCenter(centerId: string): Center | null {
    const row = this.db
      .prepare<[string], CenterRow>(`SELECT * FROM centers WHERE id = ?`)
      .get(centerId);
    return row ? toCenter(row) : null;
  }

  requireCenter(centerId: string): Center {
    const center = this.getCenter(centerId);
    if (!center) {
      throw new CenterNotFoundError(centerId);
    }
    return center;
  }

  listCenters(): Center[] {
    return this.db
      .prepare<[], CenterRow>(`SELECT * FROM centers ORDER BY created_at ASC, rowid ASC`)
      .all()
      .map(toCenter);
  }

  balanceOf(centerId: string): number {
    return this.requireCenter(centerId).balance;
  }

  totalContributions(centerId: string): number {
    return this.requireCenter(centerId).totalContributions;
  }

  tokenSupply(centerId: string): number {
    return this.requireCenter(centerId).tokenSupply;
  }

  /** Write back the mutable counters of a center fetched earlier in the same transaction. */
  saveCenter(center: Center): void {
    const info = this.db
      .prepare<{ id: string; balance: number; totalContributions: number; tokenSupply: number }>(
        `UPDATE centers
            SET balance = @balance,
                total_contributions = @totalContributions,
                token_supply = @tokenSupply
          WHERE id = @id`,
      )
      .run({
        id: center.id,
        balance: center.balance,
        totalContributions: center.totalContributions,
        tokenSupply: center.tokenSupply,
      });

    if (info.changes === 0) {
      throw new CenterNotFoundError(center.id);
    }
  }

  getCapability(capabilityId: string): AuthorizationCapability | null {
    const row = this.db
      .prepare<[string], CapabilityRow>(`SELECT id, center_id FROM capabilities WHERE id = ?`)
      .get(capabilityId);
    return row ? Object.freeze({ id: row.id, centerId: row.center_id }) : null;
  }

  insertCredit(credit: ContributionCredit): void {
    this.db
      .prepare<{ id: string; centerId: string; owner: string; quantity: number; epoch: number }>(
        `INSERT INTO credits (id, seq, center_id, owner, quantity, epoch)
         VALUES (@id, (SELECT COALESCE(MAX(seq), 0) + 1 FROM credits), @centerId, @owner, @quantity, @epoch)`,
      )
      .run({
        id: credit.id,
        centerId: credit.centerId,
        owner: credit.owner,
        quantity: credit.quantity,
        epoch: credit.epoch,
      });
  }

  creditsOwnedBy(owner: string): ContributionCredit[] {
    return this.db
      .prepare<[string], CreditRow>(
        `SELECT id, center_id, owner, quantity, epoch FROM credits WHERE owner = ? ORDER BY seq ASC`,
      )
      .all(owner)
      .map(toCredit);
  }

  creditsIssuedAgainst(centerId: string): ContributionCredit[] {
    return this.db
      .prepare<[string], CreditRow>(
        `SELECT id, center_id, owner, quantity, epoch FROM credits WHERE center_id = ? ORDER BY seq ASC`,
      )
      .all(centerId)
      .map(toCredit);
  }

  // ── Integrity queries ───────────────────────────────────────────────────────

  findNegativeBalances(): NegativeBalanceRow[] {
    return this.db
      .prepare<[], NegativeBalanceRow>(`SELECT id, balance FROM centers WHERE balance < 0`)
      .all();
  }

  /** Centers whose token_supply disagrees with their credits or exceeds their contributions. */
  findSupplyMismatches(): SupplyMismatchRow[] {
    return this.db
      .prepare<[], SupplyMismatchRow>(
        `SELECT c.id                          AS id,
                c.token_supply                AS tokenSupply,
                c.total_contributions         AS totalContributions,
                COALESCE(SUM(cr.quantity), 0) AS issued
           FROM centers c
           LEFT JOIN credits cr ON cr.center_id = c.id
          GROUP BY c.id
         HAVING c.token_supply <> issued OR c.token_supply > c.total_contributions`,
      )
      .all();
  }

  close(): void {
    this.db.close();
  }
}
