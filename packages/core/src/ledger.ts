// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/core/src/ledger.ts
// ReliefLedger: main facade class. The public API for the ledger core.
//
// Usage:
//   const ledger = new ReliefLedger({ dbPath: ":memory:" })
//   const { center, capability } = ledger.createCenter("Shelter-A")
//   ledger.donate(center.id, 100, { epoch: 1, principal: "donor-1" })
//   ledger.withdrawFunds(center.id, 25, "supplier-9", capability, { epoch: 1, principal: "ops" })
//   ledger.close()

import { AuditEmitter } from "./audit/emitter.js";
import { AuditJournal } from "./audit/journal.js";
import { resolveCapability } from "./authority/authority.js";
import type { ReliefLedgerConfig } from "./config/config.js";
import { ContributionIssuer, type DonationResult } from "./credits/issuer.js";
import { ReliefLedgerError } from "./exceptions.js";
import { openDatabase } from "./store/database.js";
import { LedgerStore, type CreatedCenter } from "./store/store.js";
import { TransferEngine, type TransferResult, type WithdrawalResult } from "./transfers/engine.js";
import type {
  AuditRecord,
  AuthorizationCapability,
  CapabilityRef,
  Center,
  ContributionCredit,
  LedgerVerification,
  OperationContext,
} from "./types.js";
import { assertContext } from "./utils/context.js";
import { createLogger, silentLogger, type Logger } from "./utils/logger.js";
import { maskCapability } from "./utils/security.js";

export interface ReliefLedgerOptions {
  /** SQLite file, or ":memory:". Defaults to ~/.reliefledger/ledger.db */
  dbPath?: string;
  /** Journal every audit record to the append-only table (default true) */
  journal?: boolean;
  logger?: Logger;
}

export class ReliefLedger {
  readonly audit: AuditEmitter;
  readonly journal: AuditJournal | null;
  private readonly store: LedgerStore;
  private readonly issuer: ContributionIssuer;
  private readonly engine: TransferEngine;
  private readonly logger: Logger;

  constructor(opts: ReliefLedgerOptions = {}) {
    this.logger = opts.logger ?? silentLogger;
    const db = openDatabase(opts.dbPath);
    this.store = new LedgerStore(db);
    this.issuer = new ContributionIssuer(this.store);
    this.engine = new TransferEngine(this.store);
    this.audit = new AuditEmitter(this.logger.child("Audit"));

    if (opts.journal ?? true) {
      this.journal = new AuditJournal(db);
      this.journal.attach(this.audit);
    } else {
      this.journal = null;
    }
  }

  static fromConfig(config: ReliefLedgerConfig, logger?: Logger): ReliefLedger {
    return new ReliefLedger({
      dbPath: config.ledger.dbPath,
      journal: config.ledger.journal,
      logger: logger ?? createLogger("Ledger", config.logging.level),
    });
  }

  // ── Records ─────────────────────────────────────────────────────────────────

  /** The capability is returned here once; keep it, it cannot be re-derived. */
  createCenter(name: string): CreatedCenter {
    const created = this.store.createCenter(name);
    this.logger.info(
      `Created center '${name}' (${created.center.id}), capability ${maskCapability(created.capability.id)}`,
    );
    return created;
  }

  center(centerId: string): Center | null {
    return this.store.getCenter(centerId);
  }

  requireCenter(centerId: string): Center {
    return this.store.requireCenter(centerId);
  }

  centers(): Center[] {
    return this.store.listCenters();
  }

  balanceOf(centerId: string): number {
    return this.store.balanceOf(centerId);
  }

  totalContributions(centerId: string): number {
    return this.store.totalContributions(centerId);
  }

  tokenSupply(centerId: string): number {
    return this.store.tokenSupply(centerId);
  }

  /** Resolve a presented capability id to the issued capability, or null. */
  capability(capabilityId: string): AuthorizationCapability | null {
    return resolveCapability(this.store, capabilityId);
  }

  creditsOf(owner: string): ContributionCredit[] {
    return this.store.creditsOwnedBy(owner);
  }

  creditsFor(centerId: string): ContributionCredit[] {
    return this.store.creditsIssuedAgainst(centerId);
  }

  // ── Operations ──────────────────────────────────────────────────────────────

  donate(centerId: string, amount: number, ctx: OperationContext): DonationResult {
    const result = this.commit("donate", ctx, (context) => this.issuer.donate(centerId, amount, context));
    this.logger.debug(
      `Donation of ${amount} to ${centerId} from '${ctx.principal}' minted credit ${result.credit.id} (epoch ${ctx.epoch})`,
    );
    return result;
  }

  transferBetweenCenters(
    fromCenterId: string,
    toCenterId: string,
    amount: number,
    capability: CapabilityRef,
    ctx: OperationContext,
  ): TransferResult {
    const result = this.commit("transfer", ctx, (context) =>
      this.engine.transferBetweenCenters(fromCenterId, toCenterId, amount, capability, context),
    );
    this.logger.debug(`Transferred ${amount} from ${fromCenterId} to ${toCenterId} (epoch ${ctx.epoch})`);
    return result;
  }

  withdrawFunds(
    centerId: string,
    amount: number,
    recipient: string,
    capability: CapabilityRef,
    ctx: OperationContext,
  ): WithdrawalResult {
    const result = this.commit("withdraw", ctx, (context) =>
      this.engine.withdrawFunds(centerId, amount, recipient, capability, context),
    );
    this.logger.debug(`Withdrew ${amount} from ${centerId} to '${recipient}' (epoch ${ctx.epoch})`);
    return result;
  }

  // ── Integrity ───────────────────────────────────────────────────────────────

  verify(): LedgerVerification {
    const negatives = this.store.findNegativeBalances();
    const mismatches = this.store.findSupplyMismatches();

    const issues: string[] = [];
    for (const neg of negatives) {
      issues.push(`Center ${neg.id} has forbidden negative balance: ${neg.balance}.`);
    }
    for (const m of mismatches) {
      if (m.tokenSupply !== m.issued) {
        issues.push(`Center ${m.id} reports token supply ${m.tokenSupply} but ${m.issued} in credits were issued.`);
      }
      if (m.tokenSupply > m.totalContributions) {
        issues.push(
          `Center ${m.id} issued ${m.tokenSupply} in credits against only ${m.totalContributions} in contributions.`,
        );
      }
    }

    return {
      passed: issues.length === 0,
      negativeBalanceCount: negatives.length,
      issues,
    };
  }

  close(): void {
    this.journal?.stop();
    this.audit.removeAllListeners();
    this.store.close();
  }

  /**
   * Validate the context, run one operation as a single transaction, then
   * publish its records. A rejected operation writes nothing and publishes nothing.
   */
  private commit<T extends { records: AuditRecord[] }>(
    op: string,
    ctx: OperationContext,
    fn: (context: OperationContext) => T,
  ): T {
    let result: T;
    try {
      const context = assertContext(ctx);
      result = this.store.transaction(() => fn(context));
    } catch (err) {
      if (err instanceof ReliefLedgerError) {
        this.logger.warn(`${op} rejected: ${err.name}: ${err.message}`);
      }
      throw err;
    }

    this.audit.publish(result.records);
    return result;
  }
}
