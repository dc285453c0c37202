// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * ContributionIssuer: accepts donations and mints contribution credits.
 *
 * Donations are open to any principal. Each one raises the center's balance
 * and total contributions, and mints a single credit of the same quantity
 * to the donor (issuance is fixed at 1:1).
 */

import { randomUUID } from "crypto";

import type { LedgerStore } from "../store/store.js";
import type {
  AuditRecord,
  Center,
  ContributionCredit,
  DonationReceived,
  OperationContext,
  TokensMinted,
} from "../types.js";
import { assertAmount, checkedAdd } from "../utils/amount.js";

export interface DonationResult {
  center: Center;
  credit: ContributionCredit;
  /** DonationReceived, then TokensMinted. */
  records: AuditRecord[];
}

export class ContributionIssuer {
  constructor(private readonly store: LedgerStore) {}

  /**
   * Must run inside `store.transaction()`: the caller publishes `records`
   * only once that transaction has committed.
   *
   * @throws {InvalidAmountError} If amount is not a positive safe integer
   * @throws {CenterNotFoundError} If the center does not exist
   */
  donate(centerId: string, amount: number, ctx: OperationContext): DonationResult {
    const donation = assertAmount(amount);
    const center = this.store.requireCenter(centerId);

    // Compute every new total before touching the record
    const balance = checkedAdd(center.balance, donation);
    const totalContributions = checkedAdd(center.totalContributions, donation);
    const tokenSupply = checkedAdd(center.tokenSupply, donation);

    const credit: ContributionCredit = Object.freeze({
      id: randomUUID(),
      centerId: center.id,
      owner: ctx.principal,
      quantity: donation,
      epoch: ctx.epoch,
    });

    const updated: Center = { ...center, balance, totalContributions, tokenSupply };
    this.store.saveCenter(updated);
    this.store.insertCredit(credit);

    const received: DonationReceived = Object.freeze({
      kind: "DonationReceived",
      id: randomUUID(),
      epoch: ctx.epoch,
      centerId: center.id,
      donor: ctx.principal,
      amount: donation,
    });
    const minted: TokensMinted = Object.freeze({
      kind: "TokensMinted",
      id: randomUUID(),
      epoch: ctx.epoch,
      centerId: center.id,
      recipient: ctx.principal,
      creditId: credit.id,
      amount: credit.quantity,
    });

    return { center: updated, credit, records: [received, minted] };
  }
}
