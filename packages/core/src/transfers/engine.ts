// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * TransferEngine: capability-gated movement of funds between centers and
 * out of the ledger to external recipients.
 *
 * Checks run in a fixed order: capability, then amount, then balance. A
 * non-positive amount fails the `0 < amount <= balance` bound and is reported
 * as insufficient funds; only malformed amounts are invalid. The
 * records involved are fetched, validated, mutated and written back as one
 * unit inside the caller's transaction; nothing is written if any check fails.
 */

import { randomUUID } from "crypto";

import { requireAuthorization, resolveCapability } from "../authority/authority.js";
import { InsufficientFundsError } from "../exceptions.js";
import type { LedgerStore } from "../store/store.js";
import type {
  AuditRecord,
  CapabilityRef,
  Center,
  FundsTransferred,
  FundsWithdrawn,
  OperationContext,
} from "../types.js";
import { assertAmount, checkedAdd } from "../utils/amount.js";

export interface TransferResult {
  from: Center;
  to: Center;
  records: AuditRecord[];
}

export interface WithdrawalResult {
  center: Center;
  records: AuditRecord[];
}

export class TransferEngine {
  constructor(private readonly store: LedgerStore) {}

  /**
   * Move `amount` from one center to another. Authorized by the source
   * center's capability only.
   *
   * A transfer from a center to itself passes the same checks and leaves
   * the balance where it was.
   *
   * @throws {UnauthorizedAccessError} If the capability is not bound to the source center
   * @throws {InvalidAmountError} If amount is not a safe integer
   * @throws {InsufficientFundsError} If amount is not positive or exceeds the source balance
   */
  transferBetweenCenters(
    fromCenterId: string,
    toCenterId: string,
    amount: number,
    capability: CapabilityRef,
    ctx: OperationContext,
  ): TransferResult {
    const from = this.store.requireCenter(fromCenterId);
    requireAuthorization(resolveCapability(this.store, capability), from);

    const to = toCenterId === from.id ? from : this.store.requireCenter(toCenterId);
    const value = this.debitable(from, amount);

    if (to === from) {
      const record = this.transferred(from.id, from.id, value, ctx);
      return { from, to, records: [record] };
    }

    const debited: Center = { ...from, balance: from.balance - value };
    const credited: Center = { ...to, balance: checkedAdd(to.balance, value) };

    this.store.saveCenter(debited);
    this.store.saveCenter(credited);

    return {
      from: debited,
      to: credited,
      records: [this.transferred(from.id, to.id, value, ctx)],
    };
  }

  /**
   * Disburse `amount` to an external recipient. The funds leave the ledger;
   * no other center is credited.
   *
   * @throws {UnauthorizedAccessError} If the capability is not bound to the center
   * @throws {InvalidAmountError} If amount is not a safe integer
   * @throws {InsufficientFundsError} If amount is not positive or exceeds the balance
   */
  withdrawFunds(
    centerId: string,
    amount: number,
    recipient: string,
    capability: CapabilityRef,
    ctx: OperationContext,
  ): WithdrawalResult {
    const center = this.store.requireCenter(centerId);

    requireAuthorization(resolveCapability(this.store, capability), center);
    const value = this.debitable(center, amount);

    const debited: Center = { ...center, balance: center.balance - value };
    this.store.saveCenter(debited);

    const record: FundsWithdrawn = Object.freeze({
      kind: "FundsWithdrawn",
      id: randomUUID(),
      epoch: ctx.epoch,
      centerId: center.id,
      actor: ctx.principal,
      recipient,
      amount: value,
    });

    return { center: debited, records: [record] };
  }

  private debitable(center: Center, amount: number): number {
    if (Number.isSafeInteger(amount) && amount <= 0) {
      throw new InsufficientFundsError(center.id, center.balance, amount);
    }
    const value = assertAmount(amount);
    if (value > center.balance) {
      throw new InsufficientFundsError(center.id, center.balance, value);
    }
    return value;
  }

  private transferred(
    fromCenterId: string,
    toCenterId: string,
    amount: number,
    ctx: OperationContext,
  ): FundsTransferred {
    return Object.freeze({
      kind: "FundsTransferred",
      id: randomUUID(),
      epoch: ctx.epoch,
      fromCenterId,
      toCenterId,
      actor: ctx.principal,
      amount,
    });
  }
}
