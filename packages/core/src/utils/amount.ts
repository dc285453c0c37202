// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { z } from "zod";

import { InvalidAmountError } from "../exceptions.js";

/** Whole, positive, and small enough for SQLite INTEGER and JS numbers alike. */
export const AmountSchema = z.number().int().positive().max(Number.MAX_SAFE_INTEGER);

export function assertAmount(amount: number): number {
  const result = AmountSchema.safeParse(amount);
  if (!result.success) {
    throw new InvalidAmountError(amount);
  }
  return result.data;
}

/** Add `amount` to a running total, rejecting sums past Number.MAX_SAFE_INTEGER. */
export function checkedAdd(total: number, amount: number): number {
  const sum = total + amount;
  if (!Number.isSafeInteger(sum)) {
    throw new InvalidAmountError(amount, "would overflow the center's running totals");
  }
  return sum;
}
