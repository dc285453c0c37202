// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { z } from "zod";

import { InvalidContextError } from "../exceptions.js";
import type { OperationContext } from "../types.js";

/** Epochs are whole, non-negative markers; the principal is recorded verbatim. */
export const OperationContextSchema = z.object({
  epoch: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  principal: z.string().min(1),
});

export function assertContext(ctx: OperationContext): OperationContext {
  const result = OperationContextSchema.safeParse(ctx);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new InvalidContextError(issues);
  }
  return result.data;
}
