// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Capability authority. Possession of a center's capability is the only
 * proof of authority over it; there are no roles and no allow-lists.
 */

import { UnauthorizedAccessError } from "../exceptions.js";
import type { LedgerStore } from "../store/store.js";
import type { AuthorizationCapability, CapabilityRef, Center } from "../types.js";

/** True iff the capability is bound to this exact center id. */
export function authorize(capability: AuthorizationCapability | null | undefined, center: Center): boolean {
  if (!capability || typeof capability.centerId !== "string" || capability.centerId.length === 0) {
    return false;
  }
  return capability.centerId === center.id;
}

export function requireAuthorization(
  capability: AuthorizationCapability | null | undefined,
  center: Center,
): void {
  if (!authorize(capability, center)) {
    throw new UnauthorizedAccessError(center.id);
  }
}

/**
 * Look a presented capability up by id. Only the stored binding counts:
 * an object claiming a different center, or an id that was never issued,
 * resolves to null and fails authorization.
 */
export function resolveCapability(
  store: LedgerStore,
  presented: CapabilityRef,
): AuthorizationCapability | null {
  const id = typeof presented === "string" ? presented : presented.id;
  const issued = store.getCapability(id);
  if (!issued) return null;
  if (typeof presented !== "string" && presented.centerId !== issued.centerId) return null;
  return issued;
}
