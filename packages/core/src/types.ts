// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/** Core ledger types shared across every ReliefLedger package. */

/**
 * A relief fund pool. Amounts are whole numbers in the smallest currency unit.
 * `totalContributions` and `tokenSupply` only ever grow.
 */
export interface Center {
  id: string;
  name: string;
  balance: number;
  totalContributions: number;
  tokenSupply: number;
  createdAt: string; // ISO 8601
}

/**
 * Bearer credential for exactly one center. Whoever holds `id` may run
 * privileged operations on `centerId`; it cannot be recovered from the center.
 */
export interface AuthorizationCapability {
  readonly id: string;
  readonly centerId: string;
}

/** A capability object, or the bare capability id as presented over the wire. */
export type CapabilityRef = AuthorizationCapability | string;

/** Issued 1:1 per donation and owned by the donor. Never redeemed or merged. */
export interface ContributionCredit {
  readonly id: string;
  readonly centerId: string;
  readonly owner: string;
  readonly quantity: number;
  readonly epoch: number;
}

/** Supplied by the host for every operation. `principal` never authorizes anything. */
export interface OperationContext {
  epoch: number;
  principal: string;
}

// ── Audit records ────────────────────────────────────────────────────────────

interface AuditRecordBase {
  readonly id: string;
  readonly epoch: number;
  readonly amount: number;
}

export interface DonationReceived extends AuditRecordBase {
  readonly kind: "DonationReceived";
  readonly centerId: string;
  readonly donor: string;
}

export interface TokensMinted extends AuditRecordBase {
  readonly kind: "TokensMinted";
  readonly centerId: string;
  readonly recipient: string;
  readonly creditId: string;
}

export interface FundsTransferred extends AuditRecordBase {
  readonly kind: "FundsTransferred";
  readonly fromCenterId: string;
  readonly toCenterId: string;
  readonly actor: string;
}

export interface FundsWithdrawn extends AuditRecordBase {
  readonly kind: "FundsWithdrawn";
  readonly centerId: string;
  readonly actor: string;
  readonly recipient: string;
}

export type AuditRecord = DonationReceived | TokensMinted | FundsTransferred | FundsWithdrawn;

export type AuditRecordKind = AuditRecord["kind"];

/** Center ids an audit record touches, in the order they appear on the record. */
export function centersOf(record: AuditRecord): string[] {
  switch (record.kind) {
    case "FundsTransferred":
      return record.fromCenterId === record.toCenterId
        ? [record.fromCenterId]
        : [record.fromCenterId, record.toCenterId];
    case "DonationReceived":
    case "TokensMinted":
    case "FundsWithdrawn":
      return [record.centerId];
  }
}

export interface LedgerVerification {
  passed: boolean;
  negativeBalanceCount: number;
  issues: string[];
}
