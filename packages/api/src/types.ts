// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/types.ts
// Shared types for the ReliefLedger REST API layer.

import type { FastifyServerOptions } from "fastify";
import type {
  AuthorizationCapability,
  Center,
  ContributionCredit,
  JournalEntry,
  LedgerVerification,
  ReliefLedger,
  ReliefLedgerConfig,
  ReliefLedgerErrorCode,
} from "@reliefledger/core";

// ── Request shapes ───────────────────────────────────────────────────────────

export interface CenterParams {
  id: string;
}

export interface DonorParams {
  donor: string;
}

/** Host-supplied operation context. The principal is recorded, never trusted. */
export interface ContextHeaders {
  "x-principal"?: string;
  "x-epoch"?: number;
}

export interface CreateCenterRequest {
  name: string;
}

export interface DonationRequest {
  amount: number;
}

export interface TransferRequest {
  toCenterId: string;
  amount: number;
}

export interface WithdrawalRequest {
  amount: number;
  recipient: string;
}

export interface AuditQuery {
  limit?: number;
}

// ── Response shapes ──────────────────────────────────────────────────────────

export interface CreateCenterResponse {
  center: Center;
  /** Shown once. Whoever holds it controls the center's funds. */
  capability: AuthorizationCapability;
}

export interface DonationResponse {
  center: Center;
  credit: ContributionCredit;
}

export interface TransferResponse {
  from: Center;
  to: Center;
}

export interface WithdrawalResponse {
  center: Center;
}

export interface AuditResponse {
  centerId: string;
  entries: JournalEntry[];
}

export interface CreditsResponse {
  owner: string;
  credits: ContributionCredit[];
  total: number;
}

export type VerifyResponse = LedgerVerification;

export interface HealthResponse {
  status: "ok" | "degraded";
  version: string;
  uptime: number;
  centers: number;
  journal: boolean;
}

export interface ErrorResponse {
  error: {
    type: "ledger_error" | "validation_error" | "authentication_error" | "internal_error";
    code: ReliefLedgerErrorCode | "INVALID_REQUEST" | "INVALID_API_KEY" | "INTERNAL";
    message: string;
  };
}

// ── Server options ────────────────────────────────────────────────────────────

export interface ApiServerOptions {
  ledger: ReliefLedger;
  config: ReliefLedgerConfig;
  /** Fastify logger settings; defaults to warn-level pretty output */
  logger?: FastifyServerOptions["logger"];
}
