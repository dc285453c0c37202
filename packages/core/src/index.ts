// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * ReliefLedger public API.
 * Import from this module when using the ledger as a library.
 */

export { VERSION } from "./version.js";
export type {
  Center,
  AuthorizationCapability,
  CapabilityRef,
  ContributionCredit,
  OperationContext,
  AuditRecord,
  AuditRecordKind,
  DonationReceived,
  TokensMinted,
  FundsTransferred,
  FundsWithdrawn,
  LedgerVerification,
} from "./types.js";
export { centersOf } from "./types.js";
export {
  ReliefLedgerError,
  InvalidAmountError,
  InsufficientFundsError,
  UnauthorizedAccessError,
  CenterNotFoundError,
  InvalidContextError,
  ConfigurationError,
} from "./exceptions.js";
export type { ReliefLedgerErrorCode } from "./exceptions.js";
export { loadConfig, defaultConfig } from "./config/config.js";
export type { ReliefLedgerConfig } from "./config/config.js";
export { ReliefLedger } from "./ledger.js";
export type { ReliefLedgerOptions } from "./ledger.js";
export { LedgerStore } from "./store/store.js";
export type { CreatedCenter } from "./store/store.js";
export { openDatabase, DEFAULT_DB_PATH, IN_MEMORY } from "./store/database.js";
export { authorize, requireAuthorization, resolveCapability } from "./authority/authority.js";
export { ContributionIssuer } from "./credits/issuer.js";
export type { DonationResult } from "./credits/issuer.js";
export { TransferEngine } from "./transfers/engine.js";
export type { TransferResult, WithdrawalResult } from "./transfers/engine.js";
export { AuditEmitter } from "./audit/emitter.js";
export type { AuditObserver } from "./audit/emitter.js";
export { AuditJournal } from "./audit/journal.js";
export type { JournalEntry } from "./audit/journal.js";
export { createLogger, silentLogger } from "./utils/logger.js";
export type { Logger, LogLevel, LogSink } from "./utils/logger.js";
export { maskCapability, envVar } from "./utils/security.js";
export { assertAmount } from "./utils/amount.js";
export { assertContext } from "./utils/context.js";
