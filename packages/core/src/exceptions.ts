// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/** Typed error hierarchy for ReliefLedger. Every rejection is synchronous and final. */

export type ReliefLedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_FUNDS"
  | "UNAUTHORIZED_ACCESS"
  | "CENTER_NOT_FOUND"
  | "INVALID_CONTEXT"
  | "CONFIGURATION_ERROR";

export class ReliefLedgerError extends Error {
  constructor(
    message: string,
    public readonly code: ReliefLedgerErrorCode,
  ) {
    super(message);
    this.name = "ReliefLedgerError";
  }
}

export class InvalidAmountError extends ReliefLedgerError {
  constructor(
    public readonly amount: number,
    reason = "must be a positive whole number of the smallest currency unit",
  ) {
    super(`Invalid amount ${amount}: ${reason}`, "INVALID_AMOUNT");
    this.name = "InvalidAmountError";
  }
}

export class InsufficientFundsError extends ReliefLedgerError {
  constructor(
    public readonly centerId: string,
    public readonly balance: number,
    public readonly requested: number,
  ) {
    super(
      `Insufficient funds in center '${centerId}'. Balance: ${balance}, Requested: ${requested}`,
      "INSUFFICIENT_FUNDS",
    );
    this.name = "InsufficientFundsError";
  }
}

export class UnauthorizedAccessError extends ReliefLedgerError {
  constructor(public readonly centerId: string) {
    super(`Capability does not authorize operations on center '${centerId}'`, "UNAUTHORIZED_ACCESS");
    this.name = "UnauthorizedAccessError";
  }
}

export class CenterNotFoundError extends ReliefLedgerError {
  constructor(public readonly centerId: string) {
    super(`Center not found: ${centerId}`, "CENTER_NOT_FOUND");
    this.name = "CenterNotFoundError";
  }
}

/** The host supplied an epoch or principal that cannot be recorded. */
export class InvalidContextError extends ReliefLedgerError {
  constructor(reason: string) {
    super(`Invalid operation context: ${reason}`, "INVALID_CONTEXT");
    this.name = "InvalidContextError";
  }
}

export class ConfigurationError extends ReliefLedgerError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR");
    this.name = "ConfigurationError";
  }
}
