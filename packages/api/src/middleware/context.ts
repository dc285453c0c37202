// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/middleware/context.ts
// Per-request operation context and the presented capability.

import type { OperationContext } from "@reliefledger/core";

import type { ContextHeaders } from "../types.js";

const DAY_MS = 86_400_000;

/** JSON schema for the context headers; Fastify coerces x-epoch to an integer. */
export const contextHeadersSchema = {
  type: "object",
  properties: {
    "x-principal": { type: "string", minLength: 1, maxLength: 256 },
    "x-epoch": { type: "integer", minimum: 0 },
  },
} as const;

/** Logical epoch used when the caller supplies none: whole UTC days since 1970. */
export function currentEpoch(now: number = Date.now()): number {
  return Math.floor(now / DAY_MS);
}

export function operationContext(headers: ContextHeaders, now?: number): OperationContext {
  return {
    epoch: headers["x-epoch"] ?? currentEpoch(now),
    principal: headers["x-principal"] ?? "anonymous",
  };
}

/**
 * Capability id from `Authorization: Bearer <id>`. A missing header yields
 * the empty string, which no issued capability matches.
 */
export function presentedCapability(authorization: string | undefined): string {
  if (!authorization?.startsWith("Bearer ")) return "";
  return authorization.slice(7).trim();
}
