// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/funds.ts
// POST /v1/centers/:id/donations    ← open to anyone, mints a credit to x-principal
// POST /v1/centers/:id/transfers    ← needs the source center's capability
// POST /v1/centers/:id/withdrawals  ← needs the center's capability
//
// The capability travels as `Authorization: Bearer <capabilityId>`.

import type { FastifyPluginAsync } from "fastify";
import type { ReliefLedger } from "@reliefledger/core";

import { contextHeadersSchema, operationContext, presentedCapability } from "../middleware/context.js";
import type {
  CenterParams,
  ContextHeaders,
  DonationRequest,
  DonationResponse,
  TransferRequest,
  TransferResponse,
  WithdrawalRequest,
  WithdrawalResponse,
} from "../types.js";

interface FundsRouteOptions {
  ledger: ReliefLedger;
}

const centerParamsSchema = {
  type: "object",
  required: ["id"],
  properties: { id: { type: "string", minLength: 1 } },
} as const;

const fundsRoute: FastifyPluginAsync<FundsRouteOptions> = async (fastify, opts) => {
  const { ledger } = opts;

  fastify.post<{ Params: CenterParams; Body: DonationRequest; Headers: ContextHeaders }>(
    "/v1/centers/:id/donations",
    {
      schema: {
        summary: "Donate to a center",
        description: "Raises the center's balance and mints one contribution credit of equal quantity to the donor.",
        tags: ["Funds"],
        params: centerParamsSchema,
        headers: contextHeadersSchema,
        body: {
          type: "object",
          required: ["amount"],
          properties: { amount: { type: "number" } },
        },
      },
    },
    async (request, reply) => {
      const ctx = operationContext(request.headers);
      const { center, credit } = ledger.donate(request.params.id, request.body.amount, ctx);
      return reply.code(201).send({ center, credit } satisfies DonationResponse);
    },
  );

  fastify.post<{ Params: CenterParams; Body: TransferRequest; Headers: ContextHeaders }>(
    "/v1/centers/:id/transfers",
    {
      schema: {
        summary: "Transfer between centers",
        description: "Moves funds to another center. Authorized by the source center's capability.",
        tags: ["Funds"],
        params: centerParamsSchema,
        headers: contextHeadersSchema,
        body: {
          type: "object",
          required: ["toCenterId", "amount"],
          properties: {
            toCenterId: { type: "string", minLength: 1 },
            amount: { type: "number" },
          },
        },
      },
    },
    async (request, reply) => {
      const ctx = operationContext(request.headers);
      const capability = presentedCapability(request.headers.authorization);
      const { from, to } = ledger.transferBetweenCenters(
        request.params.id,
        request.body.toCenterId,
        request.body.amount,
        capability,
        ctx,
      );
      return reply.send({ from, to } satisfies TransferResponse);
    },
  );

  fastify.post<{ Params: CenterParams; Body: WithdrawalRequest; Headers: ContextHeaders }>(
    "/v1/centers/:id/withdrawals",
    {
      schema: {
        summary: "Withdraw to a recipient",
        description: "Disburses funds out of the ledger. Authorized by the center's capability.",
        tags: ["Funds"],
        params: centerParamsSchema,
        headers: contextHeadersSchema,
        body: {
          type: "object",
          required: ["amount", "recipient"],
          properties: {
            amount: { type: "number" },
            recipient: { type: "string", minLength: 1, maxLength: 256 },
          },
        },
      },
    },
    async (request, reply) => {
      const ctx = operationContext(request.headers);
      const capability = presentedCapability(request.headers.authorization);
      const { center } = ledger.withdrawFunds(
        request.params.id,
        request.body.amount,
        request.body.recipient,
        capability,
        ctx,
      );
      return reply.send({ center } satisfies WithdrawalResponse);
    },
  );
};

export default fundsRoute;
