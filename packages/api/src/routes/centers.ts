// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/centers.ts
// POST /v1/centers            ← create a center, returns its capability once
// GET  /v1/centers            ← list centers
// GET  /v1/centers/:id        ← one center
// GET  /v1/centers/:id/audit  ← journaled audit records touching the center

import type { FastifyPluginAsync } from "fastify";
import { CenterNotFoundError, type ReliefLedger } from "@reliefledger/core";

import type {
  AuditQuery,
  AuditResponse,
  CenterParams,
  CreateCenterRequest,
  CreateCenterResponse,
} from "../types.js";

interface CentersRouteOptions {
  ledger: ReliefLedger;
}

const centerParamsSchema = {
  type: "object",
  required: ["id"],
  properties: { id: { type: "string", minLength: 1 } },
} as const;

const centersRoute: FastifyPluginAsync<CentersRouteOptions> = async (fastify, opts) => {
  const { ledger } = opts;

  fastify.post<{ Body: CreateCenterRequest }>(
    "/v1/centers",
    {
      schema: {
        summary: "Create a center",
        description:
          "Creates a relief fund center with zero balance. The response carries the center's capability; " +
          "it is never shown again and is the only way to move the center's funds.",
        tags: ["Centers"],
        body: {
          type: "object",
          required: ["name"],
          properties: { name: { type: "string", minLength: 1, maxLength: 200 } },
        },
      },
    },
    async (request, reply) => {
      const { center, capability } = ledger.createCenter(request.body.name);
      return reply.code(201).send({ center, capability } satisfies CreateCenterResponse);
    },
  );

  fastify.get(
    "/v1/centers",
    { schema: { summary: "List centers", tags: ["Centers"] } },
    async (_request, reply) => {
      return reply.send({ centers: ledger.centers() });
    },
  );

  fastify.get<{ Params: CenterParams }>(
    "/v1/centers/:id",
    { schema: { summary: "Get a center", tags: ["Centers"], params: centerParamsSchema } },
    async (request, reply) => {
      return reply.send(ledger.requireCenter(request.params.id));
    },
  );

  fastify.get<{ Params: CenterParams; Querystring: AuditQuery }>(
    "/v1/centers/:id/audit",
    {
      schema: {
        summary: "Audit trail for a center",
        description: "Journaled audit records that touch the center, oldest first.",
        tags: ["Audit"],
        params: centerParamsSchema,
        querystring: {
          type: "object",
          properties: { limit: { type: "integer", minimum: 1, maximum: 1000, default: 100 } },
        },
      },
    },
    async (request, reply) => {
      const center = ledger.center(request.params.id);
      if (!center) {
        throw new CenterNotFoundError(request.params.id);
      }
      const entries = ledger.journal?.forCenter(center.id, request.query.limit) ?? [];
      return reply.send({ centerId: center.id, entries } satisfies AuditResponse);
    },
  );
};

export default centersRoute;
