// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/health.ts
// GET /v1/health: liveness plus a ledger integrity summary
// GET /v1/verify: full invariant check

import type { FastifyPluginAsync } from "fastify";
import { VERSION, type ReliefLedger } from "@reliefledger/core";

import type { HealthResponse, VerifyResponse } from "../types.js";

// uptime start
const startedAt = Date.now();

interface HealthRouteOptions {
  ledger: ReliefLedger;
}

const healthRoute: FastifyPluginAsync<HealthRouteOptions> = async (fastify, opts) => {
  fastify.get(
    "/v1/health",
    {
      schema: {
        summary: "Ledger health check",
        description: "Returns the service status, version and whether the ledger invariants hold.",
        tags: ["System"],
      },
    },
    async (_request, reply) => {
      const verification = opts.ledger.verify();
      return reply.send({
        status: verification.passed ? "ok" : "degraded",
        version: VERSION,
        uptime: Math.floor((Date.now() - startedAt) / 1000),
        centers: opts.ledger.centers().length,
        journal: opts.ledger.journal !== null,
      } satisfies HealthResponse);
    },
  );

  fastify.get(
    "/v1/verify",
    {
      schema: {
        summary: "Verify ledger invariants",
        description: "Checks for negative balances and credit supplies that disagree with issued credits.",
        tags: ["System"],
      },
    },
    async (_request, reply) => {
      return reply.send(opts.ledger.verify() satisfies VerifyResponse);
    },
  );
};

export default healthRoute;
