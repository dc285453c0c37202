// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/credits.ts
// GET /v1/donors/:donor/credits: contribution credits held by a donor

import type { FastifyPluginAsync } from "fastify";
import type { ReliefLedger } from "@reliefledger/core";

import type { CreditsResponse, DonorParams } from "../types.js";

interface CreditsRouteOptions {
  ledger: ReliefLedger;
}

const creditsRoute: FastifyPluginAsync<CreditsRouteOptions> = async (fastify, opts) => {
  fastify.get<{ Params: DonorParams }>(
    "/v1/donors/:donor/credits",
    {
      schema: {
        summary: "Credits held by a donor",
        tags: ["Credits"],
        params: {
          type: "object",
          required: ["donor"],
          properties: { donor: { type: "string", minLength: 1 } },
        },
      },
    },
    async (request, reply) => {
      const credits = opts.ledger.creditsOf(request.params.donor);
      return reply.send({
        owner: request.params.donor,
        credits,
        total: credits.reduce((sum, c) => sum + c.quantity, 0),
      } satisfies CreditsResponse);
    },
  );
};

export default creditsRoute;
