// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/middleware/auth.ts
// Optional operator key for the ReliefLedger REST API.
// If no key is configured, all requests are allowed (local-by-default).
//
// The operator key only gates access to the API. It never authorizes a
// privileged ledger operation; that takes the center's capability.

import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from "fastify";
import fp from "fastify-plugin";

import type { ErrorResponse } from "../types.js";

export interface AuthOptions {
  /** Required operator key: if undefined, auth is disabled */
  apiKey?: string;
}

const PUBLIC_PREFIXES = ["/v1/health", "/docs"];

const authPlugin: FastifyPluginAsync<AuthOptions> = async (fastify, opts) => {
  const apiKey = opts.apiKey;
  if (!apiKey) {
    return;
  }

  fastify.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
    if (request.url === "/" || PUBLIC_PREFIXES.some((prefix) => request.url.startsWith(prefix))) {
      return;
    }

    if (request.headers["x-api-key"] !== apiKey) {
      return reply.code(401).send({
        error: {
          type: "authentication_error",
          code: "INVALID_API_KEY",
          message: "Invalid operator key. Pass it via 'x-api-key: <key>'.",
        },
      } satisfies ErrorResponse);
    }
  });
};

export default fp(authPlugin, { name: "reliefledger-auth" });
