// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/server.ts
// The ReliefLedger REST API server, at localhost:4747 by default.
//
// Endpoints:
//   POST /v1/centers                    ← create a center (capability returned once)
//   GET  /v1/centers[/:id]              ← center records
//   POST /v1/centers/:id/donations      ← donate, mint a contribution credit
//   POST /v1/centers/:id/transfers      ← capability-gated transfer
//   POST /v1/centers/:id/withdrawals    ← capability-gated disbursement
//   GET  /v1/centers/:id/audit          ← journaled audit records
//   GET  /v1/donors/:donor/credits      ← credits held by a donor
//   GET  /v1/health, /v1/verify         ← status and invariant check
//   GET  /docs                          ← Swagger UI (if enabled)

import Fastify from "fastify";
import cors from "@fastify/cors";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import { VERSION } from "@reliefledger/core";

import type { ApiServerOptions } from "./types.js";
import authPlugin from "./middleware/auth.js";
import errorsPlugin from "./middleware/errors.js";
import healthRoute from "./routes/health.js";
import centersRoute from "./routes/centers.js";
import fundsRoute from "./routes/funds.js";
import creditsRoute from "./routes/credits.js";

export async function createServer(opts: ApiServerOptions) {
  const { ledger, config } = opts;
  const { host, port, apiKey, swagger: enableSwagger } = config.api;

  const fastify = Fastify({
    logger: opts.logger ?? {
      level: "warn",
      transport: { target: "pino-pretty", options: { colorize: true } },
    },
  });

  // ── CORS (allow any local app to call the API) ──────────────────────────────
  await fastify.register(cors, {
    origin: (origin, cb) => {
      // Allow localhost origins (any port) and requests with no origin (curl, etc.)
      if (!origin || /^https?:\/\/(localhost|127\.0\.0\.1)(:\d+)?$/.test(origin)) {
        cb(null, true);
      } else {
        cb(new Error("CORS: origin not allowed"), false);
      }
    },
    methods: ["GET", "POST", "OPTIONS"],
  });

  // ── Swagger / OpenAPI docs ──────────────────────────────────────────────────
  if (enableSwagger) {
    await fastify.register(swagger, {
      openapi: {
        openapi: "3.0.0",
        info: {
          title: "ReliefLedger REST API",
          description:
            "Capability-authorized ledger for pooled relief funds. Privileged operations take the " +
            "center's capability as 'Authorization: Bearer <capabilityId>'.",
          version: VERSION,
        },
        servers: [{ url: `http://${host}:${port}`, description: "ReliefLedger local API" }],
        tags: [
          { name: "Centers", description: "Center records" },
          { name: "Funds", description: "Donations, transfers and withdrawals" },
          { name: "Credits", description: "Contribution credits" },
          { name: "Audit", description: "Journaled audit records" },
          { name: "System", description: "Health and integrity" },
        ],
      },
    });

    await fastify.register(swaggerUi, {
      routePrefix: "/docs",
      uiConfig: { docExpansion: "list" },
    });
  }

  // ── Operator key (optional) and error mapping ───────────────────────────────
  await fastify.register(authPlugin, { apiKey });
  await fastify.register(errorsPlugin);

  // ── Audit feed into the server log ──────────────────────────────────────────
  const unsubscribe = ledger.audit.subscribe((record) => {
    fastify.log.info({ audit: record }, `audit ${record.kind}`);
  });
  fastify.addHook("onClose", async () => {
    unsubscribe();
  });

  // ── Register routes ──────────────────────────────────────────────────────────
  await fastify.register(healthRoute, { ledger });
  await fastify.register(centersRoute, { ledger });
  await fastify.register(fundsRoute, { ledger });
  await fastify.register(creditsRoute, { ledger });

  // Root redirect
  fastify.get("/", async (_req, reply) => {
    return reply.redirect(enableSwagger ? "/docs" : "/v1/health");
  });

  return { fastify, port, host };
}

export async function startServer(opts: ApiServerOptions): Promise<void> {
  const { fastify, port, host } = await createServer(opts);

  try {
    await fastify.listen({ port, host });
    console.log(
      `\n  ReliefLedger API  v${VERSION}\n` +
        `  Listening  → http://${host}:${port}/v1\n` +
        (opts.config.api.swagger ? `  Swagger UI → http://${host}:${port}/docs\n` : ""),
    );
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}
