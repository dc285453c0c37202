// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { FastifyInstance } from "fastify";
import { IN_MEMORY, ReliefLedger, defaultConfig, type ReliefLedgerConfig } from "@reliefledger/core";

import { createServer } from "../../src/server.js";
import type {
  AuditResponse,
  CreateCenterResponse,
  CreditsResponse,
  DonationResponse,
  ErrorResponse,
  HealthResponse,
  TransferResponse,
  WithdrawalResponse,
} from "../../src/types.js";

function testConfig(apiKey?: string): ReliefLedgerConfig {
  return {
    ...defaultConfig,
    ledger: { dbPath: IN_MEMORY, journal: true },
    api: { ...defaultConfig.api, swagger: false, apiKey },
  };
}

describe("ReliefLedger REST API", () => {
  let ledger: ReliefLedger;
  let fastify: FastifyInstance;

  beforeEach(async () => {
    ledger = new ReliefLedger({ dbPath: IN_MEMORY });
    ({ fastify } = await createServer({ ledger, config: testConfig(), logger: false }));
  });

  afterEach(async () => {
    await fastify.close();
    ledger.close();
  });

  async function createCenter(name: string): Promise<CreateCenterResponse> {
    const res = await fastify.inject({ method: "POST", url: "/v1/centers", payload: { name } });
    expect(res.statusCode).toBe(201);
    return res.json<CreateCenterResponse>();
  }

  async function donate(centerId: string, amount: number) {
    return fastify.inject({
      method: "POST",
      url: `/v1/centers/${centerId}/donations`,
      headers: { "x-principal": "donor-1", "x-epoch": "7" },
      payload: { amount },
    });
  }

  it("creates a center with zero balance and returns its capability", async () => {
    const { center, capability } = await createCenter("Shelter-A");
    expect(center.name).toBe("Shelter-A");
    expect(center.balance).toBe(0);
    expect(capability.centerId).toBe(center.id);
    expect(capability.id.startsWith("cap_")).toBe(true);
  });

  it("records a donation and mints a credit to the principal", async () => {
    const { center } = await createCenter("Shelter-A");

    const res = await donate(center.id, 100);
    expect(res.statusCode).toBe(201);
    const body = res.json<DonationResponse>();
    expect(body.center.balance).toBe(100);
    expect(body.center.totalContributions).toBe(100);
    expect(body.center.tokenSupply).toBe(100);
    expect(body.credit.owner).toBe("donor-1");
    expect(body.credit.quantity).toBe(100);
    expect(body.credit.epoch).toBe(7);

    const credits = await fastify.inject({ method: "GET", url: "/v1/donors/donor-1/credits" });
    expect(credits.json<CreditsResponse>().total).toBe(100);
  });

  it("transfers with the source center's capability", async () => {
    const a = await createCenter("Shelter-A");
    const b = await createCenter("Shelter-B");
    await donate(a.center.id, 100);

    const res = await fastify.inject({
      method: "POST",
      url: `/v1/centers/${a.center.id}/transfers`,
      headers: { authorization: `Bearer ${a.capability.id}` },
      payload: { toCenterId: b.center.id, amount: 40 },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json<TransferResponse>();
    expect(body.from.balance).toBe(60);
    expect(body.to.balance).toBe(40);
  });

  it("rejects a transfer presented with another center's capability", async () => {
    const a = await createCenter("Shelter-A");
    const b = await createCenter("Shelter-B");
    await donate(a.center.id, 100);

    const res = await fastify.inject({
      method: "POST",
      url: `/v1/centers/${a.center.id}/transfers`,
      headers: { authorization: `Bearer ${b.capability.id}` },
      payload: { toCenterId: b.center.id, amount: 40 },
    });

    expect(res.statusCode).toBe(403);
    expect(res.json<ErrorResponse>().error.code).toBe("UNAUTHORIZED_ACCESS");
    expect(ledger.balanceOf(a.center.id)).toBe(100);
    expect(ledger.balanceOf(b.center.id)).toBe(0);
  });

  it("rejects a withdrawal without any capability", async () => {
    const a = await createCenter("Shelter-A");
    await donate(a.center.id, 100);

    const res = await fastify.inject({
      method: "POST",
      url: `/v1/centers/${a.center.id}/withdrawals`,
      payload: { amount: 10, recipient: "supplier-1" },
    });

    expect(res.statusCode).toBe(403);
    expect(ledger.balanceOf(a.center.id)).toBe(100);
  });

  it("rejects a withdrawal larger than the balance", async () => {
    const a = await createCenter("Shelter-A");
    await donate(a.center.id, 100);

    const res = await fastify.inject({
      method: "POST",
      url: `/v1/centers/${a.center.id}/withdrawals`,
      headers: { authorization: `Bearer ${a.capability.id}` },
      payload: { amount: 150, recipient: "supplier-1" },
    });

    expect(res.statusCode).toBe(409);
    const body = res.json<ErrorResponse>();
    expect(body.error.type).toBe("ledger_error");
    expect(body.error.code).toBe("INSUFFICIENT_FUNDS");
    expect(ledger.balanceOf(a.center.id)).toBe(100);
  });

  it("withdraws within the balance", async () => {
    const a = await createCenter("Shelter-A");
    await donate(a.center.id, 100);

    const res = await fastify.inject({
      method: "POST",
      url: `/v1/centers/${a.center.id}/withdrawals`,
      headers: { authorization: `Bearer ${a.capability.id}` },
      payload: { amount: 25, recipient: "supplier-1" },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json<WithdrawalResponse>().center.balance).toBe(75);
  });

  it("maps a zero amount to INVALID_AMOUNT", async () => {
    const a = await createCenter("Shelter-A");

    const res = await donate(a.center.id, 0);
    expect(res.statusCode).toBe(400);
    expect(res.json<ErrorResponse>().error.code).toBe("INVALID_AMOUNT");
  });

  it("rejects a malformed body before it reaches the ledger", async () => {
    const a = await createCenter("Shelter-A");

    const res = await fastify.inject({
      method: "POST",
      url: `/v1/centers/${a.center.id}/donations`,
      payload: { amount: "lots" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json<ErrorResponse>().error.code).toBe("INVALID_REQUEST");
  });

  it("rejects a fractional x-epoch header", async () => {
    const a = await createCenter("Shelter-A");

    const res = await fastify.inject({
      method: "POST",
      url: `/v1/centers/${a.center.id}/donations`,
      headers: { "x-epoch": "1.5" },
      payload: { amount: 10 },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json<ErrorResponse>().error.code).toBe("INVALID_REQUEST");
    expect(ledger.balanceOf(a.center.id)).toBe(0);
  });

  it("returns 404 for an unknown center", async () => {
    const res = await fastify.inject({ method: "GET", url: "/v1/centers/ctr_missing" });
    expect(res.statusCode).toBe(404);
    expect(res.json<ErrorResponse>().error.code).toBe("CENTER_NOT_FOUND");
  });

  it("serves the journaled audit trail for a center in order", async () => {
    const a = await createCenter("Shelter-A");
    const b = await createCenter("Shelter-B");
    await donate(a.center.id, 100);
    await fastify.inject({
      method: "POST",
      url: `/v1/centers/${a.center.id}/transfers`,
      headers: { authorization: `Bearer ${a.capability.id}` },
      payload: { toCenterId: b.center.id, amount: 40 },
    });

    const res = await fastify.inject({ method: "GET", url: `/v1/centers/${a.center.id}/audit` });
    expect(res.statusCode).toBe(200);
    const body = res.json<AuditResponse>();
    expect(body.entries.map((e) => e.record.kind)).toEqual(["DonationReceived", "TokensMinted", "FundsTransferred"]);

    const forB = await fastify.inject({ method: "GET", url: `/v1/centers/${b.center.id}/audit` });
    expect(forB.json<AuditResponse>().entries.map((e) => e.record.kind)).toEqual(["FundsTransferred"]);
  });

  it("reports health and a passing verification", async () => {
    await createCenter("Shelter-A");

    const res = await fastify.inject({ method: "GET", url: "/v1/health" });
    expect(res.statusCode).toBe(200);
    const body = res.json<HealthResponse>();
    expect(body.status).toBe("ok");
    expect(body.centers).toBe(1);
    expect(body.journal).toBe(true);
  });

  it("redirects the root to health when docs are disabled", async () => {
    const res = await fastify.inject({ method: "GET", url: "/" });
    expect(res.statusCode).toBe(302);
    expect(res.headers.location).toBe("/v1/health");
  });
});

describe("operator key", () => {
  let ledger: ReliefLedger;
  let fastify: FastifyInstance;

  beforeEach(async () => {
    ledger = new ReliefLedger({ dbPath: IN_MEMORY });
    ({ fastify } = await createServer({ ledger, config: testConfig("test-secret"), logger: false }));
  });

  afterEach(async () => {
    await fastify.close();
    ledger.close();
  });

  it("rejects requests without the key", async () => {
    const res = await fastify.inject({ method: "GET", url: "/v1/centers" });
    expect(res.statusCode).toBe(401);
    expect(res.json<ErrorResponse>().error.code).toBe("INVALID_API_KEY");
  });

  it("accepts requests with the key", async () => {
    const res = await fastify.inject({
      method: "GET",
      url: "/v1/centers",
      headers: { "x-api-key": "test-secret" },
    });
    expect(res.statusCode).toBe(200);
  });

  it("leaves health public", async () => {
    const res = await fastify.inject({ method: "GET", url: "/v1/health" });
    expect(res.statusCode).toBe(200);
  });
});
