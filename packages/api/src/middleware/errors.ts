// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/middleware/errors.ts
// Maps ledger rejections and validation failures onto HTTP responses.

import type { FastifyError, FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";
import { ReliefLedgerError, type ReliefLedgerErrorCode } from "@reliefledger/core";

import type { ErrorResponse } from "../types.js";

export const STATUS_BY_CODE: Record<ReliefLedgerErrorCode, number> = {
  INVALID_AMOUNT: 400,
  INSUFFICIENT_FUNDS: 409,
  UNAUTHORIZED_ACCESS: 403,
  CENTER_NOT_FOUND: 404,
  INVALID_CONTEXT: 400,
  CONFIGURATION_ERROR: 500,
};

const errorsPlugin: FastifyPluginAsync = async (fastify) => {
  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof ReliefLedgerError) {
      request.log.info({ code: error.code }, error.message);
      return reply.code(STATUS_BY_CODE[error.code]).send({
        error: { type: "ledger_error", code: error.code, message: error.message },
      } satisfies ErrorResponse);
    }

    if (error.validation) {
      return reply.code(400).send({
        error: { type: "validation_error", code: "INVALID_REQUEST", message: error.message },
      } satisfies ErrorResponse);
    }

    request.log.error(error);
    return reply.code(500).send({
      error: { type: "internal_error", code: "INTERNAL", message: "Internal server error" },
    } satisfies ErrorResponse);
  });
};

export default fp(errorsPlugin, { name: "reliefledger-errors" });
