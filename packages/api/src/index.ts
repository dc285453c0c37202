// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/index.ts
// Public API surface for @reliefledger/api

export { createServer, startServer } from "./server.js";
export { STATUS_BY_CODE } from "./middleware/errors.js";
export { currentEpoch, operationContext, presentedCapability } from "./middleware/context.js";
export type * from "./types.js";
