// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { describe, expect, it } from "vitest";
import { createLogger, type LogSink } from "../../src/utils/logger.js";
import { maskCapability } from "../../src/utils/security.js";

function captureSink() {
  const out: { stream: "log" | "warn" | "error"; line: string }[] = [];
  const sink: LogSink = {
    log: (line) => out.push({ stream: "log", line }),
    warn: (line) => out.push({ stream: "warn", line }),
    error: (line) => out.push({ stream: "error", line }),
  };
  return { out, sink };
}

describe("createLogger()", () => {
  it("prefixes every line with its scope", () => {
    const { out, sink } = captureSink();
    createLogger("Transfers", "INFO", sink).info("moved 40");

    expect(out).toHaveLength(1);
    expect(out[0]?.stream).toBe("log");
    expect(out[0]?.line).toContain("[Transfers] moved 40");
  });

  it("drops messages below the configured level", () => {
    const { out, sink } = captureSink();
    const logger = createLogger("Ledger", "WARNING", sink);

    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");

    expect(out.map((o) => o.stream)).toEqual(["warn", "error"]);
  });

  it("child loggers keep the level and sink under a new scope", () => {
    const { out, sink } = captureSink();
    const child = createLogger("Ledger", "ERROR", sink).child("Audit");

    child.warn("ignored");
    child.error("observer down");

    expect(child.level).toBe("ERROR");
    expect(out).toHaveLength(1);
    expect(out[0]?.line).toContain("[Audit] observer down");
  });
});

describe("maskCapability()", () => {
  it("keeps a short prefix only", () => {
    expect(maskCapability("cap_3f9a1c2e-77d0-4b6e-9f35-2a1c")).toBe("cap_3f9a***");
  });

  it("marks an empty id", () => {
    expect(maskCapability("")).toBe("(empty)");
  });
});
