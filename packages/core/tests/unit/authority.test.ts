// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { authorize, requireAuthorization, resolveCapability } from "../../src/authority/authority.js";
import { LedgerStore } from "../../src/store/store.js";
import { IN_MEMORY, openDatabase } from "../../src/store/database.js";
import { UnauthorizedAccessError } from "../../src/exceptions.js";

describe("Capability authority", () => {
  let store: LedgerStore;

  beforeEach(() => {
    store = new LedgerStore(openDatabase(IN_MEMORY));
  });

  afterEach(() => {
    store.close();
  });

  describe("authorize()", () => {
    it("accepts the capability issued for the center", () => {
      const { center, capability } = store.createCenter("A");
      expect(authorize(capability, center)).toBe(true);
    });

    it("rejects a capability bound to another center", () => {
      const a = store.createCenter("A");
      const b = store.createCenter("B");
      expect(authorize(b.capability, a.center)).toBe(false);
    });

    it("compares ids, not names", () => {
      const a = store.createCenter("Same name");
      const b = store.createCenter("Same name");
      expect(authorize(b.capability, a.center)).toBe(false);
    });

    it("fails closed on missing or empty bindings", () => {
      const { center } = store.createCenter("A");
      expect(authorize(null, center)).toBe(false);
      expect(authorize(undefined, center)).toBe(false);
      expect(authorize({ id: "cap_x", centerId: "" }, center)).toBe(false);
    });
  });

  it("requireAuthorization() throws UnauthorizedAccessError carrying the target id", () => {
    const a = store.createCenter("A");
    const b = store.createCenter("B");

    expect(() => requireAuthorization(b.capability, a.center)).toThrow(UnauthorizedAccessError);
    try {
      requireAuthorization(b.capability, a.center);
    } catch (err) {
      expect(err).toBeInstanceOf(UnauthorizedAccessError);
      if (err instanceof UnauthorizedAccessError) {
        expect(err.centerId).toBe(a.center.id);
        expect(err.code).toBe("UNAUTHORIZED_ACCESS");
      }
    }
  });

  describe("resolveCapability()", () => {
    it("resolves an issued capability id to its stored binding", () => {
      const { capability } = store.createCenter("A");
      expect(resolveCapability(store, capability.id)).toEqual(capability);
      expect(resolveCapability(store, capability)).toEqual(capability);
    });

    it("rejects an id that was never issued", () => {
      const { center } = store.createCenter("A");
      expect(resolveCapability(store, { id: "cap_forged", centerId: center.id })).toBeNull();
      expect(resolveCapability(store, "cap_forged")).toBeNull();
    });

    it("rejects a real id presented with a rewritten binding", () => {
      const a = store.createCenter("A");
      const b = store.createCenter("B");
      expect(resolveCapability(store, { id: b.capability.id, centerId: a.center.id })).toBeNull();
    });
  });
});
