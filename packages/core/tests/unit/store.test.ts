// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LedgerStore } from "../../src/store/store.js";
import { IN_MEMORY, openDatabase } from "../../src/store/database.js";
import { CenterNotFoundError } from "../../src/exceptions.js";

describe("LedgerStore", () => {
  let store: LedgerStore;

  beforeEach(() => {
    store = new LedgerStore(openDatabase(IN_MEMORY));
  });

  afterEach(() => {
    store.close();
  });

  describe("createCenter()", () => {
    it("starts every counter at zero", () => {
      const { center } = store.createCenter("Shelter-A");

      expect(center.name).toBe("Shelter-A");
      expect(store.balanceOf(center.id)).toBe(0);
      expect(store.totalContributions(center.id)).toBe(0);
      expect(store.tokenSupply(center.id)).toBe(0);
    });

    it("issues exactly one capability bound to the new center", () => {
      const { center, capability } = store.createCenter("Shelter-A");

      expect(capability.centerId).toBe(center.id);
      expect(capability.id.startsWith("cap_")).toBe(true);
      expect(store.getCapability(capability.id)).toEqual(capability);
    });

    it("gives two centers with the same name distinct ids and capabilities", () => {
      const a = store.createCenter("Kitchen");
      const b = store.createCenter("Kitchen");

      expect(a.center.id).not.toBe(b.center.id);
      expect(a.capability.id).not.toBe(b.capability.id);
      expect(store.listCenters().map((c) => c.id)).toEqual([a.center.id, b.center.id]);
    });
  });

  it("returns null for a capability id that was never issued", () => {
    expect(store.getCapability("cap_never-issued")).toBeNull();
  });

  it("throws CenterNotFoundError for an unknown center", () => {
    expect(() => store.balanceOf("missing")).toThrow(CenterNotFoundError);
    expect(store.getCenter("missing")).toBeNull();
  });

  it("rolls back every write when a transaction throws", () => {
    const { center } = store.createCenter("Shelter-A");

    expect(() =>
      store.transaction(() => {
        store.saveCenter({ ...center, balance: 50, totalContributions: 50, tokenSupply: 50 });
        throw new Error("boom");
      }),
    ).toThrow("boom");

    expect(store.getCenter(center.id)).toEqual(center);
  });

  it("refuses to persist a negative balance", () => {
    const { center } = store.createCenter("Shelter-A");

    expect(() => store.saveCenter({ ...center, balance: -1 })).toThrow(/CHECK constraint failed/);
    expect(store.balanceOf(center.id)).toBe(0);
  });

  it("lists credits by owner and by center in issue order", () => {
    const a = store.createCenter("A").center;
    const b = store.createCenter("B").center;

    store.insertCredit({ id: "c1", centerId: a.id, owner: "dana", quantity: 10, epoch: 1 });
    store.insertCredit({ id: "c2", centerId: b.id, owner: "dana", quantity: 20, epoch: 2 });
    store.insertCredit({ id: "c3", centerId: a.id, owner: "eli", quantity: 5, epoch: 2 });

    expect(store.creditsOwnedBy("dana").map((c) => c.id)).toEqual(["c1", "c2"]);
    expect(store.creditsIssuedAgainst(a.id)).toEqual([
      { id: "c1", centerId: a.id, owner: "dana", quantity: 10, epoch: 1 },
      { id: "c3", centerId: a.id, owner: "eli", quantity: 5, epoch: 2 },
    ]);
  });

  it("reports a token supply that disagrees with issued credits", () => {
    const { center } = store.createCenter("A");
    store.saveCenter({ ...center, balance: 10, totalContributions: 10, tokenSupply: 10 });

    expect(store.findSupplyMismatches()).toEqual([
      { id: center.id, tokenSupply: 10, totalContributions: 10, issued: 0 },
    ]);
    expect(store.findNegativeBalances()).toEqual([]);
  });
});
