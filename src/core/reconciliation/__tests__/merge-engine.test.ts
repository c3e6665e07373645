/**
 * Merge Engine Tests
 */

import { describe, it, expect } from "vitest";
import { mergeProduct, mergeRemoteCatalog, newKey } from "../merge-engine.js";
import type { Catalog, Product } from "../../catalog/models.js";

const local: Product = {
  id: 42,
  name: "VIP",
  prefix: "⭐",
  description: "Local copy",
  active: true,
  discount: 20,
  price: 1000,
  regionalPricing: true,
};

const remote: Product = {
  id: 42,
  name: "💲20% OFF💲 VIP Lounge",
  description: "Remote copy",
  active: false,
  price: 800,
};

describe("mergeProduct", () => {
  it("keeps locally owned fields without overwrite", () => {
    expect(mergeProduct(remote, local, { overwrite: false })).toEqual({
      id: 42,
      name: "VIP",
      prefix: "⭐",
      description: "Local copy",
      active: false,
      discount: 20,
      price: 1000,
      regionalPricing: true,
    });
  });

  it("takes remote values with overwrite but keeps an active discount", () => {
    expect(mergeProduct(remote, local, { overwrite: true })).toEqual({
      id: 42,
      name: "VIP Lounge",
      prefix: undefined,
      description: "Remote copy",
      active: false,
      discount: 20,
      price: 800,
    });
  });

  it("never adopts a censored remote description", () => {
    const merged = mergeProduct({ ...remote, description: "#### ##" }, local, { overwrite: true });

    expect(merged.description).toBe("Local copy");
  });

  it("drops an inactive discount", () => {
    expect(mergeProduct(remote, { ...local, discount: 0 }, { overwrite: false }).discount).toBeUndefined();
  });

  it("builds a new product from the remote record alone", () => {
    expect(mergeProduct(remote, undefined, { overwrite: false })).toEqual({
      id: 42,
      name: "VIP Lounge",
      prefix: undefined,
      description: "Remote copy",
      active: false,
      discount: undefined,
      price: 800,
    });
  });
});

describe("mergeRemoteCatalog", () => {
  function catalog(): Catalog {
    return {
      metadata: { universeId: 1 },
      gamepasses: new Map([["vip", { ...local }]]),
      products: new Map([["coins", { name: "Coins", active: true, price: 5 }]]),
    };
  }

  it("updates matches in place and adds new records under slug keys", () => {
    const result = mergeRemoteCatalog(
      catalog(),
      {
        gamepasses: [remote, { id: 43, name: "[NEW] Speed Boost", active: true, price: 50 }],
        products: [{ id: 7, name: "Coins", active: true, price: 5 }],
      },
      { overwrite: false }
    );

    expect(result.matched).toBe(1);
    expect(result.added).toEqual([
      { kind: "gamepass", key: "speed-boost" },
      { kind: "product", key: "coins-2" },
    ]);
    expect([...result.catalog.gamepasses.keys()]).toEqual(["vip", "speed-boost"]);
    expect(result.catalog.gamepasses.get("vip")?.active).toBe(false);
    expect(result.catalog.products.get("coins-2")?.id).toBe(7);
  });

  it("leaves the input catalog untouched", () => {
    const input = catalog();

    mergeRemoteCatalog(input, { gamepasses: [remote], products: [] }, { overwrite: true });

    expect(input.gamepasses.get("vip")).toEqual(local);
  });
});

describe("newKey", () => {
  it("falls back to kind and id when the name has no usable characters", () => {
    expect(newKey({ id: 9, name: "⭐⭐", active: true, price: 1 }, "gamepass")).toBe("gamepass-9");
  });
});
