/**
 * Downloader Tests
 */

import { describe, it, expect } from "vitest";
import { Downloader } from "../downloader.js";
import type { Catalog } from "../../catalog/models.js";
import { FakeProductApi, InMemoryCatalogRepository } from "./fakes.js";

function localCatalog(): Catalog {
  return {
    metadata: { universeId: 1, luauFile: "Products.luau" },
    gamepasses: new Map([
      ["vip", { id: 42, name: "VIP", description: "Lounge access", active: true, price: 500 }],
    ]),
    products: new Map(),
  };
}

describe("Downloader", () => {
  it("merges remote products into the catalog and saves it", async () => {
    const repository = new InMemoryCatalogRepository(localCatalog());
    const api = new FakeProductApi({
      gamepasses: [{ id: 42, name: "VIP", description: "####", active: false, price: 450 }],
      products: [{ id: 7, name: "💲10% OFF💲 Gem Pack", active: true, price: 90 }],
    });

    const result = await new Downloader({ api, repository }).download({ overwrite: false });

    expect(result).toEqual({
      added: [{ kind: "product", key: "gem-pack" }],
      matched: 1,
      remoteTotal: 2,
      exportPath: "/virtual/Products.luau",
    });

    const saved = repository.current();
    expect(saved.gamepasses.get("vip")).toMatchObject({
      description: "Lounge access",
      active: false,
      price: 500,
    });
    expect(saved.products.get("gem-pack")).toMatchObject({ id: 7, name: "Gem Pack", price: 90 });
    expect(repository.saves).toHaveLength(1);
    expect(repository.exports).toBe(1);
  });

  it("takes remote prices with overwrite", async () => {
    const repository = new InMemoryCatalogRepository(localCatalog());
    const api = new FakeProductApi({
      gamepasses: [{ id: 42, name: "VIP", active: true, price: 450 }],
      products: [],
    });

    await new Downloader({ api, repository }).download({ overwrite: true });

    expect(repository.current().gamepasses.get("vip")?.price).toBe(450);
  });
});
