/**
 * Luau export tests
 */

import { describe, it, expect } from "vitest";
import { EXPORT_HEADER, luauString, renderLuauExport } from "../luau-export.js";
import type { Catalog } from "../models.js";

describe("renderLuauExport", () => {
  it("renders both tables sorted by id", () => {
    const catalog: Catalog = {
      metadata: { universeId: 1 },
      gamepasses: new Map([
        ["vip", { id: 30, name: "VIP", prefix: "⭐", active: true, price: 500 }],
        ["speed", { id: 12, name: "Speed", active: true, price: 100, discount: 50 }],
      ]),
      products: new Map([["coins", { id: 7, name: "Coins", active: true, price: 25 }]]),
    };

    expect(renderLuauExport(catalog)).toBe(
      [
        EXPORT_HEADER,
        "export type Product = { id: number, price: number }",
        "",
        "return {",
        "\tGamepasses = {",
        '\t\t["Speed"] = { id = 12, price = 50 },',
        '\t\t["⭐ VIP"] = { id = 30, price = 500 }',
        "\t} :: {[string]: Product},",
        "",
        "\tProducts = {",
        '\t\t["Coins"] = { id = 7, price = 25 }',
        "\t} :: {[string]: Product}",
        "}",
        "",
      ].join("\n")
    );
  });

  it("renders empty tables", () => {
    const catalog: Catalog = { metadata: { universeId: 1 }, gamepasses: new Map(), products: new Map() };

    expect(renderLuauExport(catalog)).toContain("\tGamepasses = {\n\t} :: {[string]: Product},\n");
  });
});

describe("luauString", () => {
  it("escapes quotes, backslashes and control characters", () => {
    expect(luauString('Say "hi"\\')).toBe('"Say \\"hi\\"\\\\"');
    expect(luauString("a\nb\tc")).toBe('"a\\nb\\tc"');
    expect(luauString("bell\u0007")).toBe('"bell\\7"');
  });
});
