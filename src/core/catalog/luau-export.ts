/**
 * Generated Luau module mapping each product's display title to its id and
 * effective price, for use from game scripts.
 */

import type { Catalog, Product } from "./models.js";
import { effectivePrice, effectiveTitle } from "./product.js";

export const EXPORT_HEADER =
  "-- This file is automatically generated by product-sync. Do not edit this file directly.";

export function renderLuauExport(catalog: Catalog): string {
  const lines: string[] = [
    EXPORT_HEADER,
    "export type Product = { id: number, price: number }",
    "",
    "return {",
    "\tGamepasses = {",
    ...renderEntries(catalog.gamepasses),
    "\t} :: {[string]: Product},",
    "",
    "\tProducts = {",
    ...renderEntries(catalog.products),
    "\t} :: {[string]: Product}",
    "}",
  ];
  return `${lines.join("\n")}\n`;
}

function renderEntries(products: Map<string, Product>): string[] {
  const sorted = [...products.values()].sort((a, b) => (a.id ?? 0) - (b.id ?? 0));

  return sorted.map((product, index) => {
    const entry = `\t\t[${luauString(effectiveTitle(product))}] = { id = ${product.id ?? 0}, price = ${effectivePrice(product)} }`;
    return index < sorted.length - 1 ? `${entry},` : entry;
  });
}

/**
 * Double-quoted Luau string literal.
 */
export function luauString(value: string): string {
  let out = '"';
  for (const char of value) {
    switch (char) {
      case "\\":
        out += "\\\\";
        break;
      case '"':
        out += '\\"';
        break;
      case "\n":
        out += "\\n";
        break;
      case "\r":
        out += "\\r";
        break;
      case "\t":
        out += "\\t";
        break;
      default: {
        const code = char.codePointAt(0) ?? 0;
        out += code < 0x20 || code === 0x7f ? `\\${code}` : char;
      }
    }
  }
  return `${out}"`;
}
