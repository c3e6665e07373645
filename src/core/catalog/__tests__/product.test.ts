/**
 * Product derived-value tests
 */

import { describe, it, expect } from "vitest";
import {
  DEFAULT_DISCOUNT_PREFIX,
  applyDiscountPrefix,
  effectivePrice,
  effectiveTitle,
  formatDiscountPrefix,
  normalizeProduct,
  uploadTitle,
} from "../product.js";
import type { Product } from "../models.js";

const vip: Product = { name: "VIP", active: true, price: 1000 };

describe("effectivePrice", () => {
  it("returns the base price without a discount", () => {
    expect(effectivePrice(vip)).toBe(1000);
    expect(effectivePrice({ ...vip, discount: 0 })).toBe(1000);
  });

  it("rounds the discounted price down", () => {
    expect(effectivePrice({ ...vip, discount: 20 })).toBe(800);
    expect(effectivePrice({ ...vip, price: 99, discount: 15 })).toBe(84);
    expect(effectivePrice({ ...vip, discount: 100 })).toBe(0);
  });
});

describe("effectiveTitle", () => {
  it("joins prefix and name", () => {
    expect(effectiveTitle({ ...vip, prefix: "⭐" })).toBe("⭐ VIP");
  });

  it("drops the prefix while discounted", () => {
    expect(effectiveTitle({ ...vip, prefix: "⭐", discount: 10 })).toBe("VIP");
  });
});

describe("applyDiscountPrefix", () => {
  it("prepends the formatted default template", () => {
    const discounted = applyDiscountPrefix({ ...vip, discount: 20 });

    expect(discounted.name).toBe("💲20% OFF💲 VIP");
    expect(vip.name).toBe("VIP");
  });

  it("leaves undiscounted products alone", () => {
    expect(applyDiscountPrefix({ ...vip, discount: 0 }, "SALE {}%").name).toBe("VIP");
  });

  it("trims trailing whitespace from the template", () => {
    expect(formatDiscountPrefix("[{}% OFF] ", 5)).toBe("[5% OFF]");
  });

  it("yields the uploaded title", () => {
    expect(uploadTitle({ ...vip, prefix: "⭐", discount: 20 }, DEFAULT_DISCOUNT_PREFIX)).toBe(
      "💲20% OFF💲 VIP"
    );
    expect(uploadTitle({ ...vip, prefix: "⭐" })).toBe("⭐ VIP");
  });
});

describe("normalizeProduct", () => {
  it("drops a false regional pricing flag", () => {
    expect("regionalPricing" in normalizeProduct({ ...vip, regionalPricing: false })).toBe(false);
    expect(normalizeProduct({ ...vip, regionalPricing: true }).regionalPricing).toBe(true);
  });
});
