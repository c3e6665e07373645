/**
 * ProductApiClient Tests
 */

import { describe, it, expect } from "vitest";
import { ProductApiClient } from "../client.js";
import { toFormData, toUpdateRequest, gamePassToProduct } from "../mapping.js";
import type { HttpTransport } from "../transport.js";
import { ApiError, ErrorCode } from "../../errors.js";

interface SentRequest {
  method: string;
  url: string;
  form: FormData | null;
}

class RecordingTransport implements HttpTransport {
  readonly sent: SentRequest[] = [];

  constructor(private readonly responses: Response[]) {}

  async send(request: Request): Promise<Response> {
    const form = request.method === "GET" ? null : await request.formData();
    this.sent.push({ method: request.method, url: request.url, form });
    const next = this.responses.shift();
    if (!next) throw new Error("unexpected request");
    return next;
  }
}

const BASE = "https://example.test";

describe("ProductApiClient", () => {
  it("fetches game passes then developer products", async () => {
    const transport = new RecordingTransport([
      Response.json({
        gamePasses: [
          {
            gamePassId: 10,
            name: "VIP",
            description: null,
            isForSale: true,
            priceInformation: { defaultPriceInRobux: 250, enabledFeatures: ["RegionalPricing"] },
          },
        ],
        nextPageToken: null,
      }),
      Response.json({
        developerProducts: [
          { productId: 20, name: "Coins", description: "A pile", isForSale: false },
        ],
      }),
    ]);
    const client = new ProductApiClient({ transport, baseUrl: BASE });

    const remote = await client.fetchRemoteCatalog(7);

    expect(transport.sent.map((request) => new URL(request.url).pathname)).toEqual([
      "/game-passes/v1/universes/7/game-passes/creator",
      "/developer-products/v2/universes/7/developer-products/creator",
    ]);
    expect(remote.gamepasses).toEqual([
      { id: 10, name: "VIP", description: undefined, active: true, price: 250, regionalPricing: true },
    ]);
    expect(remote.products).toEqual([
      { id: 20, name: "Coins", description: "A pile", active: false, price: 0, regionalPricing: undefined },
    ]);
  });

  it("creates a developer product and returns its id", async () => {
    const transport = new RecordingTransport([
      Response.json({ productId: 99, name: "Coins", isForSale: true }),
    ]);
    const client = new ProductApiClient({ transport, baseUrl: BASE });

    const id = await client.createProduct("product", 7, {
      name: "Coins",
      description: "A pile",
      isForSale: true,
      price: 50,
    });

    expect(id).toBe(99);
    const [request] = transport.sent;
    expect(request?.method).toBe("POST");
    expect(request?.url).toBe(`${BASE}/developer-products/v2/universes/7/developer-products`);
    expect(request?.form?.get("name")).toBe("Coins");
    expect(request?.form?.get("description")).toBe("A pile");
    expect(request?.form?.get("isForSale")).toBe("true");
    expect(request?.form?.get("price")).toBe("50");
  });

  it("patches a game pass by id", async () => {
    const transport = new RecordingTransport([new Response(null, { status: 204 })]);
    const client = new ProductApiClient({ transport, baseUrl: `${BASE}/` });

    await client.updateProduct("gamepass", 7, 10, { name: "VIP", isRegionalPricingEnabled: false });

    const [request] = transport.sent;
    expect(request?.method).toBe("PATCH");
    expect(request?.url).toBe(`${BASE}/game-passes/v1/universes/7/game-passes/10`);
    expect(request?.form?.get("isRegionalPricingEnabled")).toBe("false");
  });

  it("throws ApiError with the status of a failed update", async () => {
    const transport = new RecordingTransport([new Response("denied", { status: 403 })]);
    const client = new ProductApiClient({ transport, baseUrl: BASE });

    const error = await client
      .updateProduct("product", 7, 20, { name: "Coins" })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      code: ErrorCode.API_REQUEST_FAILED,
      status: 403,
      message: "API error 403: denied",
    });
  });
});

describe("toFormData", () => {
  it("omits a zero price and undefined fields", () => {
    const form = toFormData({ name: "Free pass", price: 0, isForSale: false });

    expect([...form.keys()]).toEqual(["name", "isForSale"]);
  });
});

describe("toUpdateRequest", () => {
  it("sends the discounted price", () => {
    const request = toUpdateRequest({ name: "VIP", active: true, price: 1000, discount: 20 });

    expect(request).toEqual({
      name: "VIP",
      description: undefined,
      isForSale: true,
      price: 800,
      isRegionalPricingEnabled: undefined,
    });
  });

  it("includes the regular prefix when not discounted", () => {
    const product = gamePassToProduct({ gamePassId: 1, name: "VIP", isForSale: true });

    expect(toUpdateRequest({ ...product, prefix: "[NEW]" }).name).toBe("[NEW] VIP");
  });
});
