import { afterEach, describe, it, expect, vi } from "vitest";
import { createNutrientSource } from "./usda.js";
import { json, mockFetch } from "./__fixtures__/http.js";

const source = createNutrientSource({ USDA_API_KEY: "test-key", USDA_TIMEOUT_MS: 8000 });

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("createNutrientSource", () => {
  it("searches, then reads nutrients from the first hit's detail record", async () => {
    const fetchMock = mockFetch((url) => {
      const { pathname } = new URL(url);
      if (pathname.endsWith("/foods/search")) return json({ foods: [{ fdcId: 168462, description: "Spinach, raw" }] });
      if (pathname.endsWith("/food/168462")) {
        return json({
          description: "Spinach, raw",
          foodNutrients: [
            { nutrient: { id: 1185 }, amount: 482.9 },
            { nutrient: { id: 1087 }, amount: 99 },
            { nutrientId: 1003, value: 2.86 },
            { nutrient: { id: 1106 }, amount: null },
            { nutrient: {} },
          ],
        });
      }
      return json({}, 404);
    });

    const record = await source.fetchNutrients("spinach");
    expect(record).toEqual({
      food_name: "spinach",
      fdc_id: 168462,
      description: "Spinach, raw",
      nutrients: [
        { identifier: 1185, amount: 482.9 },
        { identifier: 1087, amount: 99 },
        { identifier: 1003, amount: 2.86 },
        { identifier: 1106, amount: null },
      ],
    });

    const search = new URL(String(fetchMock.mock.calls[0][0]));
    expect(search.origin + search.pathname).toBe("https://api.nal.usda.gov/fdc/v1/foods/search");
    expect(search.searchParams.get("api_key")).toBe("test-key");
    expect(search.searchParams.get("query")).toBe("spinach");
    expect(search.searchParams.get("pageSize")).toBe("1");
  });

  it("reports an empty search as not found", async () => {
    mockFetch(() => json({ foods: [] }));
    await expect(source.fetchNutrients("moon cheese")).rejects.toMatchObject({
      source: "usda",
      reason: "not_found",
      message: "Food 'moon cheese' not found",
    });
  });

  it("reports rejected API keys as upstream errors", async () => {
    mockFetch(() => json({ error: { code: "API_KEY_INVALID" } }, 403));
    await expect(source.fetchNutrients("spinach")).rejects.toMatchObject({
      source: "usda",
      reason: "upstream_error",
      message: "USDA API returned HTTP 403",
    });
  });
});
