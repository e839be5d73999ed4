/**
 * USDA FoodData Central: food name → raw nutrient record of the best search hit.
 * https://api.nal.usda.gov/fdc/v1/
 */

import type { RawNutrientAmount } from "interaction-core";
import { z } from "zod";
import type { PredictorConfig } from "./config.js";
import { UpstreamUnavailableError, toUpstreamError } from "./errors.js";
import { fetchWithRetry } from "./fetchWithRetry.js";

const FDC_BASE = "https://api.nal.usda.gov/fdc/v1/";

const SearchResponse = z.object({
  foods: z.array(z.object({ fdcId: z.number(), description: z.string().optional() })).optional(),
});

// Full detail records nest the id under `nutrient`; abridged ones use nutrientId/value.
const DetailResponse = z.object({
  description: z.string().optional(),
  foodNutrients: z
    .array(
      z.object({
        nutrient: z.object({ id: z.number().optional() }).optional(),
        nutrientId: z.number().optional(),
        amount: z.number().nullable().optional(),
        value: z.number().nullable().optional(),
      })
    )
    .default([]),
});

export interface FoodNutrientRecord {
  food_name: string;
  fdc_id: number;
  description: string | null;
  nutrients: RawNutrientAmount[];
}

export interface NutrientSource {
  fetchNutrients(foodName: string): Promise<FoodNutrientRecord>;
}

export function createNutrientSource(config: Pick<PredictorConfig, "USDA_API_KEY" | "USDA_TIMEOUT_MS">): NutrientSource {
  const retry = { maxRetries: 2, initialMs: 500, timeoutMs: config.USDA_TIMEOUT_MS };

  async function getJson(path: string, params: Record<string, string>, foodName: string): Promise<unknown> {
    const url = new URL(path, FDC_BASE);
    url.searchParams.set("api_key", config.USDA_API_KEY);
    for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);
    const res = await fetchWithRetry(url.toString(), { headers: { Accept: "application/json" } }, retry);
    if (res.status === 404) throw new UpstreamUnavailableError("usda", "not_found", `Food '${foodName}' not found`);
    if (!res.ok) throw new UpstreamUnavailableError("usda", "upstream_error", `USDA API returned HTTP ${res.status}`);
    return res.json();
  }

  return {
    async fetchNutrients(foodName) {
      const query = foodName.trim();
      if (!query) throw new UpstreamUnavailableError("usda", "not_found", "Food name is empty");
      try {
        const search = SearchResponse.safeParse(await getJson("foods/search", { query, pageSize: "1" }, query));
        if (!search.success) throw new UpstreamUnavailableError("usda", "upstream_error", "Unexpected USDA search response");
        const hit = search.data.foods?.[0];
        if (!hit) throw new UpstreamUnavailableError("usda", "not_found", `Food '${query}' not found`);

        const detail = DetailResponse.safeParse(await getJson(`food/${hit.fdcId}`, {}, query));
        if (!detail.success) throw new UpstreamUnavailableError("usda", "upstream_error", "Unexpected USDA food response");

        const nutrients: RawNutrientAmount[] = [];
        for (const n of detail.data.foodNutrients) {
          const identifier = n.nutrient?.id ?? n.nutrientId;
          if (identifier === undefined) continue;
          nutrients.push({ identifier, amount: n.amount ?? n.value ?? null });
        }
        return {
          food_name: foodName,
          fdc_id: hit.fdcId,
          description: detail.data.description ?? hit.description ?? null,
          nutrients,
        };
      } catch (err) {
        throw toUpstreamError("usda", err);
      }
    },
  };
}
