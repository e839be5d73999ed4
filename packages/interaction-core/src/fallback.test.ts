import { describe, it, expect } from "vitest";
import { scoreWithRules } from "./fallback.js";
import { foodAttributesFrom, normalizeDrugAttributes } from "./normalize.js";

const drug = normalizeDrugAttributes({});
const deterministic = { overrideProbability: 0 };

function sequence(...values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length];
}

describe("scoreWithRules", () => {
  it("flags high vitamin K as a possible interaction", () => {
    const food = foodAttributesFrom({ Vitamin_K_ug: 150, Calcium: 50 });
    expect(scoreWithRules(drug, food, deterministic)).toEqual({ effect: "possible", confidence: 0.68 });
  });

  it("flags high calcium with confidence 0.65", () => {
    const food = foodAttributesFrom({ Vitamin_K_ug: 0, Calcium: 200 });
    expect(scoreWithRules(drug, food, deterministic)).toEqual({ effect: "possible", confidence: 0.65 });
  });

  it("keeps the vitamin K confidence when both thresholds are exceeded", () => {
    const food = foodAttributesFrom({ Vitamin_K_ug: 101, Calcium: 151 });
    expect(scoreWithRules(drug, food, deterministic)).toEqual({ effect: "possible", confidence: 0.68 });
  });

  it("reports no effect below both thresholds", () => {
    const food = foodAttributesFrom({ Vitamin_K_ug: 100, Calcium: 150 });
    expect(scoreWithRules(drug, food, deterministic)).toEqual({ effect: "no effect", confidence: 0.75 });
  });

  it("keeps the rule result when the override draw misses", () => {
    const food = foodAttributesFrom({ Vitamin_K_ug: 0, Calcium: 0 });
    expect(scoreWithRules(drug, food, { random: sequence(0.5) })).toEqual({ effect: "no effect", confidence: 0.75 });
  });

  it("replaces the rule result with a random draw when the override hits", () => {
    const food = foodAttributesFrom({ Vitamin_K_ug: 150 });
    const scored = scoreWithRules(drug, food, { random: sequence(0.9, 0.6, 0.5) });
    expect(scored.effect).toBe("positive");
    expect(scored.confidence).toBeCloseTo(0.76, 12);
  });

  it("keeps override confidence inside [0.60, 0.92)", () => {
    const food = foodAttributesFrom({});
    for (const r of [0.25, 0.5, 0.999999]) {
      const scored = scoreWithRules(drug, food, { overrideProbability: 1, random: sequence(r) });
      expect(scored.confidence).toBeGreaterThanOrEqual(0.6);
      expect(scored.confidence).toBeLessThan(0.92);
    }
    expect(scoreWithRules(drug, food, { overrideProbability: 1, random: sequence(0.999999) }).effect).toBe("harmful");
  });
});
