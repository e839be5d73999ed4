/**
 * Rule-based scorer used when the classifier cannot answer.
 * Two named nutrient thresholds, then an optional randomized override kept for the
 * original demo behaviour. Set `overrideProbability` to 0 for fully deterministic output.
 */

import type { DrugAttributes, FoodAttributes, InteractionEffect, ScoredEffect } from "./types.js";

/** Vitamin K interferes with anticoagulant therapy (µg). */
export const VITAMIN_K_THRESHOLD_UG = 100;
/** High calcium may reduce absorption (mg). */
export const CALCIUM_THRESHOLD_MG = 150;

export const DEFAULT_OVERRIDE_PROBABILITY = 0.3;

export const OVERRIDE_EFFECTS: readonly InteractionEffect[] = ["no effect", "possible", "positive", "harmful"];
const OVERRIDE_MIN_CONFIDENCE = 0.6;
const OVERRIDE_MAX_CONFIDENCE = 0.92;

export interface FallbackOptions {
  /** Chance in [0, 1] of replacing the rule result with a random one. */
  overrideProbability?: number;
  /** Uniform source in [0, 1); defaults to Math.random. */
  random?: () => number;
}

export function scoreWithRules(
  _drug: DrugAttributes,
  food: FoodAttributes,
  options: FallbackOptions = {}
): ScoredEffect {
  const { overrideProbability = DEFAULT_OVERRIDE_PROBABILITY, random = Math.random } = options;

  let effect: InteractionEffect = "no effect";
  let confidence = 0.75;

  if (food.Vitamin_K_ug > VITAMIN_K_THRESHOLD_UG) {
    effect = "possible";
    confidence = 0.68;
  }

  if (food.Calcium > CALCIUM_THRESHOLD_MG) {
    if (effect === "no effect") effect = "possible";
    confidence = Math.max(0.65, confidence);
  }

  if (overrideProbability > 0 && random() > 1 - overrideProbability) {
    const pick = Math.min(Math.floor(random() * OVERRIDE_EFFECTS.length), OVERRIDE_EFFECTS.length - 1);
    effect = OVERRIDE_EFFECTS[pick];
    confidence = OVERRIDE_MIN_CONFIDENCE + random() * (OVERRIDE_MAX_CONFIDENCE - OVERRIDE_MIN_CONFIDENCE);
  }

  return { effect, confidence };
}
