/**
 * Name-based prediction: look up both sides, normalize, score.
 * Upstream failures propagate as UpstreamUnavailableError; scoring never fails.
 */

import {
  normalizeDrugAttributes,
  normalizeFoodAttributes,
  predictInteraction,
  type ClassifierBundle,
  type DescriptorName,
  type FoodAttributes,
  type InteractionEffect,
  type PredictOptions,
  type Scorer,
} from "interaction-core";
import type { DescriptorSource } from "./descriptors.js";
import type { NutrientSource } from "./usda.js";

export interface PredictorDeps {
  descriptors: DescriptorSource;
  nutrients: NutrientSource;
  bundle: ClassifierBundle;
  predictOptions?: PredictOptions;
}

export interface InteractionReport {
  drug_name: string;
  food_name: string;
  canonical_smiles: string;
  effect: InteractionEffect;
  confidence: number;
  explanation: string;
  scorer: Scorer;
  drug_properties: Record<DescriptorName, number>;
  food_nutrients: FoodAttributes;
}

export async function predictForNames(
  drugName: string,
  foodName: string,
  deps: PredictorDeps
): Promise<InteractionReport> {
  const [drug, food] = await Promise.all([
    deps.descriptors.fetchDescriptors(drugName),
    deps.nutrients.fetchNutrients(foodName),
  ]);
  const drugAttributes = normalizeDrugAttributes(drug.descriptors);
  const foodAttributes = normalizeFoodAttributes(food.nutrients);
  const prediction = predictInteraction(drugAttributes, foodAttributes, deps.bundle, deps.predictOptions);

  return {
    drug_name: drugName,
    food_name: foodName,
    canonical_smiles: drug.canonical_smiles,
    effect: prediction.effect,
    confidence: prediction.confidence,
    explanation: prediction.explanation,
    scorer: prediction.scorer,
    drug_properties: { ...drugAttributes.descriptors },
    food_nutrients: foodAttributes,
  };
}
