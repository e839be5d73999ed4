/**
 * Prediction entry point. Uses the classifier when the bundle has both a model and a
 * label decoder; any classifier failure falls back to the rule scorer and is logged,
 * never thrown.
 */

import { isClassifierReady, scoreWithClassifier, type ClassifierBundle } from "./classifier.js";
import { explainPrediction } from "./explanation.js";
import { scoreWithRules, type FallbackOptions } from "./fallback.js";
import { assembleFeatureVector, defaultFeatureOrder } from "./featureVector.js";
import type { DrugAttributes, FoodAttributes, PredictionResult, ScoredEffect, Scorer } from "./types.js";

export interface PredictOptions {
  fallback?: FallbackOptions;
}

function toResult(scored: ScoredEffect, scorer: Scorer): PredictionResult {
  const confidence = Math.min(1, Math.max(0, scored.confidence));
  return Object.freeze({
    effect: scored.effect,
    confidence,
    explanation: explainPrediction(scored.effect, confidence),
    scorer,
  });
}

export function predictInteraction(
  drug: DrugAttributes,
  food: FoodAttributes,
  bundle: ClassifierBundle,
  options: PredictOptions = {}
): PredictionResult {
  if (isClassifierReady(bundle)) {
    const vector = assembleFeatureVector(drug, food, bundle.featureOrder ?? defaultFeatureOrder());
    const outcome = scoreWithClassifier(vector, bundle);
    if (outcome.ok) return toResult(outcome, "classifier");
    console.warn(`predictInteraction: classifier unavailable (${outcome.reason}); using rule scorer`);
  }
  return toResult(scoreWithRules(drug, food, options.fallback), "rules");
}
