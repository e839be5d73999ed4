/**
 * Classifier adapter: feature vector + bundle → (label, confidence), or a reason why the
 * classifier could not answer. Never throws; one attempt per call.
 */

import type { FeatureOrder } from "./featureVector.js";
import { isInteractionEffect, type InteractionEffect } from "./types.js";

export interface ProbabilisticClassifier {
  readonly numClasses: number;
  /** One probability per class index for a single input row. */
  predictProba(row: readonly number[]): number[];
}

/** Maps class indices back to label strings (scikit-learn LabelEncoder.classes_). */
export interface LabelDecoder {
  readonly classes: readonly string[];
  inverseTransform(index: number): string;
}

export function createLabelDecoder(classes: readonly string[]): LabelDecoder {
  const frozen = Object.freeze([...classes]);
  return Object.freeze({
    classes: frozen,
    inverseTransform(index: number): string {
      const label = frozen[index];
      if (label === undefined) {
        throw new Error(`Class index ${index} is out of range for ${frozen.length} labels`);
      }
      return label;
    },
  });
}

export interface ClassifierBundle {
  readonly model: ProbabilisticClassifier | null;
  readonly labelDecoder: LabelDecoder | null;
  readonly featureOrder: FeatureOrder | null;
}

export type ClassifierOutcome =
  | { ok: true; effect: InteractionEffect; confidence: number }
  | { ok: false; reason: string };

export function isClassifierReady(bundle: ClassifierBundle): boolean {
  return bundle.model != null && bundle.labelDecoder != null;
}

function argMax(values: readonly number[]): number {
  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if (values[i] > values[best]) best = i;
  }
  return best;
}

function classify(
  model: ProbabilisticClassifier,
  decoder: LabelDecoder,
  vector: readonly number[]
): { effect: InteractionEffect; confidence: number } {
  const probabilities = model.predictProba(vector);
  if (probabilities.length === 0) throw new Error("Classifier returned no probabilities");
  if (probabilities.some((p) => !Number.isFinite(p) || p < 0 || p > 1)) {
    throw new Error("Classifier returned probabilities outside [0, 1]");
  }
  const idx = argMax(probabilities);
  const label = decoder.inverseTransform(idx);
  if (!isInteractionEffect(label)) {
    throw new Error(`Label decoder produced unknown effect "${label}"`);
  }
  return { effect: label, confidence: probabilities[idx] };
}

export function scoreWithClassifier(
  vector: readonly number[],
  bundle: ClassifierBundle
): ClassifierOutcome {
  const { model, labelDecoder } = bundle;
  if (!model) return { ok: false, reason: "classifier model not loaded" };
  if (!labelDecoder) return { ok: false, reason: "label decoder not loaded" };
  try {
    return { ok: true, ...classify(model, labelDecoder, vector) };
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
}
