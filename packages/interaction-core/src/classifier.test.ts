import { describe, it, expect } from "vitest";
import {
  createLabelDecoder,
  isClassifierReady,
  scoreWithClassifier,
  type ClassifierBundle,
  type ProbabilisticClassifier,
} from "./classifier.js";
import { EFFECT_CLASSES } from "./__fixtures__/models.js";

function fixedModel(probabilities: number[]): ProbabilisticClassifier {
  return { numClasses: probabilities.length, predictProba: () => probabilities };
}

function bundleWith(model: ProbabilisticClassifier | null, classes: string[] | null = EFFECT_CLASSES): ClassifierBundle {
  return { model, labelDecoder: classes ? createLabelDecoder(classes) : null, featureOrder: null };
}

describe("scoreWithClassifier", () => {
  it("returns the arg-max label with its probability as confidence", () => {
    const outcome = scoreWithClassifier([1, 2], bundleWith(fixedModel([0.1, 0.2, 0.6, 0.05, 0.05])));
    expect(outcome).toEqual({ ok: true, effect: "no effect", confidence: 0.6 });
  });

  it("reports a missing model or decoder", () => {
    expect(scoreWithClassifier([], bundleWith(null))).toEqual({ ok: false, reason: "classifier model not loaded" });
    expect(scoreWithClassifier([], bundleWith(fixedModel([1]), null))).toEqual({
      ok: false,
      reason: "label decoder not loaded",
    });
  });

  it("turns classifier errors into an unavailable outcome", () => {
    const throwing: ProbabilisticClassifier = {
      numClasses: 5,
      predictProba: () => {
        throw new Error("Expected 2079 features, got 3");
      },
    };
    expect(scoreWithClassifier([1, 2, 3], bundleWith(throwing))).toEqual({
      ok: false,
      reason: "Expected 2079 features, got 3",
    });
  });

  it("fails when the decoder has no label for the winning index", () => {
    const outcome = scoreWithClassifier([], bundleWith(fixedModel([0.1, 0.1, 0.8]), ["harmful", "possible"]));
    expect(outcome).toEqual({ ok: false, reason: "Class index 2 is out of range for 2 labels" });
  });

  it("fails on labels outside the known effects", () => {
    const outcome = scoreWithClassifier([], bundleWith(fixedModel([0.3, 0.7]), ["harmful", "mild"]));
    expect(outcome).toEqual({ ok: false, reason: 'Label decoder produced unknown effect "mild"' });
  });

  it("fails on non-finite or out-of-range probabilities", () => {
    expect(scoreWithClassifier([], bundleWith(fixedModel([Number.NaN, 0.5]))).ok).toBe(false);
    expect(scoreWithClassifier([], bundleWith(fixedModel([1.5, 0]))).ok).toBe(false);
    expect(scoreWithClassifier([], bundleWith(fixedModel([]))).ok).toBe(false);
  });
});

describe("isClassifierReady", () => {
  it("needs both model and decoder", () => {
    expect(isClassifierReady(bundleWith(fixedModel([1])))).toBe(true);
    expect(isClassifierReady(bundleWith(fixedModel([1]), null))).toBe(false);
  });
});
