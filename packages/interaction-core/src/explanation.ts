import { isInteractionEffect, type InteractionEffect } from "./types.js";

const TEMPLATES: Record<InteractionEffect, (confidence: string) => string> = {
  harmful: (c) =>
    `Significant interaction detected (confidence: ${c}). This food may interfere with drug efficacy or cause adverse effects. Consult your healthcare provider immediately.`,
  negative: (c) =>
    `Minor negative interaction possible (confidence: ${c}). The food may slightly reduce drug effectiveness or absorption.`,
  "no effect": (c) =>
    `No significant interaction expected (confidence: ${c}). The food is unlikely to affect drug absorption or metabolism significantly.`,
  positive: (c) =>
    `Beneficial interaction detected (confidence: ${c}). This food may enhance drug absorption, stability, or therapeutic effects.`,
  possible: (c) =>
    `Potential interaction identified (confidence: ${c}). Monitor for changes in drug effectiveness or side effects.`,
};

/** Human-readable rationale for a scored effect. */
export function explainPrediction(effect: string, confidence: number): string {
  const c = confidence.toFixed(2);
  if (isInteractionEffect(effect)) return TEMPLATES[effect](c);
  return `Interaction analysis completed with ${c} confidence.`;
}
