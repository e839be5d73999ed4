/**
 * Feature vector assembly: one positional numeric row in the column order the
 * classifier was trained on. Drug attributes win over food attributes on a name
 * collision; names found in neither become 0.
 */

import {
  DESCRIPTOR_NAMES,
  FINGERPRINT_SIZE,
  NUTRIENT_NAMES,
  type DescriptorName,
  type DrugAttributes,
  type FoodAttributes,
  type NutrientName,
} from "./types.js";

export type FeatureOrder = readonly string[];

const DESCRIPTOR_SET: ReadonlySet<string> = new Set(DESCRIPTOR_NAMES);
const NUTRIENT_SET: ReadonlySet<string> = new Set(NUTRIENT_NAMES);
const FINGERPRINT_KEY = /^FP_(0|[1-9]\d*)$/;

function isDescriptorName(name: string): name is DescriptorName {
  return DESCRIPTOR_SET.has(name);
}

function isNutrientName(name: string): name is NutrientName {
  return NUTRIENT_SET.has(name);
}

export function fingerprintFeatureName(index: number): string {
  return `FP_${index}`;
}

export function drugAttributeValue(drug: DrugAttributes, name: string): number | undefined {
  if (isDescriptorName(name)) return drug.descriptors[name];
  const m = name.match(FINGERPRINT_KEY);
  if (!m) return undefined;
  const idx = Number(m[1]);
  return idx < FINGERPRINT_SIZE ? drug.fingerprint[idx] : undefined;
}

export function foodAttributeValue(food: FoodAttributes, name: string): number | undefined {
  return isNutrientName(name) ? food[name] : undefined;
}

let defaultOrder: FeatureOrder | null = null;

/** Descriptors, then FP_0 … FP_2047, then the 21 nutrients. */
export function defaultFeatureOrder(): FeatureOrder {
  if (!defaultOrder) {
    const fingerprint = Array.from({ length: FINGERPRINT_SIZE }, (_, i) => fingerprintFeatureName(i));
    defaultOrder = Object.freeze([...DESCRIPTOR_NAMES, ...fingerprint, ...NUTRIENT_NAMES]);
  }
  return defaultOrder;
}

/**
 * vector[i] belongs to order[i]. The order is used as given: duplicates stay, and
 * empty or unknown names produce 0.
 */
export function assembleFeatureVector(
  drug: DrugAttributes,
  food: FoodAttributes,
  order: FeatureOrder
): number[] {
  return order.map((name) => drugAttributeValue(drug, name) ?? foodAttributeValue(food, name) ?? 0);
}
