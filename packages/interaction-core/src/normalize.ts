/**
 * Attribute normalizer: raw source records → canonical drug and food attributes.
 * Each attribute takes the first usable amount found by walking its aliases in priority
 * order. Alias amounts are never summed; nothing found means 0.
 */

import { DESCRIPTOR_ALIASES, NUTRIENT_ALIASES } from "./aliases.js";
import {
  DESCRIPTOR_NAMES,
  FINGERPRINT_SIZE,
  NUTRIENT_NAMES,
  type DrugAttributes,
  type FoodAttributes,
  type NutrientName,
  type RawNutrientAmount,
} from "./types.js";

const MISSING = 0;

function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function recordOf<K extends string>(names: readonly K[], valueOf: (name: K) => number): Record<K, number> {
  return Object.fromEntries(names.map((name) => [name, valueOf(name)])) as Record<K, number>;
}

function sameIdentifier(a: number | string, b: number): boolean {
  return typeof a === "number" ? a === b : a.trim() === String(b);
}

/** First non-null, non-negative amount recorded under `alias`, in record order. */
function amountForAlias(record: readonly RawNutrientAmount[], alias: number): number | null {
  for (const entry of record) {
    if (!sameIdentifier(entry.identifier, alias)) continue;
    const n = toNumber(entry.amount);
    if (n != null && n >= 0) return n;
  }
  return null;
}

export function normalizeFoodAttributes(record: readonly RawNutrientAmount[]): FoodAttributes {
  return Object.freeze(
    recordOf(NUTRIENT_NAMES, (name) => {
      for (const alias of NUTRIENT_ALIASES[name]) {
        const found = amountForAlias(record, alias);
        if (found != null) return found;
      }
      return MISSING;
    })
  );
}

/**
 * Partial canonical input, e.g. test fixtures or cached values. Missing nutrients are 0.
 */
export function foodAttributesFrom(values: Partial<Record<NutrientName, number>>): FoodAttributes {
  return Object.freeze(recordOf(NUTRIENT_NAMES, (name) => toNumber(values[name]) ?? MISSING));
}

const FINGERPRINT_KEY = /^FP_(0|[1-9]\d*)$/;

export function normalizeDrugAttributes(raw: Readonly<Record<string, unknown>>): DrugAttributes {
  const descriptors = recordOf(DESCRIPTOR_NAMES, (name) => {
    for (const alias of DESCRIPTOR_ALIASES[name]) {
      const n = toNumber(raw[alias]);
      if (n != null) return n;
    }
    return MISSING;
  });

  const fingerprint = new Array<number>(FINGERPRINT_SIZE).fill(MISSING);
  for (const [key, v] of Object.entries(raw)) {
    const m = key.match(FINGERPRINT_KEY);
    if (!m) continue;
    const idx = Number(m[1]);
    if (idx >= FINGERPRINT_SIZE) continue;
    fingerprint[idx] = toNumber(v) ?? MISSING;
  }

  return Object.freeze({
    descriptors: Object.freeze(descriptors),
    fingerprint: Object.freeze(fingerprint),
  });
}
