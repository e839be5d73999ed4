/**
 * Canonical attribute schemas and prediction shapes.
 * Drug and food attributes are fixed records; absent source values are filled with 0 at
 * the normalization boundary, never looked up lazily.
 */

export const INTERACTION_EFFECTS = [
  "harmful",
  "negative",
  "no effect",
  "positive",
  "possible",
] as const;

export type InteractionEffect = (typeof INTERACTION_EFFECTS)[number];

const EFFECT_SET: ReadonlySet<string> = new Set(INTERACTION_EFFECTS);

export function isInteractionEffect(value: string): value is InteractionEffect {
  return EFFECT_SET.has(value);
}

export const DESCRIPTOR_NAMES = [
  "MolWt",
  "LogP",
  "HBA",
  "HBD",
  "TPSA",
  "RotBonds",
  "RingCount",
  "FractionCSP3",
  "BalabanJ",
  "BertzCT",
] as const;

export type DescriptorName = (typeof DESCRIPTOR_NAMES)[number];

/** Number of substructure-presence features, addressed as FP_0 … FP_2047. */
export const FINGERPRINT_SIZE = 2048;

export interface DrugAttributes {
  readonly descriptors: Readonly<Record<DescriptorName, number>>;
  /** Always FINGERPRINT_SIZE entries. */
  readonly fingerprint: readonly number[];
}

export const NUTRIENT_CATEGORIES = {
  macronutrients: ["Fat", "Carbohydrates", "Protein"],
  vitamins: [
    "Vitamin_C_mg",
    "Vitamin_D_ug",
    "Vitamin_B12_ug",
    "Vitamin_B6_mg",
    "Vitamin_A_ug",
    "Vitamin_E_mg",
    "Vitamin_K_ug",
    "Folate_ug",
  ],
  minerals: ["Calcium", "Iron", "Magnesium", "Potassium", "Sodium", "Zinc"],
  fat_breakdown: [
    "Saturated_Fat_g",
    "Monounsaturated_Fat_g",
    "Polyunsaturated_Fat_g",
    "Cholesterol_mg",
  ],
} as const;

export type NutrientCategory = keyof typeof NUTRIENT_CATEGORIES;

export type NutrientName = (typeof NUTRIENT_CATEGORIES)[NutrientCategory][number];

export const NUTRIENT_NAMES: readonly NutrientName[] = [
  ...NUTRIENT_CATEGORIES.macronutrients,
  ...NUTRIENT_CATEGORIES.vitamins,
  ...NUTRIENT_CATEGORIES.minerals,
  ...NUTRIENT_CATEGORIES.fat_breakdown,
];

export type FoodAttributes = Readonly<Record<NutrientName, number>>;

/** One entry of a raw nutrient record as delivered by the nutrient source. */
export interface RawNutrientAmount {
  identifier: number | string;
  amount: number | null | undefined;
}

export type Scorer = "classifier" | "rules";

export interface PredictionResult {
  readonly effect: InteractionEffect;
  /** In [0, 1]. */
  readonly confidence: number;
  readonly explanation: string;
  readonly scorer: Scorer;
}

/** A label with its confidence, before an explanation is attached. */
export interface ScoredEffect {
  effect: InteractionEffect;
  confidence: number;
}
