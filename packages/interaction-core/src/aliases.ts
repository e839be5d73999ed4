/**
 * Source identifiers accepted for each canonical attribute, in priority order.
 * Nutrient ids are USDA FoodData Central nutrient ids.
 */

import type { DescriptorName, NutrientName } from "./types.js";

export const NUTRIENT_ALIASES: Readonly<Record<NutrientName, readonly number[]>> = {
  Fat: [1004], // Total lipid (fat)
  Carbohydrates: [1005], // Carbohydrate, by difference
  Protein: [1003],

  Vitamin_C_mg: [1162], // total ascorbic acid
  Vitamin_D_ug: [1114], // D2 + D3
  Vitamin_B12_ug: [1178],
  Vitamin_B6_mg: [1175],
  Vitamin_A_ug: [1106, 1104], // RAE, then IU-derived
  Vitamin_E_mg: [1109], // alpha-tocopherol
  Vitamin_K_ug: [1185], // phylloquinone
  Folate_ug: [1177, 1186], // folate total, then folic acid

  Calcium: [1087],
  Iron: [1089],
  Magnesium: [1090],
  Potassium: [1092],
  Sodium: [1093],
  Zinc: [1095],

  Saturated_Fat_g: [1258],
  Monounsaturated_Fat_g: [1292],
  Polyunsaturated_Fat_g: [1293],
  Cholesterol_mg: [1253],
};

/** Canonical name first, then names used by the descriptor service and PubChem. */
export const DESCRIPTOR_ALIASES: Readonly<Record<DescriptorName, readonly string[]>> = {
  MolWt: ["MolWt", "ExactMolWt", "ExactMass", "MolecularWeight"],
  LogP: ["LogP", "MolLogP", "XLogP"],
  HBA: ["HBA", "NumHAcceptors", "HBondAcceptorCount"],
  HBD: ["HBD", "NumHDonors", "HBondDonorCount"],
  TPSA: ["TPSA"],
  RotBonds: ["RotBonds", "NumRotatableBonds", "RotatableBondCount"],
  RingCount: ["RingCount"],
  FractionCSP3: ["FractionCSP3", "FractionCsp3"],
  BalabanJ: ["BalabanJ"],
  BertzCT: ["BertzCT", "Complexity"],
};
