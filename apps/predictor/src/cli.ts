/**
 * Command handlers. Each returns a JSON-serializable result; printing and exit codes
 * stay in index.ts.
 */

import {
  describeBundle,
  normalizeDrugAttributes,
  normalizeFoodAttributes,
  NUTRIENT_CATEGORIES,
  NUTRIENT_NAMES,
  type ClassifierBundle,
} from "interaction-core";
import { predictForNames, type PredictorDeps } from "./pipeline.js";

export const VERSION = "2.0.0";

export const USAGE = `Usage: predictor <command> [args]

Commands:
  predict <drug> <food>   Predict the drug-food interaction
  canonical <drug>        Resolve a drug name to canonical SMILES
  descriptors <drug>      Molecular descriptors for a drug
  nutrients <food>        Nutrient profile for a food
  nutrients-list          Supported nutrient features
  health                  Classifier bundle status`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function requireArgs(args: string[], count: number, command: string): string[] {
  const values = args.slice(0, count).map((a) => a.trim());
  if (values.length < count || values.some((v) => !v)) {
    throw new UsageError(`${command}: expected ${count} argument(s)\n\n${USAGE}`);
  }
  return values;
}

export function listSupportedNutrients() {
  return {
    total_nutrients: NUTRIENT_NAMES.length,
    categories: NUTRIENT_CATEGORIES,
  };
}

export function healthReport(bundle: ClassifierBundle) {
  const status = describeBundle(bundle);
  return {
    status: "healthy" as const,
    models_loaded: status.models_loaded,
    feature_order_loaded: status.feature_order_loaded,
    version: VERSION,
  };
}

/** Builds lookup clients from config; the classifier bundle only when `withBundle` is set. */
export type DepsLoader = (withBundle: boolean) => Promise<PredictorDeps>;

/** Arguments are checked before `loadDeps` runs, so usage errors never need config. */
export async function runCommand(command: string | undefined, args: string[], loadDeps: DepsLoader): Promise<unknown> {
  switch (command) {
    case "predict": {
      const [drug, food] = requireArgs(args, 2, command);
      return predictForNames(drug, food, await loadDeps(true));
    }
    case "canonical": {
      const [drug] = requireArgs(args, 1, command);
      const deps = await loadDeps(false);
      return { drug_name: drug, canonical_smiles: await deps.descriptors.resolveSmiles(drug) };
    }
    case "descriptors": {
      const [drug] = requireArgs(args, 1, command);
      const deps = await loadDeps(false);
      const record = await deps.descriptors.fetchDescriptors(drug);
      const attributes = normalizeDrugAttributes(record.descriptors);
      return {
        drug_name: drug,
        canonical_smiles: record.canonical_smiles,
        descriptors: attributes.descriptors,
        fingerprint_bits_set: attributes.fingerprint.filter((v) => v !== 0).length,
      };
    }
    case "nutrients": {
      const [food] = requireArgs(args, 1, command);
      const deps = await loadDeps(false);
      const record = await deps.nutrients.fetchNutrients(food);
      return { food_name: food, nutrients: normalizeFoodAttributes(record.nutrients) };
    }
    case "nutrients-list":
      return listSupportedNutrients();
    case "health":
      return healthReport((await loadDeps(true)).bundle);
    default:
      throw new UsageError(command ? `Unknown command "${command}"\n\n${USAGE}` : USAGE);
  }
}
