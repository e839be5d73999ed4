/**
 * Drug-food interaction predictor CLI.
 * Usage: npm run predictor -- predict warfarin spinach
 * Artifacts come from MODEL_DIR (default ./models) or the Supabase bucket MODEL_BUCKET.
 */
import "dotenv/config";
import { EMPTY_BUNDLE, loadClassifierBundle, type ArtifactStore } from "interaction-core";
import { FileArtifactStore, getSupabase, SupabaseArtifactStore } from "model-store";
import { runCommand, UsageError } from "./cli.js";
import { loadConfig, type PredictorConfig } from "./config.js";
import { createDescriptorSource } from "./descriptors.js";
import type { PredictorDeps } from "./pipeline.js";
import { UpstreamUnavailableError } from "./errors.js";
import { createNutrientSource } from "./usda.js";

function artifactStore(config: PredictorConfig): ArtifactStore {
  if (!config.MODEL_BUCKET) return new FileArtifactStore(config.MODEL_DIR);
  const supabase = getSupabase(config);
  if (!supabase) {
    throw new Error("MODEL_BUCKET is set; also set SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY (or SUPABASE_ANON_KEY).");
  }
  return new SupabaseArtifactStore(supabase.storage.from(config.MODEL_BUCKET), config.MODEL_BUCKET, config.MODEL_PREFIX);
}

async function loadDeps(withBundle: boolean): Promise<PredictorDeps> {
  const config = loadConfig();
  const bundle = withBundle ? await loadClassifierBundle(artifactStore(config)) : EMPTY_BUNDLE;
  return {
    descriptors: createDescriptorSource(config),
    nutrients: createNutrientSource(config),
    bundle,
    predictOptions: { fallback: { overrideProbability: config.FALLBACK_OVERRIDE_PROBABILITY } },
  };
}

async function main() {
  const [command, ...args] = process.argv.slice(2);
  const result = await runCommand(command, args, loadDeps);
  console.log(JSON.stringify(result, null, 2));
}

main().catch((err) => {
  if (err instanceof UsageError) {
    console.error(err.message);
  } else if (err instanceof UpstreamUnavailableError) {
    console.error(`FAIL ${err.source} (${err.reason}): ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
