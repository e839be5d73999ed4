/**
 * Startup loading of the classifier bundle. Each artifact loads independently; a
 * missing or unreadable artifact leaves its member null and the rest still load.
 */

import { z } from "zod";
import { createLabelDecoder, type ClassifierBundle } from "./classifier.js";
import { XgboostClassifier } from "./xgboost.js";

export const MODEL_ARTIFACT = "xgb_model.json";
export const LABEL_DECODER_ARTIFACT = "label_encoder.json";
export const FEATURE_ORDER_ARTIFACT = "feature_order.json";

/** Where the three artifacts live (a directory, a storage bucket, …). */
export interface ArtifactStore {
  /** Artifact text, or null when the artifact does not exist. */
  read(name: string): Promise<string | null>;
  describe(): string;
}

const LabelDecoderSchema = z.union([
  z.array(z.string()).min(1),
  z.object({ classes: z.array(z.string()).min(1) }).transform((o) => o.classes),
]);

// Non-string entries are kept as "" so positions stay aligned; they assemble to 0.
const FeatureOrderSchema = z
  .array(z.unknown())
  .transform((entries) => entries.map((e) => (typeof e === "string" ? e : "")));

export const EMPTY_BUNDLE: ClassifierBundle = Object.freeze({
  model: null,
  labelDecoder: null,
  featureOrder: null,
});

async function loadArtifact<T>(
  store: ArtifactStore,
  name: string,
  parse: (json: unknown) => T
): Promise<T | null> {
  try {
    const text = await store.read(name);
    if (text == null) {
      console.warn(`Artifact ${name} not found in ${store.describe()}`);
      return null;
    }
    return parse(JSON.parse(text));
  } catch (err) {
    console.error(`Failed to load ${name} from ${store.describe()}:`, err instanceof Error ? err.message : err);
    return null;
  }
}

export async function loadClassifierBundle(store: ArtifactStore): Promise<ClassifierBundle> {
  const [model, labelDecoder, featureOrder] = await Promise.all([
    loadArtifact(store, MODEL_ARTIFACT, (json) => XgboostClassifier.fromJson(json)),
    loadArtifact(store, LABEL_DECODER_ARTIFACT, (json) => createLabelDecoder(LabelDecoderSchema.parse(json))),
    loadArtifact(store, FEATURE_ORDER_ARTIFACT, (json) => Object.freeze(FeatureOrderSchema.parse(json))),
  ]);

  const bundle: ClassifierBundle = Object.freeze({ model, labelDecoder, featureOrder });
  const status = describeBundle(bundle);
  if (status.models_loaded) {
    console.log(`Classifier bundle loaded from ${store.describe()}`);
  } else {
    console.warn("Classifier bundle incomplete; predictions will use the rule scorer.");
  }
  return bundle;
}

export interface BundleStatus {
  models_loaded: boolean;
  feature_order_loaded: boolean;
  feature_count: number | null;
  labels: string[];
}

export function describeBundle(bundle: ClassifierBundle): BundleStatus {
  return {
    models_loaded: bundle.model != null && bundle.labelDecoder != null,
    feature_order_loaded: bundle.featureOrder != null,
    feature_count: bundle.featureOrder?.length ?? null,
    labels: bundle.labelDecoder ? [...bundle.labelDecoder.classes] : [],
  };
}
