export * from "./types.js";
export { NUTRIENT_ALIASES, DESCRIPTOR_ALIASES } from "./aliases.js";
export { normalizeDrugAttributes, normalizeFoodAttributes, foodAttributesFrom } from "./normalize.js";
export {
  assembleFeatureVector,
  defaultFeatureOrder,
  drugAttributeValue,
  foodAttributeValue,
  fingerprintFeatureName,
  type FeatureOrder,
} from "./featureVector.js";
export {
  createLabelDecoder,
  isClassifierReady,
  scoreWithClassifier,
  type ClassifierBundle,
  type ClassifierOutcome,
  type LabelDecoder,
  type ProbabilisticClassifier,
} from "./classifier.js";
export { XgboostClassifier, XgboostModelSchema, type XgboostModelJson } from "./xgboost.js";
export {
  scoreWithRules,
  DEFAULT_OVERRIDE_PROBABILITY,
  OVERRIDE_EFFECTS,
  VITAMIN_K_THRESHOLD_UG,
  CALCIUM_THRESHOLD_MG,
  type FallbackOptions,
} from "./fallback.js";
export { explainPrediction } from "./explanation.js";
export { predictInteraction, type PredictOptions } from "./predict.js";
export {
  loadClassifierBundle,
  describeBundle,
  EMPTY_BUNDLE,
  MODEL_ARTIFACT,
  LABEL_DECODER_ARTIFACT,
  FEATURE_ORDER_ARTIFACT,
  type ArtifactStore,
  type BundleStatus,
} from "./bundle.js";
