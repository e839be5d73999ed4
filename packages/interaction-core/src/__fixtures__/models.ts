import type { XgboostModelJson } from "../xgboost.js";

type TreeJson = XgboostModelJson["learner"]["gradient_booster"]["model"]["trees"][number];

export function leaf(value: number): TreeJson {
  return {
    left_children: [-1],
    right_children: [-1],
    split_indices: [0],
    split_conditions: [value],
    default_left: [0],
  };
}

/** x[feature] < threshold → below, else above; missing goes left. */
export function stump(feature: number, threshold: number, below: number, above: number): TreeJson {
  return {
    left_children: [1, -1, -1],
    right_children: [2, -1, -1],
    split_indices: [feature, 0, 0],
    split_conditions: [threshold, below, above],
    default_left: [1, 0, 0],
  };
}

export function modelJson(args: {
  objective: string;
  numClass: number;
  numFeature: number;
  trees: TreeJson[];
  treeInfo: number[];
  baseScore?: string;
}): XgboostModelJson {
  return {
    learner: {
      gradient_booster: {
        name: "gbtree",
        model: { tree_info: args.treeInfo, trees: args.trees },
      },
      learner_model_param: {
        base_score: args.baseScore ?? "5E-1",
        num_class: String(args.numClass),
        num_feature: String(args.numFeature),
      },
      objective: { name: args.objective },
    },
  };
}

export const EFFECT_CLASSES = ["harmful", "negative", "no effect", "positive", "possible"];

/** Index of Vitamin_K_ug in the default feature order. */
export const VITAMIN_K_COLUMN = 2067;

/**
 * Five-class model over the default 2079-column order: "possible" when vitamin K is at
 * least 100 µg, otherwise "no effect".
 */
export function vitaminKModel(): XgboostModelJson {
  return modelJson({
    objective: "multi:softprob",
    numClass: 5,
    numFeature: 2079,
    trees: [leaf(0), leaf(0), leaf(1), leaf(0), stump(VITAMIN_K_COLUMN, 100, -1, 2)],
    treeInfo: [0, 1, 2, 3, 4],
  });
}
