/**
 * Gradient-boosted tree ensemble loaded from XGBoost's JSON model format
 * (`Booster.save_model("xgb_model.json")`). Supports the gbtree booster with
 * multi:softprob / multi:softmax or binary:logistic objectives.
 */

import { z } from "zod";
import type { ProbabilisticClassifier } from "./classifier.js";

const TreeSchema = z.object({
  left_children: z.array(z.number().int()),
  right_children: z.array(z.number().int()),
  split_indices: z.array(z.number().int()),
  split_conditions: z.array(z.number()),
  default_left: z.array(z.union([z.boolean(), z.number()])),
});

export const XgboostModelSchema = z.object({
  learner: z.object({
    gradient_booster: z.object({
      name: z.string(),
      model: z.object({
        tree_info: z.array(z.number().int()),
        trees: z.array(TreeSchema),
      }),
    }),
    learner_model_param: z.object({
      base_score: z.string(),
      num_class: z.string(),
      num_feature: z.string(),
    }),
    objective: z.object({ name: z.string() }),
  }),
});

export type XgboostModelJson = z.infer<typeof XgboostModelSchema>;

type Objective = "softprob" | "logistic";

interface Tree {
  left: number[];
  right: number[];
  feature: number[];
  threshold: number[];
  defaultLeft: boolean[];
}

/** "5E-1", "[5E-1]" or "[2E-1,3E-1]" → numbers. */
function parseBaseScore(raw: string): number[] {
  const values = raw
    .replace(/^\[|\]$/g, "")
    .split(",")
    .map((s) => parseFloat(s));
  if (values.length === 0 || values.some((v) => !Number.isFinite(v))) {
    throw new Error(`Invalid base_score "${raw}"`);
  }
  return values;
}

function objectiveOf(name: string): Objective {
  if (name === "multi:softprob" || name === "multi:softmax") return "softprob";
  if (name === "binary:logistic") return "logistic";
  throw new Error(`Unsupported objective "${name}"`);
}

function toTree(t: z.infer<typeof TreeSchema>, index: number): Tree {
  const n = t.left_children.length;
  const lengths = [t.right_children, t.split_indices, t.split_conditions, t.default_left].map((a) => a.length);
  if (n === 0 || lengths.some((len) => len !== n)) {
    throw new Error(`Tree ${index} has inconsistent node arrays`);
  }
  return {
    left: t.left_children,
    right: t.right_children,
    feature: t.split_indices,
    threshold: t.split_conditions,
    defaultLeft: t.default_left.map((d) => d === true || d === 1),
  };
}

function leafValue(tree: Tree, row: readonly number[]): number {
  let node = 0;
  // A node is a leaf when it has no left child; its leaf value sits in split_conditions.
  for (let steps = 0; tree.left[node] !== -1; steps++) {
    if (steps > tree.left.length) throw new Error("Tree traversal did not terminate");
    const v = row[tree.feature[node]];
    const goLeft = v === undefined || Number.isNaN(v) ? tree.defaultLeft[node] : v < tree.threshold[node];
    node = goLeft ? tree.left[node] : tree.right[node];
    if (node < 0 || node >= tree.left.length) throw new Error("Tree child index out of range");
  }
  return tree.threshold[node];
}

function softmax(margins: number[]): number[] {
  const max = Math.max(...margins);
  const exps = margins.map((m) => Math.exp(m - max));
  const sum = exps.reduce((a, b) => a + b, 0);
  return exps.map((e) => e / sum);
}

export class XgboostClassifier implements ProbabilisticClassifier {
  readonly numClasses: number;
  readonly numFeatures: number;
  private readonly objective: Objective;
  private readonly trees: Tree[];
  private readonly treeClass: number[];
  private readonly baseScore: number[];

  constructor(model: XgboostModelJson) {
    const { learner } = model;
    if (learner.gradient_booster.name !== "gbtree") {
      throw new Error(`Unsupported booster "${learner.gradient_booster.name}"`);
    }
    this.objective = objectiveOf(learner.objective.name);
    const numClass = parseInt(learner.learner_model_param.num_class, 10);
    this.numClasses = this.objective === "logistic" ? 2 : numClass;
    if (!Number.isInteger(this.numClasses) || this.numClasses < 2) {
      throw new Error(`Invalid num_class "${learner.learner_model_param.num_class}"`);
    }
    this.numFeatures = parseInt(learner.learner_model_param.num_feature, 10);

    const { trees, tree_info } = learner.gradient_booster.model;
    if (trees.length !== tree_info.length) {
      throw new Error("tree_info does not match the number of trees");
    }
    const groups = this.objective === "logistic" ? 1 : this.numClasses;
    if (tree_info.some((g) => g < 0 || g >= groups)) {
      throw new Error("tree_info references an unknown class");
    }
    this.trees = trees.map(toTree);
    this.treeClass = tree_info;
    this.baseScore = parseBaseScore(learner.learner_model_param.base_score);
  }

  static fromJson(json: unknown): XgboostClassifier {
    return new XgboostClassifier(XgboostModelSchema.parse(json));
  }

  private base(group: number): number {
    return this.baseScore[group] ?? this.baseScore[0];
  }

  predictProba(row: readonly number[]): number[] {
    if (Number.isFinite(this.numFeatures) && row.length !== this.numFeatures) {
      throw new Error(`Expected ${this.numFeatures} features, got ${row.length}`);
    }

    if (this.objective === "logistic") {
      const p0 = this.base(0);
      let margin = Math.log(p0 / (1 - p0));
      this.trees.forEach((tree) => {
        margin += leafValue(tree, row);
      });
      const p = 1 / (1 + Math.exp(-margin));
      return [1 - p, p];
    }

    const margins = Array.from({ length: this.numClasses }, (_, k) => this.base(k));
    this.trees.forEach((tree, i) => {
      margins[this.treeClass[i]] += leafValue(tree, row);
    });
    return softmax(margins);
  }
}
