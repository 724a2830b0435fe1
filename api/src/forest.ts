// api/src/forest.ts
// ============================================================================
// DECISION FOREST
//
// Bagged CART trees for a binary target:
// - Gini impurity, axis-aligned splits at midpoints between distinct values
// - bootstrap sample per tree, sqrt(F) candidate features per split
// - optional "balanced" class weights folded into the sample weights
// - mean-decrease-in-impurity feature importance
// ============================================================================
import { randomIndex, shuffle, type RandomSource } from "./random.js";
import type { Label } from "./types.js";

// ============================================================================
// TYPES
// ============================================================================

export type TreeNode =
  | { kind: "leaf"; positiveShare: number }
  | { kind: "split"; feature: number; threshold: number; left: TreeNode; right: TreeNode };

export type ForestOptions = {
  nEstimators: number;
  maxDepth: number;
  /** candidate features per split; defaults to floor(sqrt(featureCount)) */
  maxFeatures?: number;
  classWeight: "balanced" | null;
  random: RandomSource;
};

type NodeContext = {
  X: readonly (readonly number[])[];
  y: readonly Label[];
  weights: readonly number[];
  maxDepth: number;
  maxFeatures: number;
  random: RandomSource;
  importance: number[];
};

type SplitCandidate = { feature: number; threshold: number; improvement: number };

const EPSILON = 1e-12;

// ============================================================================
// IMPURITY
// ============================================================================

function gini(w0: number, w1: number): number {
  const total = w0 + w1;
  if (total <= 0) return 0;
  const p0 = w0 / total;
  const p1 = w1 / total;
  return 1 - p0 * p0 - p1 * p1;
}

function classTotals(ctx: NodeContext, indices: readonly number[]): [number, number] {
  let w0 = 0;
  let w1 = 0;
  for (const i of indices) {
    if (ctx.y[i] === 1) w1 += ctx.weights[i];
    else w0 += ctx.weights[i];
  }
  return [w0, w1];
}

export function balancedClassWeights(y: readonly Label[]): [number, number] {
  const positives = y.filter((label) => label === 1).length;
  const negatives = y.length - positives;
  if (positives === 0 || negatives === 0) {
    throw new Error("balancedClassWeights: both classes must be present");
  }
  return [y.length / (2 * negatives), y.length / (2 * positives)];
}

// ============================================================================
// TREE GROWTH
// ============================================================================

function bestSplitForFeature(
  ctx: NodeContext,
  indices: readonly number[],
  feature: number,
  totals: [number, number]
): SplitCandidate | null {
  const sorted = indices.slice().sort((a, b) => ctx.X[a][feature] - ctx.X[b][feature]);
  const [w0, w1] = totals;
  const parentWeight = w0 + w1;
  const parentImpurity = parentWeight * gini(w0, w1);

  let left0 = 0;
  let left1 = 0;
  let best: SplitCandidate | null = null;

  for (let k = 0; k < sorted.length - 1; k++) {
    const i = sorted[k];
    if (ctx.y[i] === 1) left1 += ctx.weights[i];
    else left0 += ctx.weights[i];

    const here = ctx.X[i][feature];
    const next = ctx.X[sorted[k + 1]][feature];
    if (here === next) continue;

    const right0 = w0 - left0;
    const right1 = w1 - left1;
    const improvement =
      parentImpurity - (left0 + left1) * gini(left0, left1) - (right0 + right1) * gini(right0, right1);

    if (!best || improvement > best.improvement + EPSILON) {
      let threshold = (here + next) / 2;
      if (threshold >= next) threshold = here;
      best = { feature, threshold, improvement };
    }
  }
  return best;
}

function findSplit(ctx: NodeContext, indices: readonly number[], totals: [number, number]): SplitCandidate | null {
  const featureCount = ctx.X[0].length;
  const order = shuffle(
    ctx.random,
    Array.from({ length: featureCount }, (_, f) => f)
  );

  let best: SplitCandidate | null = null;
  for (let visited = 0; visited < order.length; visited++) {
    // keep looking past maxFeatures only while nothing splits
    if (visited >= ctx.maxFeatures && best) break;
    const candidate = bestSplitForFeature(ctx, indices, order[visited], totals);
    if (candidate && (!best || candidate.improvement > best.improvement + EPSILON)) {
      best = candidate;
    }
  }
  return best && best.improvement > EPSILON ? best : null;
}

function growNode(ctx: NodeContext, indices: readonly number[], depth: number): TreeNode {
  const totals = classTotals(ctx, indices);
  const [w0, w1] = totals;
  const leaf: TreeNode = { kind: "leaf", positiveShare: w0 + w1 > 0 ? w1 / (w0 + w1) : 0 };

  if (depth >= ctx.maxDepth || indices.length < 2 || gini(w0, w1) <= EPSILON) {
    return leaf;
  }

  const split = findSplit(ctx, indices, totals);
  if (!split) return leaf;

  ctx.importance[split.feature] += split.improvement;

  const leftIdx: number[] = [];
  const rightIdx: number[] = [];
  for (const i of indices) {
    if (ctx.X[i][split.feature] <= split.threshold) leftIdx.push(i);
    else rightIdx.push(i);
  }

  return {
    kind: "split",
    feature: split.feature,
    threshold: split.threshold,
    left: growNode(ctx, leftIdx, depth + 1),
    right: growNode(ctx, rightIdx, depth + 1),
  };
}

export function predictTree(node: TreeNode, row: readonly number[]): number {
  let current = node;
  while (current.kind === "split") {
    current = row[current.feature] <= current.threshold ? current.left : current.right;
  }
  return current.positiveShare;
}

// ============================================================================
// FOREST
// ============================================================================

export class DecisionForest {
  private constructor(
    private readonly trees: readonly TreeNode[],
    readonly featureCount: number,
    /** normalized, sums to 1 */
    readonly featureImportance: readonly number[]
  ) {}

  get size(): number {
    return this.trees.length;
  }

  static fit(
    X: readonly (readonly number[])[],
    y: readonly Label[],
    options: ForestOptions
  ): DecisionForest {
    if (X.length === 0 || X.length !== y.length) {
      throw new Error(`DecisionForest.fit: expected matching non-empty X/y, got ${X.length}/${y.length}`);
    }
    const featureCount = X[0].length;
    const maxFeatures = Math.max(
      1,
      Math.min(featureCount, options.maxFeatures ?? Math.floor(Math.sqrt(featureCount)))
    );
    const classWeight = options.classWeight === "balanced" ? balancedClassWeights(y) : [1, 1];

    const trees: TreeNode[] = [];
    const importanceSum = new Array<number>(featureCount).fill(0);

    for (let t = 0; t < options.nEstimators; t++) {
      const counts = new Array<number>(X.length).fill(0);
      for (let draw = 0; draw < X.length; draw++) {
        counts[randomIndex(options.random, X.length)] += 1;
      }
      const weights = counts.map((count, i) => count * classWeight[y[i]]);
      const indices = counts.flatMap((count, i) => (count > 0 ? [i] : []));

      const ctx: NodeContext = {
        X,
        y,
        weights,
        maxDepth: options.maxDepth,
        maxFeatures,
        random: options.random,
        importance: new Array<number>(featureCount).fill(0),
      };
      trees.push(growNode(ctx, indices, 0));

      const treeTotal = ctx.importance.reduce((a, b) => a + b, 0);
      if (treeTotal > 0) {
        ctx.importance.forEach((value, f) => {
          importanceSum[f] += value / treeTotal;
        });
      }
    }

    const total = importanceSum.reduce((a, b) => a + b, 0);
    const featureImportance =
      total > 0
        ? importanceSum.map((value) => value / total)
        : importanceSum.map(() => 1 / featureCount);

    return new DecisionForest(trees, featureCount, featureImportance);
  }

  /** Mean positive-class leaf share across trees, 0..1. */
  predictProbability(row: readonly number[]): number {
    if (row.length !== this.featureCount) {
      throw new Error(`DecisionForest: expected ${this.featureCount} features, got ${row.length}`);
    }
    let sum = 0;
    for (const tree of this.trees) sum += predictTree(tree, row);
    return sum / this.trees.length;
  }
}
