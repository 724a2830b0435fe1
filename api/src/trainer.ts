// api/src/trainer.ts
// ============================================================================
// CLASSIFIER TRAINER
//
// Stratified holdout split → class-balanced forest → held-out accuracy and
// feature importance. Runs once at startup; the resulting model is frozen.
// ============================================================================
import { DecisionForest } from "./forest.js";
import { createSeededRandom, shuffle, type RandomSource } from "./random.js";
import type {
  FeatureImportance,
  FeatureKey,
  FeatureMedians,
  FeatureVector,
  Label,
  LabeledDataset,
} from "./types.js";

export class TrainingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TrainingError";
  }
}

export type TrainingOptions = {
  testSize: number;
  seed: number;
  nEstimators: number;
  maxDepth: number;
};

export const DEFAULT_TRAINING_OPTIONS: Readonly<TrainingOptions> = {
  testSize: 0.2,
  seed: 42,
  nEstimators: 400,
  maxDepth: 12,
};

export type StratifiedSplit = {
  trainIndices: number[];
  testIndices: number[];
};

// ============================================================================
// SPLIT
// ============================================================================

/**
 * Holdout split that keeps label proportions. Test size is ceil(testSize·n);
 * every class lands in both partitions.
 */
export function stratifiedSplit(labels: readonly Label[], testSize: number, random: RandomSource): StratifiedSplit {
  const n = labels.length;
  const groups: number[][] = [[], []];
  labels.forEach((label, i) => groups[label].push(i));

  const present = groups.filter((g) => g.length > 0);
  if (present.length < 2) {
    throw new TrainingError("Training data must contain both classes");
  }
  const smallest = Math.min(...present.map((g) => g.length));
  if (smallest < 2) {
    throw new TrainingError("The least populated class has fewer than 2 rows; cannot stratify");
  }

  const nTest = Math.ceil(testSize * n);
  const nTrain = n - nTest;
  if (nTest < present.length || nTrain < present.length) {
    throw new TrainingError(
      `Split of ${n} rows into ${nTrain} train / ${nTest} test cannot hold every class`
    );
  }

  const exact = present.map((g) => (g.length * nTest) / n);
  const counts = present.map((g, c) => Math.min(g.length - 1, Math.max(1, Math.floor(exact[c]))));
  const byRemainder = present
    .map((_, c) => c)
    .sort((a, b) => exact[b] - Math.floor(exact[b]) - (exact[a] - Math.floor(exact[a])));

  let remaining = nTest - counts.reduce((a, b) => a + b, 0);
  while (remaining !== 0) {
    let moved = false;
    const order = remaining > 0 ? byRemainder : byRemainder.slice().reverse();
    for (const c of order) {
      if (remaining > 0 && counts[c] < present[c].length - 1) {
        counts[c] += 1;
        remaining -= 1;
        moved = true;
      } else if (remaining < 0 && counts[c] > 1) {
        counts[c] -= 1;
        remaining += 1;
        moved = true;
      }
      if (remaining === 0) break;
    }
    if (!moved) {
      throw new TrainingError(`Cannot allocate ${nTest} test rows across classes`);
    }
  }

  const testIndices: number[] = [];
  const trainIndices: number[] = [];
  present.forEach((group, c) => {
    const shuffled = shuffle(random, group);
    testIndices.push(...shuffled.slice(0, counts[c]));
    trainIndices.push(...shuffled.slice(counts[c]));
  });

  return {
    trainIndices: trainIndices.sort((a, b) => a - b),
    testIndices: testIndices.sort((a, b) => a - b),
  };
}

// ============================================================================
// MODEL
// ============================================================================

export class TrainedModel {
  constructor(
    readonly featureNames: readonly FeatureKey[],
    readonly medians: Readonly<FeatureMedians>,
    private readonly forest: DecisionForest,
    /** held-out accuracy, 0..1 */
    readonly accuracy: number,
    /** sorted by importance, descending */
    readonly importance: readonly FeatureImportance[],
    readonly split: Readonly<StratifiedSplit>
  ) {
    Object.freeze(this);
  }

  get treeCount(): number {
    return this.forest.size;
  }

  /** Positive-class probability (0..1) for a row already in featureNames order. */
  predictProbability(row: readonly number[]): number {
    return this.forest.predictProbability(row);
  }
}

export function labelFromProbability(probability: number): Label {
  return probability >= 0.5 ? 1 : 0;
}

function toRow(vector: FeatureVector, featureNames: readonly FeatureKey[]): number[] {
  return featureNames.map((key) => vector[key]);
}

export function trainModel(
  dataset: LabeledDataset,
  options: Partial<TrainingOptions> = {}
): TrainedModel {
  const opts: TrainingOptions = { ...DEFAULT_TRAINING_OPTIONS, ...options };
  const { featureNames, rows, labels } = dataset;

  const split = stratifiedSplit(labels, opts.testSize, createSeededRandom(opts.seed));
  const X = rows.map((row) => toRow(row, featureNames));

  const forest = DecisionForest.fit(
    split.trainIndices.map((i) => X[i]),
    split.trainIndices.map((i) => labels[i]),
    {
      nEstimators: opts.nEstimators,
      maxDepth: opts.maxDepth,
      classWeight: "balanced",
      random: createSeededRandom(opts.seed),
    }
  );

  const correct = split.testIndices.filter(
    (i) => labelFromProbability(forest.predictProbability(X[i])) === labels[i]
  ).length;
  const accuracy = correct / split.testIndices.length;

  const importance: FeatureImportance[] = featureNames
    .map((feature, f) => ({ feature, importance: forest.featureImportance[f] }))
    .sort((a, b) => b.importance - a.importance);

  return new TrainedModel(featureNames, { ...dataset.medians }, forest, accuracy, importance, split);
}
