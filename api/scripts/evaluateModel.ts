// api/scripts/evaluateModel.ts
// Trains on the configured dataset and prints accuracy + feature importance.
// Usage: tsx api/scripts/evaluateModel.ts [datasetPath] [seed]

import path from "node:path";
import { loadDataset } from "../src/dataset.js";
import { trainModel } from "../src/trainer.js";

function main() {
  const datasetPath = path.resolve(process.argv[2] ?? "api/data/Cleaned-Data.csv");
  const seed = process.argv[3] ? Number(process.argv[3]) : undefined;
  if (seed !== undefined && !Number.isFinite(seed)) {
    throw new Error(`seed must be a number, got "${process.argv[3]}"`);
  }

  const dataset = loadDataset(datasetPath);
  const model = trainModel(dataset, seed === undefined ? {} : { seed });

  console.log(`\nHeld-out accuracy: ${(model.accuracy * 100).toFixed(2)}%`);
  console.log(`Train/test: ${model.split.trainIndices.length}/${model.split.testIndices.length}\n`);
  console.log("Feature importance:");
  for (const { feature, importance } of model.importance) {
    console.log(`  ${feature.padEnd(24)} ${importance.toFixed(4)}`);
  }
}

try {
  main();
} catch (e) {
  console.error("❌ evaluate failed:", e instanceof Error ? e.message : e);
  process.exit(1);
}
