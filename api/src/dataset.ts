// api/src/dataset.ts
// ============================================================================
// DATASET LOADER
//
// Reads the questionnaire CSV and turns every labeled row into a numeric
// FeatureVector. Unknown or blank cells become missing and are filled with the
// column median; the medians are returned so the model can expose them.
// ============================================================================
import fs from "node:fs";
import Papa from "papaparse";
import {
  FEATURE_KEYS,
  LABEL_COLUMN,
  type FeatureKey,
  type FeatureMedians,
  type FeatureVector,
  type Label,
  type LabeledDataset,
  type RawRecord,
} from "./types.js";

export class DatasetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DatasetError";
  }
}

// ----------------------------------------------------------------------------
// bucket tables
// ----------------------------------------------------------------------------

export const SLEEP_HOUR_BUCKETS: ReadonlyMap<string, number> = new Map([
  ["Less than 6 hours", 5],
  ["6-8 hours", 7],
  ["9-12 hours", 10.5],
  ["More than 8 hours", 9],
]);

export const EXERCISE_DURATION_BUCKETS: ReadonlyMap<string, number> = new Map([
  ["Less than 30 minutes", 15],
  ["30 minutes", 30],
  ["30 minutes to 1 hour", 45],
  ["More than 1 hour", 75],
]);

export const REQUIRED_COLUMNS: readonly string[] = [...FEATURE_KEYS, LABEL_COLUMN];

// ----------------------------------------------------------------------------
// cell parsers (null = missing)
// ----------------------------------------------------------------------------

export function parseYesNo(raw: string | undefined): Label | null {
  const value = String(raw ?? "").trim().toLowerCase();
  if (value === "yes") return 1;
  if (value === "no") return 0;
  return null;
}

export function parseNumber(raw: string | undefined): number | null {
  const value = String(raw ?? "").trim();
  if (!value) return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

/** First run of digits: "20-25" -> 20, "Less than 20" -> 20. */
export function parseAge(raw: string | undefined): number | null {
  const match = /\d+/.exec(String(raw ?? ""));
  return match ? Number(match[0]) : null;
}

export function parseBucket(raw: string | undefined, table: ReadonlyMap<string, number>): number | null {
  const value = String(raw ?? "").trim();
  const bucket = table.get(value);
  if (bucket !== undefined) return bucket;
  return parseNumber(value);
}

function parseFeatureCell(key: FeatureKey, raw: string | undefined): number | null {
  switch (key) {
    case "Age":
      return parseAge(raw);
    case "Sleep_Hours":
      return parseBucket(raw, SLEEP_HOUR_BUCKETS);
    case "Exercise_Duration":
      return parseBucket(raw, EXERCISE_DURATION_BUCKETS);
    case "Weight_kg":
      return parseNumber(raw);
    default:
      return parseYesNo(raw);
  }
}

// ----------------------------------------------------------------------------
// medians
// ----------------------------------------------------------------------------

export function median(values: readonly number[]): number {
  if (values.length === 0) return Number.NaN;
  const sorted = values.slice().sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

// ----------------------------------------------------------------------------
// normalization
// ----------------------------------------------------------------------------

type PartialRow = Record<FeatureKey, number | null>;

/** Builds a record over every feature key, in FEATURE_KEYS order. */
export function mapFeatures<T>(fn: (key: FeatureKey) => T): Record<FeatureKey, T> {
  return {
    Age: fn("Age"),
    Weight_kg: fn("Weight_kg"),
    Sleep_Hours: fn("Sleep_Hours"),
    Exercise_Duration: fn("Exercise_Duration"),
    Family_History_PCOS: fn("Family_History_PCOS"),
    Menstrual_Irregularity: fn("Menstrual_Irregularity"),
    Hormonal_Imbalance: fn("Hormonal_Imbalance"),
    Hirsutism: fn("Hirsutism"),
    Mental_Health: fn("Mental_Health"),
    Insulin_Resistance: fn("Insulin_Resistance"),
    Diabetes: fn("Diabetes"),
    Smoking: fn("Smoking"),
  };
}

export function normalizeRecords(records: readonly RawRecord[], columns: readonly string[]): LabeledDataset {
  const missingColumns = REQUIRED_COLUMNS.filter((col) => !columns.includes(col));
  if (missingColumns.length > 0) {
    throw new DatasetError(`Dataset is missing required columns: ${missingColumns.join(", ")}`);
  }

  const partialRows: PartialRow[] = [];
  const labels: Label[] = [];
  let droppedRows = 0;

  for (const record of records) {
    const label = parseYesNo(record[LABEL_COLUMN]);
    if (label === null) {
      droppedRows += 1;
      continue;
    }
    partialRows.push(mapFeatures((key) => parseFeatureCell(key, record[key])));
    labels.push(label);
  }

  if (partialRows.length === 0) {
    throw new DatasetError("Dataset has no rows with a yes/no label");
  }

  const medians: FeatureMedians = mapFeatures((key) => {
    const present: number[] = [];
    for (const row of partialRows) {
      const value = row[key];
      if (value !== null) present.push(value);
    }
    if (present.length === 0) {
      throw new DatasetError(`Column ${key} has no usable values`);
    }
    return median(present);
  });

  const rows: FeatureVector[] = partialRows.map((row) => mapFeatures((key) => row[key] ?? medians[key]));

  return { featureNames: FEATURE_KEYS, rows, labels, medians, droppedRows };
}

export function parseDatasetCsv(text: string): LabeledDataset {
  const parsed = Papa.parse<RawRecord>(text.replace(/^\uFEFF/, ""), {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: (header) => header.trim(),
  });
  return normalizeRecords(parsed.data, parsed.meta.fields ?? []);
}

export function loadDataset(filePath: string): LabeledDataset {
  if (!fs.existsSync(filePath)) {
    throw new DatasetError(`Dataset file not found: ${filePath}`);
  }
  const dataset = parseDatasetCsv(fs.readFileSync(filePath, "utf8"));
  const positives = dataset.labels.filter((label) => label === 1).length;
  console.log(
    `dataset: ${dataset.rows.length} labeled rows (${positives} positive), ${dataset.droppedRows} dropped`
  );
  return dataset;
}
