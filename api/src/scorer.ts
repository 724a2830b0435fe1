// api/src/scorer.ts
import { labelFromProbability, type TrainedModel } from "./trainer.js";
import type {
  BmiCategory,
  FeatureKey,
  FeatureVector,
  Prediction,
  QuestionnaireAnswers,
  RiskBand,
  ScoreResult,
  YesNo,
} from "./types.js";

/** Caller handed the scorer a vector that does not match the trained feature set. */
export class ScoringContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScoringContractError";
  }
}

const yesNoToBit = (value: YesNo) => (value === "Yes" ? 1 : 0);

export function buildFeatureVector(answers: QuestionnaireAnswers): FeatureVector {
  return {
    Age: answers.age,
    Weight_kg: answers.weightKg,
    Sleep_Hours: answers.sleepHours,
    Exercise_Duration: answers.exerciseMinutes,
    Family_History_PCOS: yesNoToBit(answers.familyHistory),
    Menstrual_Irregularity: yesNoToBit(answers.menstrualIrregularity),
    Hormonal_Imbalance: yesNoToBit(answers.hormonalImbalance),
    Hirsutism: yesNoToBit(answers.hirsutism),
    Mental_Health: yesNoToBit(answers.mentalHealth),
    Insulin_Resistance: yesNoToBit(answers.insulinResistance),
    Diabetes: yesNoToBit(answers.diabetes),
    Smoking: yesNoToBit(answers.smoking),
  };
}

/**
 * Orders the vector the way the model was trained. No imputation here:
 * a missing, extra or non-finite entry is a caller bug.
 */
export function projectFeatureVector(
  vector: Readonly<Record<string, number>>,
  featureNames: readonly FeatureKey[]
): number[] {
  const extra = Object.keys(vector).filter((key) => !featureNames.some((name) => name === key));
  if (extra.length > 0) {
    throw new ScoringContractError(`Unexpected feature keys: ${extra.join(", ")}`);
  }
  return featureNames.map((key) => {
    const value = vector[key];
    if (value === undefined) {
      throw new ScoringContractError(`Missing feature: ${key}`);
    }
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new ScoringContractError(`Feature ${key} is not a finite number`);
    }
    return value;
  });
}

export function scoreFeatureVector(
  model: TrainedModel,
  vector: Readonly<Record<string, number>>
): ScoreResult {
  const row = projectFeatureVector(vector, model.featureNames);
  const positive = model.predictProbability(row);
  return {
    label: labelFromProbability(positive),
    probability: positive * 100,
  };
}

export function computeBmi(weightKg: number, heightCm: number): number {
  const heightM = heightCm / 100;
  return weightKg / heightM ** 2;
}

export function scoreAnswers(model: TrainedModel, answers: QuestionnaireAnswers): Prediction {
  const score = scoreFeatureVector(model, buildFeatureVector(answers));
  return { ...score, bmi: computeBmi(answers.weightKg, answers.heightCm) };
}

// ----------------------------------------------------------------------------
// display bands
// ----------------------------------------------------------------------------

export const BMI_CATEGORY_LIMITS: ReadonlyArray<{ category: BmiCategory; limit: number }> = [
  { category: "Underweight", limit: 18.5 },
  { category: "Normal", limit: 24.9 },
  { category: "Overweight", limit: 29.9 },
  { category: "Obese", limit: 35 },
];

export function bmiCategory(bmi: number): BmiCategory {
  if (bmi < 18.5) return "Underweight";
  if (bmi < 25) return "Normal";
  if (bmi < 30) return "Overweight";
  return "Obese";
}

export const RISK_BANDS: ReadonlyArray<{ band: RiskBand; from: number; to: number }> = [
  { band: "low", from: 0, to: 30 },
  { band: "moderate", from: 30, to: 70 },
  { band: "high", from: 70, to: 100 },
];

/** probability in percent */
export function riskBand(probability: number): RiskBand {
  if (probability < 30) return "low";
  if (probability < 70) return "moderate";
  return "high";
}
