// api/src/views.ts
// View models the client renders for each wizard step. Pure functions of
// (session, model); nothing here mutates state.
import { weeklyProgress } from "./recommendations.js";
import { REPORT_FILE_NAME } from "./report.js";
import { BMI_CATEGORY_LIMITS, RISK_BANDS, bmiCategory, riskBand } from "./scorer.js";
import type { TrainedModel } from "./trainer.js";
import {
  DIET_PREFERENCES,
  FITNESS_LEVELS,
  MEAL_TYPES,
  type AnswerKey,
  type BmiCategory,
  type ChoiceAnswers,
  type DietPreference,
  type ExerciseSlot,
  type FeatureImportance,
  type FitnessLevel,
  type MealPlanDay,
  type NumericAnswers,
  type QuestionnaireAnswers,
  type RiskBand,
  type SessionState,
  type WizardStep,
} from "./types.js";
import { missingAnswers, stepNumber } from "./wizard.js";

// ----------------------------------------------------------------------------
// questionnaire fields
// ----------------------------------------------------------------------------

export type SliderField = {
  key: keyof NumericAnswers;
  label: string;
  min: number;
  max: number;
  defaultValue: number;
};

export type ChoiceField = {
  key: keyof ChoiceAnswers;
  label: string;
  options: readonly ["No", "Yes"];
};

export const SLIDER_FIELDS: readonly SliderField[] = [
  { key: "age", label: "Age", min: 15, max: 45, defaultValue: 25 },
  { key: "weightKg", label: "Weight (kg)", min: 35, max: 120, defaultValue: 60 },
  { key: "heightCm", label: "Height (cm)", min: 140, max: 180, defaultValue: 160 },
  { key: "sleepHours", label: "Sleep Hours", min: 4, max: 10, defaultValue: 7 },
  { key: "exerciseMinutes", label: "Exercise Duration", min: 0, max: 90, defaultValue: 30 },
];

const YES_NO = ["No", "Yes"] as const;

export const CHOICE_FIELDS: readonly ChoiceField[] = [
  { key: "familyHistory", label: "Family History of PCOS", options: YES_NO },
  { key: "menstrualIrregularity", label: "Menstrual Irregularity", options: YES_NO },
  { key: "hormonalImbalance", label: "Hormonal Imbalance", options: YES_NO },
  { key: "hirsutism", label: "Hirsutism", options: YES_NO },
  { key: "mentalHealth", label: "Mental Health Issues", options: YES_NO },
  { key: "insulinResistance", label: "Insulin Resistance", options: YES_NO },
  { key: "diabetes", label: "Diabetes", options: YES_NO },
  { key: "smoking", label: "Smoking", options: YES_NO },
];

// ----------------------------------------------------------------------------
// view types
// ----------------------------------------------------------------------------

export type ModelSidebar = {
  accuracyPercent: string;
  featureImportance: readonly FeatureImportance[];
};

type ViewBase<S extends WizardStep> = { step: S; stepNumber: number; sidebar: ModelSidebar };

export type StepView =
  | (ViewBase<"name"> & { title: string; subtitle: string; prompt: string })
  | (ViewBase<"welcome"> & { title: string; message: string })
  | (ViewBase<"input"> & {
      title: string;
      sliders: readonly SliderField[];
      choices: readonly ChoiceField[];
      answers: Partial<QuestionnaireAnswers>;
      missing: AnswerKey[];
    })
  | (ViewBase<"result"> & {
      headline: string;
      tone: "danger" | "success";
      gauge: {
        value: number;
        band: RiskBand;
        bands: ReadonlyArray<{ band: RiskBand; from: number; to: number }>;
      };
      bmi: {
        value: number;
        display: string;
        category: BmiCategory;
        limits: ReadonlyArray<{ category: BmiCategory; limit: number }>;
      };
    })
  | (ViewBase<"exercise_plan"> & {
      title: string;
      level: FitnessLevel;
      levels: readonly FitnessLevel[];
      days: Array<ExerciseSlot & { dayIndex: number; completed: boolean }>;
      progress: { completedDays: number; totalDays: number; percent: number };
    })
  | (ViewBase<"diet_plan"> & {
      title: string;
      preference: DietPreference;
      preferences: readonly DietPreference[];
      days: Array<{ dayIndex: number; day: string; meals: Array<{ mealType: string; text: string }> }>;
    })
  | (ViewBase<"summary"> & {
      title: string;
      name: string;
      probability: string;
      bmi: string;
      riskLabel: string;
      tone: "danger" | "success";
      exercisePlan: Array<{ day: string; text: string }>;
      mealPlan: MealPlanDay[];
      reportFileName: string;
    });

// ----------------------------------------------------------------------------
// render
// ----------------------------------------------------------------------------

export function buildSidebar(model: TrainedModel): ModelSidebar {
  return {
    accuracyPercent: `${(model.accuracy * 100).toFixed(2)}%`,
    featureImportance: model.importance,
  };
}

export const riskHeadline = (label: 0 | 1, probability: number) =>
  label === 1
    ? `High PCOS Risk (${probability.toFixed(2)}%)`
    : `Low PCOS Risk (${probability.toFixed(2)}%)`;

export function renderView(state: SessionState, model: TrainedModel): StepView {
  const sidebar = buildSidebar(model);
  const base = { stepNumber: stepNumber(state.step), sidebar };

  switch (state.step) {
    case "name":
      return {
        ...base,
        step: "name",
        title: "PCOS Lifestyle & Health Advisor",
        subtitle: "Health risk prediction with a weekly lifestyle plan",
        prompt: "Enter Your Name",
      };

    case "welcome":
      return {
        ...base,
        step: "welcome",
        title: `Welcome ${state.userName ?? ""}!`,
        message: "This assistant will analyze your health details and give personalized advice.",
      };

    case "input":
      return {
        ...base,
        step: "input",
        title: "Enter Your Health Details",
        sliders: SLIDER_FIELDS,
        choices: CHOICE_FIELDS,
        answers: state.answers,
        missing: missingAnswers(state.answers),
      };

    case "result": {
      if (!state.prediction) throw new Error(`Session ${state.id} reached result without a prediction`);
      const { label, probability, bmi } = state.prediction;
      return {
        ...base,
        step: "result",
        headline: riskHeadline(label, probability),
        tone: label === 1 ? "danger" : "success",
        gauge: { value: probability, band: riskBand(probability), bands: RISK_BANDS },
        bmi: { value: bmi, display: bmi.toFixed(2), category: bmiCategory(bmi), limits: BMI_CATEGORY_LIMITS },
      };
    }

    case "exercise_plan": {
      const plan = state.exercisePlan ?? [];
      const progress = weeklyProgress(state.completion);
      return {
        ...base,
        step: "exercise_plan",
        title: "PCOS-Friendly Weekly Exercise Planner",
        level: state.fitnessLevel,
        levels: FITNESS_LEVELS,
        days: plan.map((slot, dayIndex) => ({ ...slot, dayIndex, completed: state.completion[dayIndex] ?? false })),
        progress: { ...progress, totalDays: state.completion.length },
      };
    }

    case "diet_plan":
      return {
        ...base,
        step: "diet_plan",
        title: "PCOS-Friendly Weekly Food Planner",
        preference: state.dietPreference,
        preferences: DIET_PREFERENCES,
        days: (state.mealPlan ?? []).map((entry, dayIndex) => ({
          dayIndex,
          day: entry.day,
          meals: MEAL_TYPES.map((mealType) => ({ mealType, text: entry.meals[mealType] })),
        })),
      };

    case "summary": {
      if (!state.prediction) throw new Error(`Session ${state.id} reached summary without a prediction`);
      const { label, probability, bmi } = state.prediction;
      return {
        ...base,
        step: "summary",
        title: "PCOS Health Summary Report",
        name: state.userName ?? "",
        probability: `${probability.toFixed(2)}%`,
        bmi: bmi.toFixed(2),
        riskLabel: label === 1 ? "High PCOS Risk" : "Low PCOS Risk",
        tone: label === 1 ? "danger" : "success",
        exercisePlan: (state.exercisePlan ?? []).map(({ day, text }) => ({ day, text })),
        mealPlan: state.mealPlan ?? [],
        reportFileName: REPORT_FILE_NAME,
      };
    }
  }
}
