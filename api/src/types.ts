// api/src/types.ts
// Shared domain types for the dataset, the model and the wizard session.

// ----------------------------------------------------------------------------
// dataset & features
// ----------------------------------------------------------------------------

export const FEATURE_KEYS = [
  "Age",
  "Weight_kg",
  "Sleep_Hours",
  "Exercise_Duration",
  "Family_History_PCOS",
  "Menstrual_Irregularity",
  "Hormonal_Imbalance",
  "Hirsutism",
  "Mental_Health",
  "Insulin_Resistance",
  "Diabetes",
  "Smoking",
] as const;

export type FeatureKey = (typeof FEATURE_KEYS)[number];

export const BINARY_FEATURE_KEYS = [
  "Family_History_PCOS",
  "Menstrual_Irregularity",
  "Hormonal_Imbalance",
  "Hirsutism",
  "Mental_Health",
  "Insulin_Resistance",
  "Diabetes",
  "Smoking",
] as const satisfies readonly FeatureKey[];

export type BinaryFeatureKey = (typeof BINARY_FEATURE_KEYS)[number];

export const LABEL_COLUMN = "PCOS";

export type RawRecord = Record<string, string>;
export type FeatureVector = Record<FeatureKey, number>;
export type FeatureMedians = Record<FeatureKey, number>;
export type Label = 0 | 1;

export type LabeledDataset = {
  featureNames: readonly FeatureKey[];
  rows: FeatureVector[];
  labels: Label[];
  medians: FeatureMedians;
  droppedRows: number;
};

export type FeatureImportance = { feature: FeatureKey; importance: number };

// ----------------------------------------------------------------------------
// questionnaire
// ----------------------------------------------------------------------------

export type YesNo = "Yes" | "No";

export type NumericAnswers = {
  age: number;
  weightKg: number;
  heightCm: number;
  sleepHours: number;
  exerciseMinutes: number;
};

export type ChoiceAnswers = {
  familyHistory: YesNo;
  menstrualIrregularity: YesNo;
  hormonalImbalance: YesNo;
  hirsutism: YesNo;
  mentalHealth: YesNo;
  insulinResistance: YesNo;
  diabetes: YesNo;
  smoking: YesNo;
};

export type QuestionnaireAnswers = NumericAnswers & ChoiceAnswers;

export const NUMERIC_ANSWER_KEYS = [
  "age",
  "weightKg",
  "heightCm",
  "sleepHours",
  "exerciseMinutes",
] as const satisfies readonly (keyof NumericAnswers)[];

export const CHOICE_ANSWER_KEYS = [
  "familyHistory",
  "menstrualIrregularity",
  "hormonalImbalance",
  "hirsutism",
  "mentalHealth",
  "insulinResistance",
  "diabetes",
  "smoking",
] as const satisfies readonly (keyof ChoiceAnswers)[];

export type AnswerKey = keyof QuestionnaireAnswers;

// ----------------------------------------------------------------------------
// scoring
// ----------------------------------------------------------------------------

export type ScoreResult = {
  label: Label;
  /** positive-class probability, 0..100 */
  probability: number;
};

export type Prediction = ScoreResult & { bmi: number };

export type BmiCategory = "Underweight" | "Normal" | "Overweight" | "Obese";
export type RiskBand = "low" | "moderate" | "high";

// ----------------------------------------------------------------------------
// recommendations
// ----------------------------------------------------------------------------

export const WEEK_DAYS = [
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
  "Sunday",
] as const;

export type WeekDay = (typeof WEEK_DAYS)[number];

export const FITNESS_LEVELS = ["Beginner", "Intermediate", "Advanced"] as const;
export type FitnessLevel = (typeof FITNESS_LEVELS)[number];

export const EXERCISE_CATEGORIES = ["Cardio", "Strength", "Flexibility"] as const;
export type ExerciseCategory = (typeof EXERCISE_CATEGORIES)[number];

export type ExerciseSlot = {
  day: WeekDay;
  category: ExerciseCategory | "Recovery";
  text: string;
};

export const DIET_PREFERENCES = ["Vegetarian", "Non-Vegetarian"] as const;
export type DietPreference = (typeof DIET_PREFERENCES)[number];

export const MEAL_TYPES = ["Breakfast", "Lunch", "Dinner", "Snacks"] as const;
export type MealType = (typeof MEAL_TYPES)[number];

export type MealPlanDay = {
  day: WeekDay;
  meals: Record<MealType, string>;
};

// ----------------------------------------------------------------------------
// wizard session
// ----------------------------------------------------------------------------

export const WIZARD_STEPS = [
  "name",
  "welcome",
  "input",
  "result",
  "exercise_plan",
  "diet_plan",
  "summary",
] as const;

export type WizardStep = (typeof WIZARD_STEPS)[number];

export type SessionState = {
  id: string;
  step: WizardStep;
  userName: string | null;
  answers: Partial<QuestionnaireAnswers>;
  prediction: Prediction | null;
  fitnessLevel: FitnessLevel;
  dietPreference: DietPreference;
  exercisePlan: ExerciseSlot[] | null;
  completion: boolean[];
  mealPlan: MealPlanDay[] | null;
  createdAt: string;
  updatedAt: string;
};
