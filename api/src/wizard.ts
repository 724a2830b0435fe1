// api/src/wizard.ts
// ============================================================================
// ASSESSMENT WIZARD
//
// name → welcome → input → result → exercise_plan → diet_plan → summary
//
// Forward only. Each step owns a handler; an action the current step does not
// understand (or a failed guard) is rejected and the state comes back as-is.
// From summary the only way out is `reset`, which starts over at `name`.
// ============================================================================
import {
  emptyCompletion,
  generateExerciseWeek,
  generateMealWeek,
  regenerateExerciseDay,
  regenerateMeal,
  setDayCompleted,
} from "./recommendations.js";
import type { RandomSource } from "./random.js";
import { scoreAnswers } from "./scorer.js";
import type { TrainedModel } from "./trainer.js";
import {
  CHOICE_ANSWER_KEYS,
  NUMERIC_ANSWER_KEYS,
  WEEK_DAYS,
  WIZARD_STEPS,
  type AnswerKey,
  type DietPreference,
  type FitnessLevel,
  type MealType,
  type QuestionnaireAnswers,
  type SessionState,
  type WizardStep,
} from "./types.js";

// ============================================================================
// TYPES
// ============================================================================

export type WizardAction =
  | { type: "submit_name"; name: string }
  | { type: "advance" }
  | { type: "record_answers"; answers: Partial<QuestionnaireAnswers> }
  | { type: "predict"; answers?: Partial<QuestionnaireAnswers> }
  | { type: "select_fitness_level"; level: FitnessLevel }
  | { type: "regenerate_exercise_day"; dayIndex: number }
  | { type: "regenerate_exercise_week" }
  | { type: "set_day_completed"; dayIndex: number; completed: boolean }
  | { type: "select_diet_preference"; preference: DietPreference }
  | { type: "regenerate_meal"; dayIndex: number; mealType: MealType }
  | { type: "regenerate_meal_week" }
  | { type: "reset" };

export type WizardActionType = WizardAction["type"];

export type WizardDeps = {
  model: TrainedModel;
  random: RandomSource;
  now?: () => Date;
};

export type TransitionResult =
  | { accepted: true; state: SessionState }
  | { accepted: false; state: SessionState; reason: string };

type StepHandler = (state: SessionState, action: WizardAction, deps: WizardDeps) => TransitionResult;

// ============================================================================
// SESSION
// ============================================================================

export function createSession(id: string, now: Date = new Date()): SessionState {
  const ts = now.toISOString();
  return {
    id,
    step: "name",
    userName: null,
    answers: {},
    prediction: null,
    fitnessLevel: "Beginner",
    dietPreference: "Vegetarian",
    exercisePlan: null,
    completion: emptyCompletion(),
    mealPlan: null,
    createdAt: ts,
    updatedAt: ts,
  };
}

export function stepNumber(step: WizardStep): number {
  return WIZARD_STEPS.indexOf(step) + 1;
}

const ANSWER_KEYS: readonly AnswerKey[] = [...NUMERIC_ANSWER_KEYS, ...CHOICE_ANSWER_KEYS];

export function missingAnswers(answers: Partial<QuestionnaireAnswers>): AnswerKey[] {
  return ANSWER_KEYS.filter((key) => answers[key] === undefined);
}

export function completeAnswers(answers: Partial<QuestionnaireAnswers>): QuestionnaireAnswers | null {
  const {
    age, weightKg, heightCm, sleepHours, exerciseMinutes,
    familyHistory, menstrualIrregularity, hormonalImbalance, hirsutism,
    mentalHealth, insulinResistance, diabetes, smoking,
  } = answers;
  if (
    age === undefined || weightKg === undefined || heightCm === undefined ||
    sleepHours === undefined || exerciseMinutes === undefined ||
    familyHistory === undefined || menstrualIrregularity === undefined ||
    hormonalImbalance === undefined || hirsutism === undefined ||
    mentalHealth === undefined || insulinResistance === undefined ||
    diabetes === undefined || smoking === undefined
  ) {
    return null;
  }
  return {
    age, weightKg, heightCm, sleepHours, exerciseMinutes,
    familyHistory, menstrualIrregularity, hormonalImbalance, hirsutism,
    mentalHealth, insulinResistance, diabetes, smoking,
  };
}

// ============================================================================
// HANDLERS
// ============================================================================

const accept = (state: SessionState): TransitionResult => ({ accepted: true, state });
const reject = (state: SessionState, reason: string): TransitionResult => ({ accepted: false, state, reason });

const unsupported = (state: SessionState, action: WizardAction) =>
  reject(state, `Action "${action.type}" is not available on step "${state.step}"`);

const isDayIndex = (dayIndex: number) => Number.isInteger(dayIndex) && dayIndex >= 0 && dayIndex < WEEK_DAYS.length;

const STEP_HANDLERS: { [S in WizardStep]: StepHandler } = {
  name: (state, action) => {
    if (action.type !== "submit_name") return unsupported(state, action);
    const name = action.name.trim();
    if (!name) return reject(state, "Name is required");
    return accept({ ...state, userName: name, step: "welcome" });
  },

  welcome: (state, action) => {
    if (action.type !== "advance") return unsupported(state, action);
    return accept({ ...state, step: "input" });
  },

  input: (state, action, deps) => {
    switch (action.type) {
      case "record_answers":
        return accept({ ...state, answers: { ...state.answers, ...action.answers } });
      case "predict": {
        const merged = { ...state.answers, ...action.answers };
        const answers = completeAnswers(merged);
        if (!answers) {
          return reject(state, `Missing answers: ${missingAnswers(merged).join(", ")}`);
        }
        return accept({
          ...state,
          answers,
          prediction: scoreAnswers(deps.model, answers),
          step: "result",
        });
      }
      default:
        return unsupported(state, action);
    }
  },

  result: (state, action, deps) => {
    if (action.type !== "advance") return unsupported(state, action);
    if (state.exercisePlan) return accept({ ...state, step: "exercise_plan" });
    return accept({
      ...state,
      exercisePlan: generateExerciseWeek(state.fitnessLevel, deps.random),
      completion: emptyCompletion(),
      step: "exercise_plan",
    });
  },

  exercise_plan: (state, action, deps) => {
    const plan = state.exercisePlan ?? generateExerciseWeek(state.fitnessLevel, deps.random);
    switch (action.type) {
      case "select_fitness_level":
        return accept({ ...state, exercisePlan: plan, fitnessLevel: action.level });
      case "regenerate_exercise_day":
        if (!isDayIndex(action.dayIndex)) return reject(state, `Unknown day index ${action.dayIndex}`);
        return accept({
          ...state,
          exercisePlan: regenerateExerciseDay(plan, action.dayIndex, state.fitnessLevel, deps.random),
        });
      case "regenerate_exercise_week":
        return accept({
          ...state,
          exercisePlan: generateExerciseWeek(state.fitnessLevel, deps.random),
          completion: emptyCompletion(),
        });
      case "set_day_completed":
        if (!isDayIndex(action.dayIndex)) return reject(state, `Unknown day index ${action.dayIndex}`);
        return accept({
          ...state,
          exercisePlan: plan,
          completion: setDayCompleted(state.completion, action.dayIndex, action.completed),
        });
      case "advance":
        return accept({
          ...state,
          exercisePlan: plan,
          mealPlan: state.mealPlan ?? generateMealWeek(state.dietPreference, deps.random),
          step: "diet_plan",
        });
      default:
        return unsupported(state, action);
    }
  },

  diet_plan: (state, action, deps) => {
    const plan = state.mealPlan ?? generateMealWeek(state.dietPreference, deps.random);
    switch (action.type) {
      case "select_diet_preference":
        return accept({ ...state, mealPlan: plan, dietPreference: action.preference });
      case "regenerate_meal":
        if (!isDayIndex(action.dayIndex)) return reject(state, `Unknown day index ${action.dayIndex}`);
        return accept({
          ...state,
          mealPlan: regenerateMeal(plan, action.dayIndex, action.mealType, state.dietPreference, deps.random),
        });
      case "regenerate_meal_week":
        return accept({ ...state, mealPlan: generateMealWeek(state.dietPreference, deps.random) });
      case "advance":
        return accept({ ...state, mealPlan: plan, step: "summary" });
      default:
        return unsupported(state, action);
    }
  },

  summary: (state, action, deps) => {
    if (action.type !== "reset") return unsupported(state, action);
    return accept(createSession(state.id, deps.now?.() ?? new Date()));
  },
};

export function applyAction(state: SessionState, action: WizardAction, deps: WizardDeps): TransitionResult {
  const result = STEP_HANDLERS[state.step](state, action, deps);
  if (!result.accepted) return result;
  const updatedAt = (deps.now?.() ?? new Date()).toISOString();
  return { accepted: true, state: { ...result.state, updatedAt } };
}
