import path from "node:path";
import { loadDataset } from "./dataset.js";
import type { RandomSource } from "./random.js";
import { trainModel, type TrainedModel } from "./trainer.js";
import type { QuestionnaireAnswers, SessionState } from "./types.js";
import {
  applyAction,
  completeAnswers,
  createSession,
  missingAnswers,
  stepNumber,
  type WizardAction,
  type WizardDeps,
} from "./wizard.js";

const answers: QuestionnaireAnswers = {
  age: 28,
  weightKg: 60,
  heightCm: 160,
  sleepHours: 6,
  exerciseMinutes: 20,
  familyHistory: "Yes",
  menstrualIrregularity: "Yes",
  hormonalImbalance: "No",
  hirsutism: "No",
  mentalHealth: "No",
  insulinResistance: "Yes",
  diabetes: "No",
  smoking: "No",
};

const RECOVERY = "Active Recovery - Light Yoga / Meditation";
const zeroRandom: RandomSource = { next: () => 0 };
const highRandom: RandomSource = { next: () => 0.99 };
const T0 = new Date("2026-03-01T10:00:00.000Z");
const T1 = new Date("2026-03-01T10:05:00.000Z");

let model: TrainedModel;
let deps: WizardDeps;

beforeAll(() => {
  jest.spyOn(console, "log").mockImplementation(() => undefined);
  model = trainModel(loadDataset(path.resolve(__dirname, "../data/Cleaned-Data.csv")), {
    nEstimators: 30,
  });
  deps = { model, random: zeroRandom, now: () => T1 };
});

afterAll(() => {
  jest.restoreAllMocks();
});

function run(state: SessionState, ...actions: WizardAction[]): SessionState {
  return actions.reduce((current, action) => {
    const result = applyAction(current, action, deps);
    if (!result.accepted) throw new Error(`unexpected rejection: ${result.reason}`);
    return result.state;
  }, state);
}

const toInput = () =>
  run(createSession("s-1", T0), { type: "submit_name", name: "Asha" }, { type: "advance" });

const toSummary = () =>
  run(toInput(), { type: "predict", answers }, { type: "advance" }, { type: "advance" }, { type: "advance" });

describe("session basics", () => {
  it("starts at the name step with an empty tracker", () => {
    const session = createSession("s-1", T0);
    expect(session).toEqual({
      id: "s-1",
      step: "name",
      userName: null,
      answers: {},
      prediction: null,
      fitnessLevel: "Beginner",
      dietPreference: "Vegetarian",
      exercisePlan: null,
      completion: [false, false, false, false, false, false, false],
      mealPlan: null,
      createdAt: "2026-03-01T10:00:00.000Z",
      updatedAt: "2026-03-01T10:00:00.000Z",
    });
    expect(stepNumber(session.step)).toBe(1);
    expect(stepNumber("summary")).toBe(7);
  });

  it("completeAnswers needs all thirteen answers", () => {
    expect(completeAnswers(answers)).toEqual(answers);
    const { smoking: _skip, ...partial } = answers;
    expect(completeAnswers(partial)).toBeNull();
    expect(missingAnswers(partial)).toEqual(["smoking"]);
    expect(missingAnswers({})).toHaveLength(13);
  });
});

describe("name → welcome", () => {
  it("refuses a blank name and leaves the state untouched", () => {
    const session = createSession("s-1", T0);
    const result = applyAction(session, { type: "submit_name", name: "   " }, deps);
    expect(result).toEqual({ accepted: false, state: session, reason: "Name is required" });
    expect(result.state).toBe(session);
  });

  it("stores the trimmed name and moves on", () => {
    const next = run(createSession("s-1", T0), { type: "submit_name", name: "  Asha " });
    expect(next.step).toBe("welcome");
    expect(next.userName).toBe("Asha");
    expect(next.updatedAt).toBe("2026-03-01T10:05:00.000Z");
  });

  it("rejects actions that belong to other steps", () => {
    const session = createSession("s-1", T0);
    const result = applyAction(session, { type: "advance" }, deps);
    expect(result.accepted).toBe(false);
    if (!result.accepted) {
      expect(result.reason).toBe('Action "advance" is not available on step "name"');
    }
  });
});

describe("input → result", () => {
  it("collects answers across several submissions", () => {
    const { smoking: _skip, ...partial } = answers;
    const session = run(toInput(), { type: "record_answers", answers: { age: 30 } }, {
      type: "record_answers",
      answers: partial,
    });
    expect(session.step).toBe("input");
    expect(session.answers).toEqual(partial);
  });

  it("will not predict until every answer is in", () => {
    const { smoking: _a, diabetes: _b, ...partial } = answers;
    const session = run(toInput(), { type: "record_answers", answers: partial });
    const result = applyAction(session, { type: "predict" }, deps);
    expect(result).toEqual({
      accepted: false,
      state: session,
      reason: "Missing answers: diabetes, smoking",
    });
    expect(result.state).toBe(session);
  });

  it("scores the answers and stores label, probability and BMI", () => {
    const session = run(toInput(), { type: "predict", answers });
    expect(session.step).toBe("result");
    expect(session.answers).toEqual(answers);
    const prediction = session.prediction;
    expect(prediction).not.toBeNull();
    if (prediction) {
      expect(prediction.bmi).toBeCloseTo(23.4375, 10);
      expect(prediction.label).toBe(prediction.probability >= 50 ? 1 : 0);
    }
  });
});

describe("exercise plan", () => {
  const toExercise = () => run(toInput(), { type: "predict", answers }, { type: "advance" });

  it("builds the week on entry", () => {
    const session = toExercise();
    expect(session.step).toBe("exercise_plan");
    expect(session.exercisePlan?.map((slot) => slot.category)).toEqual([
      "Cardio",
      "Strength",
      "Flexibility",
      "Cardio",
      "Strength",
      "Flexibility",
      "Recovery",
    ]);
    expect(session.exercisePlan?.[6].text).toBe(RECOVERY);
    expect(session.exercisePlan?.[0].text).toBe("Brisk Walking (25 mins) - Improves insulin sensitivity");
  });

  it("regenerates a single day", () => {
    const session = toExercise();
    const result = applyAction(session, { type: "regenerate_exercise_day", dayIndex: 0 }, {
      ...deps,
      random: highRandom,
    });
    expect(result.accepted).toBe(true);
    expect(result.state.exercisePlan?.[0]).toEqual({
      day: "Monday",
      category: "Flexibility",
      text: "Stretching Routine (15 mins) - Cortisol control",
    });
    expect(result.state.exercisePlan?.slice(1)).toEqual(session.exercisePlan?.slice(1));
  });

  it("full-week regeneration clears the completion flags", () => {
    const marked = run(
      toExercise(),
      { type: "set_day_completed", dayIndex: 0, completed: true },
      { type: "set_day_completed", dayIndex: 4, completed: true }
    );
    expect(marked.completion).toEqual([true, false, false, false, true, false, false]);

    const regenerated = run(marked, { type: "regenerate_exercise_week" });
    expect(regenerated.completion).toEqual([false, false, false, false, false, false, false]);
  });

  it("a new fitness level applies to the next draw", () => {
    const session = run(toExercise(), { type: "select_fitness_level", level: "Advanced" });
    expect(session.fitnessLevel).toBe("Advanced");
    expect(session.exercisePlan?.[0].text).toBe("Brisk Walking (25 mins) - Improves insulin sensitivity");

    const redrawn = run(session, { type: "regenerate_exercise_day", dayIndex: 0 });
    expect(redrawn.exercisePlan?.[0].text).toBe("HIIT (30 mins) - Insulin resistance improvement");
  });

  it("rejects an out-of-range day", () => {
    const session = toExercise();
    const result = applyAction(session, { type: "set_day_completed", dayIndex: 9, completed: true }, deps);
    expect(result).toEqual({ accepted: false, state: session, reason: "Unknown day index 9" });
  });
});

describe("diet plan → summary", () => {
  const toDiet = () =>
    run(toInput(), { type: "predict", answers }, { type: "advance" }, { type: "advance" });

  it("builds the meal week on entry", () => {
    const session = toDiet();
    expect(session.step).toBe("diet_plan");
    expect(session.mealPlan).toHaveLength(7);
    expect(session.mealPlan?.[0].meals.Breakfast).toBe("Oats with Chia & Nuts - High fiber, controls insulin");
  });

  it("swaps one meal after a preference change", () => {
    const session = run(toDiet(), { type: "select_diet_preference", preference: "Non-Vegetarian" });
    const result = applyAction(session, { type: "regenerate_meal", dayIndex: 1, mealType: "Dinner" }, {
      ...deps,
      random: highRandom,
    });
    expect(result.state.mealPlan?.[1].meals).toEqual({
      Breakfast: "Oats with Chia & Nuts - High fiber, controls insulin",
      Lunch: "Brown Rice + Dal + Veggies",
      Dinner: "Stir Fry Chicken Bowl",
      Snacks: "Almonds & Walnuts",
    });
    expect(result.state.mealPlan?.[0]).toEqual(session.mealPlan?.[0]);
  });

  it("redraws the whole meal week from the current preference", () => {
    const session = run(
      toInput(),
      { type: "predict", answers },
      { type: "advance" },
      { type: "set_day_completed", dayIndex: 2, completed: true },
      { type: "advance" },
      { type: "select_diet_preference", preference: "Non-Vegetarian" }
    );
    // one cycle per day: Breakfast, Lunch, Dinner, Snacks
    const draws = [0.25, 0.5, 0.75, 0.99];
    let i = 0;
    const scripted: RandomSource = { next: () => draws[i++ % draws.length] };

    const result = applyAction(session, { type: "regenerate_meal_week" }, { ...deps, random: scripted });
    expect(result.accepted).toBe(true);
    expect(i).toBe(28);
    expect(result.state.mealPlan).toHaveLength(7);
    result.state.mealPlan?.forEach((entry, dayIndex) => {
      expect(entry.day).toBe(session.mealPlan?.[dayIndex].day);
      expect(entry.meals).toEqual({
        Breakfast: "Oats + Nuts + Seeds",
        Lunch: "Chicken Salad + Olive Oil",
        Dinner: "Stir Fry Chicken Bowl",
        Snacks: "Green Tea + Seeds Mix",
      });
    });
    expect(result.state.completion).toEqual([false, false, true, false, false, false, false]);
    expect(result.state.exercisePlan).toEqual(session.exercisePlan);
    expect(result.state.step).toBe("diet_plan");
  });

  it("reaches the summary", () => {
    const session = toSummary();
    expect(session.step).toBe("summary");
    expect(session.exercisePlan).toHaveLength(7);
    expect(session.mealPlan).toHaveLength(7);
  });
});

describe("summary", () => {
  it("only accepts reset", () => {
    const session = toSummary();
    const result = applyAction(session, { type: "advance" }, deps);
    expect(result.accepted).toBe(false);
    expect(result.state).toBe(session);
  });

  it("reset clears name, prediction and both plans", () => {
    const reset = run(toSummary(), { type: "reset" });
    expect(reset).toEqual({
      ...createSession("s-1", T1),
      updatedAt: "2026-03-01T10:05:00.000Z",
    });
    expect(reset.userName).toBeNull();
    expect(reset.prediction).toBeNull();
    expect(reset.exercisePlan).toBeNull();
    expect(reset.mealPlan).toBeNull();
  });
});
