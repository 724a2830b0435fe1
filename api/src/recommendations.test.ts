import {
  categoryForDay,
  EXERCISE_POOL,
  emptyCompletion,
  generateExerciseWeek,
  generateMealWeek,
  MEAL_POOL,
  regenerateExerciseDay,
  regenerateMeal,
  setDayCompleted,
  weeklyProgress,
} from "./recommendations.js";
import { createSeededRandom, type RandomSource } from "./random.js";
import { FITNESS_LEVELS, WEEK_DAYS } from "./types.js";

/** Replays the given values in a loop. */
function scriptedRandom(values: number[]): RandomSource {
  let i = 0;
  return {
    next: () => {
      const value = values[i % values.length];
      i += 1;
      return value;
    },
  };
}

const RECOVERY = "Active Recovery - Light Yoga / Meditation";

describe("exercise week", () => {
  it("rotates categories by day index and keeps Sunday for recovery", () => {
    expect(WEEK_DAYS.map((_, i) => categoryForDay(i))).toEqual([
      "Cardio",
      "Strength",
      "Flexibility",
      "Cardio",
      "Strength",
      "Flexibility",
      "Recovery",
    ]);
  });

  it("draws the first entry of each category when the source returns 0", () => {
    const plan = generateExerciseWeek("Beginner", scriptedRandom([0]));
    expect(plan.map((slot) => slot.text)).toEqual([
      "Brisk Walking (25 mins) - Improves insulin sensitivity",
      "Bodyweight Squats (2x12) - Hormonal balance support",
      "PCOS Yoga Flow (20 mins) - Stress reduction",
      "Brisk Walking (25 mins) - Improves insulin sensitivity",
      "Bodyweight Squats (2x12) - Hormonal balance support",
      "PCOS Yoga Flow (20 mins) - Stress reduction",
      RECOVERY,
    ]);
    expect(plan.map((slot) => slot.day)).toEqual([...WEEK_DAYS]);
  });

  it.each(FITNESS_LEVELS.map((level): [string, (typeof FITNESS_LEVELS)[number]] => [level, level]))(
    "Sunday is recovery and Monday is cardio for %s",
    (_name, level) => {
      const plan = generateExerciseWeek(level, scriptedRandom([0.3, 0.9, 0.1]));
      expect(plan[6]).toEqual({ day: "Sunday", category: "Recovery", text: RECOVERY });
      expect(plan[0].category).toBe("Cardio");
      expect(EXERCISE_POOL.tiers[level].Cardio).toContain(plan[0].text);
    }
  );

  it("regenerating one day leaves the other six alone", () => {
    const plan = generateExerciseWeek("Beginner", scriptedRandom([0]));
    const next = regenerateExerciseDay(plan, 0, "Beginner", scriptedRandom([0.99]));
    expect(next[0]).toEqual({
      day: "Monday",
      category: "Flexibility",
      text: "Stretching Routine (15 mins) - Cortisol control",
    });
    expect(next.slice(1)).toEqual(plan.slice(1));
    expect(plan[0].text).toBe("Brisk Walking (25 mins) - Improves insulin sensitivity");
  });

  it("draws the category first, then the entry", () => {
    const plan = generateExerciseWeek("Intermediate", scriptedRandom([0]));
    // 0.5 -> Strength, 0 -> first Strength entry
    const next = regenerateExerciseDay(plan, 3, "Intermediate", scriptedRandom([0.5, 0]));
    expect(next[3]).toEqual({ day: "Thursday", category: "Strength", text: "Lunges (3x12) - Lower body strength" });
  });

  it("a redrawn weekday can land in any category", () => {
    const plan = generateExerciseWeek("Beginner", scriptedRandom([0]));
    const random = createSeededRandom(1);
    const seen = new Set<string>();
    for (let i = 0; i < 300; i++) {
      const slot = regenerateExerciseDay(plan, 0, "Beginner", random)[0];
      seen.add(slot.category);
      if (slot.category !== "Recovery") {
        expect(EXERCISE_POOL.tiers.Beginner[slot.category]).toContain(slot.text);
      }
    }
    expect([...seen].sort()).toEqual(["Cardio", "Flexibility", "Strength"]);
  });

  it("regenerating Sunday keeps the recovery entry", () => {
    const plan = generateExerciseWeek("Advanced", scriptedRandom([0.5]));
    expect(regenerateExerciseDay(plan, 6, "Advanced", scriptedRandom([0.5]))[6].text).toBe(RECOVERY);
  });

  it("rejects an unknown day", () => {
    const plan = generateExerciseWeek("Beginner", scriptedRandom([0]));
    expect(() => regenerateExerciseDay(plan, 7, "Beginner", scriptedRandom([0]))).toThrow(
      "Day index out of range: 7"
    );
  });
});

describe("completion tracker", () => {
  it("starts with seven open days", () => {
    expect(emptyCompletion()).toEqual([false, false, false, false, false, false, false]);
  });

  it("marks one day without touching the rest", () => {
    const done = setDayCompleted(emptyCompletion(), 3, true);
    expect(done).toEqual([false, false, false, true, false, false, false]);
    expect(setDayCompleted(done, 3, false)).toEqual(emptyCompletion());
  });

  test.each([
    [0, 0],
    [1, 14],
    [2, 28],
    [7, 100],
  ])("%p completed days -> %p%%", (days, percent) => {
    const completion = WEEK_DAYS.map((_, i) => i < days);
    expect(weeklyProgress(completion)).toEqual({ completedDays: days, percent });
  });
});

describe("meal week", () => {
  it("draws one entry per meal type per day", () => {
    const plan = generateMealWeek("Vegetarian", scriptedRandom([0, 0.25, 0.5, 0.75]));
    expect(plan).toHaveLength(7);
    for (const entry of plan) {
      expect(entry.meals).toEqual({
        Breakfast: "Oats with Chia & Nuts - High fiber, controls insulin",
        Lunch: "Quinoa Salad + Paneer",
        Dinner: "Grilled Tofu + Sauteed Veggies",
        Snacks: "Green Tea + Roasted Chana",
      });
    }
  });

  it("regenerating one meal only replaces that slot", () => {
    const plan = generateMealWeek("Non-Vegetarian", scriptedRandom([0]));
    const next = regenerateMeal(plan, 2, "Lunch", "Non-Vegetarian", scriptedRandom([0.5]));
    expect(next[2].meals).toEqual({ ...plan[2].meals, Lunch: "Chicken Salad + Olive Oil" });
    expect(next.filter((_, i) => i !== 2)).toEqual(plan.filter((_, i) => i !== 2));
  });

  it("pools carry four options per meal type", () => {
    expect(MEAL_POOL.Vegetarian.Breakfast).toHaveLength(4);
    expect(MEAL_POOL["Non-Vegetarian"].Snacks).toHaveLength(4);
  });
});
