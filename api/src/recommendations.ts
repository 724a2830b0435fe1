// api/src/recommendations.ts
// ============================================================================
// WEEKLY RECOMMENDATIONS
//
// Exercise week: Sunday is always active recovery; Monday..Saturday rotate
// Cardio → Strength → Flexibility by day index and draw one entry from the
// tier's list. Redrawing a single day picks the category at random first.
// Meal week: one draw per meal type per day. Repeats allowed.
// ============================================================================
import { z } from "zod";
import exercisePoolJson from "../data/exercisePool.json";
import mealPoolJson from "../data/mealPool.json";
import { pickOne, type RandomSource } from "./random.js";
import {
  EXERCISE_CATEGORIES,
  WEEK_DAYS,
  type DietPreference,
  type ExerciseCategory,
  type ExerciseSlot,
  type FitnessLevel,
  type MealPlanDay,
  type MealType,
} from "./types.js";

// ----------------------------------------------------------------------------
// pools
// ----------------------------------------------------------------------------

const entryList = z.array(z.string().min(1)).min(1);

const ExerciseTierSchema = z.object({
  Cardio: entryList,
  Strength: entryList,
  Flexibility: entryList,
});

export const ExercisePoolSchema = z.object({
  recovery: z.string().min(1),
  tiers: z.object({
    Beginner: ExerciseTierSchema,
    Intermediate: ExerciseTierSchema,
    Advanced: ExerciseTierSchema,
  }),
});

const MealMenuSchema = z.object({
  Breakfast: entryList,
  Lunch: entryList,
  Dinner: entryList,
  Snacks: entryList,
});

export const MealPoolSchema = z.object({
  Vegetarian: MealMenuSchema,
  "Non-Vegetarian": MealMenuSchema,
});

export type ExercisePool = z.infer<typeof ExercisePoolSchema>;
export type MealPool = z.infer<typeof MealPoolSchema>;

export const EXERCISE_POOL: ExercisePool = ExercisePoolSchema.parse(exercisePoolJson);
export const MEAL_POOL: MealPool = MealPoolSchema.parse(mealPoolJson);

export const SUNDAY_INDEX = WEEK_DAYS.indexOf("Sunday");

// ----------------------------------------------------------------------------
// exercise week
// ----------------------------------------------------------------------------

export function categoryForDay(dayIndex: number): ExerciseCategory | "Recovery" {
  if (dayIndex === SUNDAY_INDEX) return "Recovery";
  return EXERCISE_CATEGORIES[dayIndex % EXERCISE_CATEGORIES.length];
}

export function drawExerciseForDay(
  level: FitnessLevel,
  dayIndex: number,
  random: RandomSource,
  pool: ExercisePool = EXERCISE_POOL
): ExerciseSlot {
  const day = WEEK_DAYS[dayIndex];
  if (!day) throw new RangeError(`Day index out of range: ${dayIndex}`);
  const category = categoryForDay(dayIndex);
  if (category === "Recovery") {
    return { day, category, text: pool.recovery };
  }
  return { day, category, text: pickOne(random, pool.tiers[level][category]) };
}

export function generateExerciseWeek(
  level: FitnessLevel,
  random: RandomSource,
  pool: ExercisePool = EXERCISE_POOL
): ExerciseSlot[] {
  return WEEK_DAYS.map((_, i) => drawExerciseForDay(level, i, random, pool));
}

/**
 * Redraws one day: uniform category, then a uniform entry from it. The slot
 * is tagged with the drawn category. Sunday keeps the recovery entry.
 */
export function regenerateExerciseDay(
  plan: readonly ExerciseSlot[],
  dayIndex: number,
  level: FitnessLevel,
  random: RandomSource,
  pool: ExercisePool = EXERCISE_POOL
): ExerciseSlot[] {
  const day = WEEK_DAYS[dayIndex];
  if (!day) throw new RangeError(`Day index out of range: ${dayIndex}`);
  let fresh: ExerciseSlot;
  if (dayIndex === SUNDAY_INDEX) {
    fresh = { day, category: "Recovery", text: pool.recovery };
  } else {
    const category = pickOne(random, EXERCISE_CATEGORIES);
    fresh = { day, category, text: pickOne(random, pool.tiers[level][category]) };
  }
  return plan.map((slot, i) => (i === dayIndex ? fresh : slot));
}

// ----------------------------------------------------------------------------
// completion tracker
// ----------------------------------------------------------------------------

export function emptyCompletion(): boolean[] {
  return WEEK_DAYS.map(() => false);
}

export function setDayCompleted(completion: readonly boolean[], dayIndex: number, done: boolean): boolean[] {
  if (dayIndex < 0 || dayIndex >= WEEK_DAYS.length) {
    throw new RangeError(`Day index out of range: ${dayIndex}`);
  }
  return completion.map((flag, i) => (i === dayIndex ? done : flag));
}

export function weeklyProgress(completion: readonly boolean[]): { completedDays: number; percent: number } {
  const completedDays = completion.filter(Boolean).length;
  return { completedDays, percent: Math.trunc((completedDays / WEEK_DAYS.length) * 100) };
}

// ----------------------------------------------------------------------------
// meal week
// ----------------------------------------------------------------------------

function drawMeals(preference: DietPreference, random: RandomSource, pool: MealPool): Record<MealType, string> {
  const menu = pool[preference];
  return {
    Breakfast: pickOne(random, menu.Breakfast),
    Lunch: pickOne(random, menu.Lunch),
    Dinner: pickOne(random, menu.Dinner),
    Snacks: pickOne(random, menu.Snacks),
  };
}

export function generateMealWeek(
  preference: DietPreference,
  random: RandomSource,
  pool: MealPool = MEAL_POOL
): MealPlanDay[] {
  return WEEK_DAYS.map((day) => ({ day, meals: drawMeals(preference, random, pool) }));
}

export function regenerateMeal(
  plan: readonly MealPlanDay[],
  dayIndex: number,
  mealType: MealType,
  preference: DietPreference,
  random: RandomSource,
  pool: MealPool = MEAL_POOL
): MealPlanDay[] {
  if (dayIndex < 0 || dayIndex >= plan.length) {
    throw new RangeError(`Day index out of range: ${dayIndex}`);
  }
  const text = pickOne(random, pool[preference][mealType]);
  return plan.map((entry, i) =>
    i === dayIndex ? { day: entry.day, meals: { ...entry.meals, [mealType]: text } } : entry
  );
}
