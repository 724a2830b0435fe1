// Request validation with zod
import { z } from 'zod';
import { DIET_PREFERENCES, FITNESS_LEVELS, MEAL_TYPES } from './types.js';
import type { WizardAction } from './wizard.js';

const yesNo = z.enum(['Yes', 'No']);
const dayIndex = z.number().int().min(0).max(6);

export const AnswersSchema = z.object({
  age: z.number().int().min(15).max(45),
  weightKg: z.number().min(35).max(120),
  heightCm: z.number().min(140).max(180),
  sleepHours: z.number().min(4).max(10),
  exerciseMinutes: z.number().min(0).max(90),
  familyHistory: yesNo,
  menstrualIrregularity: yesNo,
  hormonalImbalance: yesNo,
  hirsutism: yesNo,
  mentalHealth: yesNo,
  insulinResistance: yesNo,
  diabetes: yesNo,
  smoking: yesNo,
}).strict();

export const PartialAnswersSchema = AnswersSchema.partial();

export const WizardActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('submit_name'), name: z.string().max(120) }),
  z.object({ type: z.literal('advance') }),
  z.object({ type: z.literal('record_answers'), answers: PartialAnswersSchema }),
  z.object({ type: z.literal('predict'), answers: PartialAnswersSchema.optional() }),
  z.object({ type: z.literal('select_fitness_level'), level: z.enum(FITNESS_LEVELS) }),
  z.object({ type: z.literal('regenerate_exercise_day'), dayIndex }),
  z.object({ type: z.literal('regenerate_exercise_week') }),
  z.object({ type: z.literal('set_day_completed'), dayIndex, completed: z.boolean() }),
  z.object({ type: z.literal('select_diet_preference'), preference: z.enum(DIET_PREFERENCES) }),
  z.object({ type: z.literal('regenerate_meal'), dayIndex, mealType: z.enum(MEAL_TYPES) }),
  z.object({ type: z.literal('regenerate_meal_week') }),
  z.object({ type: z.literal('reset') }),
]);

// compile-time check that the schema and the wizard agree
export const parseWizardAction = (data: unknown) =>
  validate<WizardAction>(WizardActionSchema, data);

// Generic validation helper
export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): { success: true, data: T } | { success: false, error: string } {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    error: result.error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`).join('; ')
  };
}
