import { z } from "zod";

export const BODY_TYPES = [
  "ectomorph",
  "mesomorph",
  "endomorph",
  "mixed",
] as const;

export type BodyType = (typeof BODY_TYPES)[number];

export const HABIT_TYPES = [
  "exercise",
  "stress",
  "screen_time",
  "caffeine",
  "alcohol",
  "other",
] as const;

export type HabitType = (typeof HABIT_TYPES)[number];

export const HABIT_CONFIG: Record<HabitType, { label: string }> = {
  exercise: { label: "Exercise" },
  stress: { label: "Stress" },
  screen_time: { label: "Screen time" },
  caffeine: { label: "Caffeine" },
  alcohol: { label: "Alcohol" },
  other: { label: "Other" },
};

/** "HH:MM", 24-hour clock */
export const timeOfDaySchema = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, "Expected a time of day as HH:MM");

export const nutritionalInfoSchema = z.object({
  calories: z.number().min(0),
  protein: z.number().min(0),
  carbohydrates: z.number().min(0),
  fat: z.number().min(0),
  /** milligrams */
  sodium: z.number().min(0),
  sugar: z.number().min(0),
  fiber: z.number().min(0),
  preservatives: z.array(z.string()),
  processingLevel: z.number().int().min(1).max(5),
});

export const foodItemSchema = z.object({
  name: z.string().min(1),
  servingSize: z.number().positive(),
  unit: z.string().min(1),
  nutrition: nutritionalInfoSchema,
  // Naturally occurring fruit sugar is exempt from the sugar limit
  isFruit: z.boolean().optional(),
  consumedAt: timeOfDaySchema.optional(),
});

export const sleepDataSchema = z.object({
  /** hours */
  duration: z.number().min(0).max(24),
  quality: z.number().int().min(1).max(10),
  bedtime: timeOfDaySchema,
  wakeTime: timeOfDaySchema,
  interruptions: z.number().int().min(0),
});

export const habitSchema = z.object({
  type: z.enum(HABIT_TYPES),
  intensity: z.number().int().min(1).max(10),
  /** hours */
  duration: z.number().min(0).optional(),
  timing: timeOfDaySchema.optional(),
  notes: z.string().max(500).optional(),
});

export const lifestyleRecordSchema = z.object({
  userId: z.string().min(1),
  timestamp: z.string().datetime({ offset: true }),
  foodItems: z.array(foodItemSchema),
  /** millilitres */
  waterIntake: z.number().min(0),
  sleep: sleepDataSchema.optional(),
  habits: z.array(habitSchema),
  notes: z.string().max(1000).optional(),
});

export const bodyTypeProfileSchema = z.object({
  userId: z.string().min(1),
  classification: z.enum(BODY_TYPES),
  characteristics: z.array(z.string()).default([]),
});

export const timeRangeSchema = z
  .object({
    start: z.string().datetime({ offset: true }),
    end: z.string().datetime({ offset: true }),
  })
  .refine((range) => Date.parse(range.start) <= Date.parse(range.end), {
    message: "start must not be after end",
    path: ["start"],
  });

export type NutritionalInfo = z.infer<typeof nutritionalInfoSchema>;
export type FoodItem = z.infer<typeof foodItemSchema>;
export type SleepData = z.infer<typeof sleepDataSchema>;
export type Habit = z.infer<typeof habitSchema>;
export type LifestyleRecord = z.infer<typeof lifestyleRecordSchema>;
export type BodyTypeProfile = z.infer<typeof bodyTypeProfileSchema>;
export type TimeRange = z.infer<typeof timeRangeSchema>;
