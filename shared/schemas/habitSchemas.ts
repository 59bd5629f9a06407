import { z } from 'zod';
import {
  DateKeySchema,
  DifficultySchema,
  HabitFrequencySchema,
  LifeCategorySchema,
  PrioritySchema,
  StringListSchema,
  TimeSchema,
  TimestampSchema,
} from './commonSchemas';
import { normalizeTimeOfDay } from '../../utils/dates';

/**
 * Schema for creating a habit. Streak, total and rate fields are not part of
 * the payload: they are derived from the completion log and unknown keys are
 * stripped.
 */
export const HabitCreateSchema = z.object({
  title: z.string().trim().min(1, 'Habit title cannot be empty'),
  description: z.string().default(''),
  category: LifeCategorySchema,
  priority: PrioritySchema,
  difficulty: DifficultySchema,
  frequency: HabitFrequencySchema.default('daily'),
  targetDaysPerWeek: z.number().int().min(1).max(7).default(7),
  targetTimesPerDay: z.number().int().min(1).default(1),
  preferredTime: z.string().nullable().default(null),
  durationMinutes: z.number().int().positive().nullable().default(null),
  createdAt: TimestampSchema.optional(),
  whyImportant: z.string().default(''),
  triggerCue: z.string().default(''),
  reward: z.string().default(''),
  environmentSetup: z.string().default(''),
  isActive: z.boolean().default(true),
  reminderEnabled: z.boolean().default(true),
  tags: StringListSchema,
  notes: z.string().default(''),
});

export const HabitUpdateSchema = HabitCreateSchema.omit({ createdAt: true }).partial();

/** Schema for recording one completion of a habit. Times are stored as zero-padded `HH:mm`. */
export const HabitCompletionSchema = z.object({
  habitId: z.string().min(1),
  date: DateKeySchema,
  time: TimeSchema.transform(normalizeTimeOfDay).nullable().default(null),
  note: z.string().default(''),
});

export type HabitCreatePayload = z.input<typeof HabitCreateSchema>;
export type HabitCreateData = z.output<typeof HabitCreateSchema>;
export type HabitUpdatePayload = z.input<typeof HabitUpdateSchema>;
export type HabitUpdateData = z.output<typeof HabitUpdateSchema>;
export type HabitCompletionPayload = z.input<typeof HabitCompletionSchema>;
