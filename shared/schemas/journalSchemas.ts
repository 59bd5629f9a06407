import { z } from 'zod';
import { DateKeySchema, RatingSchema, StringListSchema, TimestampSchema } from './commonSchemas';

/** Schema for a full daily entry. Saving replaces any entry for the same date. */
export const DailyEntrySchema = z.object({
  date: DateKeySchema,
  completedHabits: StringListSchema,
  goalProgress: z.record(z.string(), z.number().finite()).default({}),
  dailyWins: StringListSchema,
  challengesFaced: StringListSchema,
  lessonsLearned: StringListSchema,
  gratitudeItems: StringListSchema,
  energyLevel: RatingSchema.nullable().default(null),
  moodRating: RatingSchema.nullable().default(null),
  stressLevel: RatingSchema.nullable().default(null),
  sleepHours: z.number().min(0).max(24).nullable().default(null),
  exerciseMinutes: z.number().int().nonnegative().nullable().default(null),
  tomorrowPriorities: StringListSchema,
  notes: z.string().default(''),
  createdAt: TimestampSchema.optional(),
});

export type DailyEntryPayload = z.input<typeof DailyEntrySchema>;
export type DailyEntryData = z.output<typeof DailyEntrySchema>;
