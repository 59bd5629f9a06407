import { z } from 'zod';
import { MAX_PRIMARY_LIFE_FOCUSES } from '../constants/lifeDomains';
import {
  LifeCategorySchema,
  StringListSchema,
  TimeSchema,
  TimestampSchema,
  WeekdaySchema,
} from './commonSchemas';

/**
 * Schema for the singleton user profile
 */
export const UserProfileSchema = z.object({
  name: z.string().trim().min(1, 'Name cannot be empty'),
  timezone: z.string().min(1).default('UTC'),
  preferredReminderTimes: z.array(TimeSchema).default([]),
  notificationPreferences: z.record(z.string(), z.boolean()).default({}),
  primaryLifeFocuses: z
    .array(LifeCategorySchema)
    .max(MAX_PRIMARY_LIFE_FOCUSES, `At most ${MAX_PRIMARY_LIFE_FOCUSES} primary life focuses`)
    .default([]),
  lifeVision: z.string().default(''),
  coreValues: StringListSchema,
  weeklyReviewDay: WeekdaySchema.default('Sunday'),
  monthlyReviewDay: z.number().int().min(1).max(31).default(1),
  createdAt: TimestampSchema.optional(),
});

export type UserProfilePayload = z.input<typeof UserProfileSchema>;
export type UserProfileData = z.output<typeof UserProfileSchema>;
