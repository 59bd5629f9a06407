import { z } from 'zod';
import {
  Difficulty,
  GOAL_STATUSES,
  HABIT_FREQUENCIES,
  LIFE_CATEGORIES,
  Priority,
  WEEKDAYS,
} from '../constants/lifeDomains';
import { isDateKey, isIsoTimestamp, isTimeOfDay } from '../../utils/dates';

export const LifeCategorySchema = z.enum(LIFE_CATEGORIES);
export const PrioritySchema = z.nativeEnum(Priority);
export const DifficultySchema = z.nativeEnum(Difficulty);
export const GoalStatusSchema = z.enum(GOAL_STATUSES);
export const HabitFrequencySchema = z.enum(HABIT_FREQUENCIES);
export const WeekdaySchema = z.enum(WEEKDAYS);

/** Calendar date, `yyyy-MM-dd`. */
export const DateKeySchema = z
  .string()
  .refine(isDateKey, { message: 'Expected a calendar date in yyyy-MM-dd format' });

/** Clock time, `HH:mm` or `HH:mm:ss`. */
export const TimeSchema = z
  .string()
  .refine(isTimeOfDay, { message: 'Expected a time in HH:mm format' });

/** ISO 8601 instant. */
export const TimestampSchema = z
  .string()
  .refine(isIsoTimestamp, { message: 'Expected an ISO 8601 timestamp' });

export const PercentageSchema = z.number().min(0).max(100);

/** Integer rating on a 1-10 scale. */
export const RatingSchema = z.number().int().min(1).max(10);

export const StringListSchema = z.array(z.string()).default([]);
