import { z } from 'zod';
import {
  DateKeySchema,
  LifeCategorySchema,
  RatingSchema,
  StringListSchema,
  TimestampSchema,
} from './commonSchemas';

export const LifeAssessmentCreateSchema = z.object({
  date: DateKeySchema,
  assessmentType: z.string().trim().min(1, 'Assessment type cannot be empty'),
  categoryRatings: z.record(LifeCategorySchema, RatingSchema).default({}),
  overallSatisfaction: RatingSchema.nullable().default(null),
  biggestWins: StringListSchema,
  mainChallenges: StringListSchema,
  keyLearnings: StringListSchema,
  focusAreas: z.array(LifeCategorySchema).default([]),
  newGoalIdeas: StringListSchema,
  habitsToStart: StringListSchema,
  habitsToStop: StringListSchema,
  goalsCompleted: StringListSchema,
  goalsAbandoned: StringListSchema,
  notes: z.string().default(''),
  createdAt: TimestampSchema.optional(),
});

export type LifeAssessmentPayload = z.input<typeof LifeAssessmentCreateSchema>;
export type LifeAssessmentData = z.output<typeof LifeAssessmentCreateSchema>;
