import { z } from 'zod';
import {
  DateKeySchema,
  DifficultySchema,
  GoalStatusSchema,
  LifeCategorySchema,
  PercentageSchema,
  PrioritySchema,
  StringListSchema,
  TimestampSchema,
} from './commonSchemas';

/**
 * Schema for creating a goal. `createdAt` may be supplied when importing
 * historical records; otherwise the store stamps the current time.
 */
export const GoalCreateSchema = z.object({
  title: z.string().trim().min(1, 'Goal title cannot be empty'),
  description: z.string().default(''),
  category: LifeCategorySchema,
  priority: PrioritySchema,
  difficulty: DifficultySchema,
  status: GoalStatusSchema.default('not_started'),
  createdAt: TimestampSchema.optional(),
  targetDate: DateKeySchema.nullable().default(null),
  completedAt: TimestampSchema.nullable().default(null),
  progressPercentage: PercentageSchema.default(0),
  milestones: StringListSchema,
  actionSteps: StringListSchema,
  requiredResources: StringListSchema,
  potentialObstacles: StringListSchema,
  whyImportant: z.string().default(''),
  successMetrics: StringListSchema,
  rewards: StringListSchema,
  estimatedHours: z.number().finite().nonnegative().nullable().default(null),
  tags: StringListSchema,
  notes: z.string().default(''),
});

/** Schema for a partial goal update. Identity and creation time are immutable. */
export const GoalUpdateSchema = GoalCreateSchema.omit({ createdAt: true }).partial();

export type GoalCreatePayload = z.input<typeof GoalCreateSchema>;
export type GoalCreateData = z.output<typeof GoalCreateSchema>;
export type GoalUpdatePayload = z.input<typeof GoalUpdateSchema>;
export type GoalUpdateData = z.output<typeof GoalUpdateSchema>;
