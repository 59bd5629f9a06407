import { v4 as uuidv4 } from 'uuid';
import Database from 'better-sqlite3';
import { BaseModel } from './BaseModel';
import { logger } from '../utils/logger';
import { fromSqlBoolean, readStringList, toSqlBoolean, writeJson } from './columnCodecs';
import {
  DifficultySchema,
  HabitFrequencySchema,
  LifeCategorySchema,
  PrioritySchema,
} from '../shared/schemas/commonSchemas';
import type { Habit, HabitStats } from '../shared/types';

interface HabitRecord {
  id: string;
  title: string;
  description: string;
  category: string;
  priority: number;
  difficulty: number;
  frequency: string;
  target_days_per_week: number;
  target_times_per_day: number;
  preferred_time: string | null;
  duration_minutes: number | null;
  created_at: string;
  current_streak: number;
  longest_streak: number;
  total_completions: number;
  completion_rate: number;
  why_important: string;
  trigger_cue: string;
  reward: string;
  environment_setup: string;
  is_active: number;
  reminder_enabled: number;
  tags_json: string;
  notes: string;
}

/** Habit fields as written on creation; derived counters start at zero. */
export type NewHabit = Omit<Habit, 'id' | keyof HabitStats>;
export type HabitChanges = Partial<Omit<Habit, 'id' | 'createdAt' | keyof HabitStats>>;

function mapRecordToHabit(record: HabitRecord): Habit {
  return {
    id: record.id,
    title: record.title,
    description: record.description,
    category: LifeCategorySchema.parse(record.category),
    priority: PrioritySchema.parse(record.priority),
    difficulty: DifficultySchema.parse(record.difficulty),
    frequency: HabitFrequencySchema.parse(record.frequency),
    targetDaysPerWeek: record.target_days_per_week,
    targetTimesPerDay: record.target_times_per_day,
    preferredTime: record.preferred_time || null,
    durationMinutes: record.duration_minutes,
    createdAt: record.created_at,
    currentStreak: record.current_streak,
    longestStreak: record.longest_streak,
    totalCompletions: record.total_completions,
    completionRate: record.completion_rate,
    whyImportant: record.why_important,
    triggerCue: record.trigger_cue,
    reward: record.reward,
    environmentSetup: record.environment_setup,
    isActive: fromSqlBoolean(record.is_active),
    reminderEnabled: fromSqlBoolean(record.reminder_enabled),
    tags: readStringList(record.tags_json),
    notes: record.notes,
  };
}

function habitToParams(habit: Habit): HabitRecord {
  return {
    id: habit.id,
    title: habit.title,
    description: habit.description,
    category: habit.category,
    priority: habit.priority,
    difficulty: habit.difficulty,
    frequency: habit.frequency,
    target_days_per_week: habit.targetDaysPerWeek,
    target_times_per_day: habit.targetTimesPerDay,
    preferred_time: habit.preferredTime,
    duration_minutes: habit.durationMinutes,
    created_at: habit.createdAt,
    current_streak: habit.currentStreak,
    longest_streak: habit.longestStreak,
    total_completions: habit.totalCompletions,
    completion_rate: habit.completionRate,
    why_important: habit.whyImportant,
    trigger_cue: habit.triggerCue,
    reward: habit.reward,
    environment_setup: habit.environmentSetup,
    is_active: toSqlBoolean(habit.isActive),
    reminder_enabled: toSqlBoolean(habit.reminderEnabled),
    tags_json: writeJson(habit.tags),
    notes: habit.notes,
  };
}

export class HabitModel extends BaseModel {
  protected readonly modelName = 'HabitModel';

  constructor(db: Database.Database) {
    super(db);
    logger.debug('[HabitModel] Initialized.');
  }

  create(data: NewHabit): Habit {
    return this.db.transaction((): Habit => {
      const habit: Habit = {
        ...data,
        id: uuidv4(),
        currentStreak: 0,
        longestStreak: 0,
        totalCompletions: 0,
        completionRate: 0,
      };

      try {
        this.db.prepare<HabitRecord>(`
          INSERT INTO habits (
            id, title, description, category, priority, difficulty, frequency,
            target_days_per_week, target_times_per_day, preferred_time, duration_minutes,
            created_at, current_streak, longest_streak, total_completions, completion_rate,
            why_important, trigger_cue, reward, environment_setup,
            is_active, reminder_enabled, tags_json, notes
          ) VALUES (
            $id, $title, $description, $category, $priority, $difficulty, $frequency,
            $target_days_per_week, $target_times_per_day, $preferred_time, $duration_minutes,
            $created_at, $current_streak, $longest_streak, $total_completions, $completion_rate,
            $why_important, $trigger_cue, $reward, $environment_setup,
            $is_active, $reminder_enabled, $tags_json, $notes
          )
        `).run(habitToParams(habit));

        logger.debug('[HabitModel] Created habit:', { id: habit.id, title: habit.title });
      } catch (error) {
        this.handleDbError(error, 'create');
      }

      const created = this.getById(habit.id);
      if (!created) {
        throw new Error(`Failed to retrieve created habit: ${habit.id}`);
      }
      return created;
    })();
  }

  getById(id: string): Habit | null {
    try {
      const record = this.db
        .prepare<{ id: string }, HabitRecord>('SELECT * FROM habits WHERE id = $id')
        .get({ id });

      if (!record) {
        logger.debug('[HabitModel] Habit not found:', { id });
        return null;
      }
      return mapRecordToHabit(record);
    } catch (error) {
      this.handleDbError(error, 'getById');
    }
  }

  /**
   * All habits: active before inactive, then priority descending, newest first.
   */
  getAll(): Habit[] {
    try {
      return this.db
        .prepare<[], HabitRecord>(`
          SELECT * FROM habits
          ORDER BY is_active DESC, priority DESC, created_at DESC
        `)
        .all()
        .map(mapRecordToHabit);
    } catch (error) {
      this.handleDbError(error, 'getAll');
    }
  }

  getActive(): Habit[] {
    try {
      return this.db
        .prepare<[], HabitRecord>(`
          SELECT * FROM habits
          WHERE is_active = 1
          ORDER BY priority DESC, created_at DESC
        `)
        .all()
        .map(mapRecordToHabit);
    } catch (error) {
      this.handleDbError(error, 'getActive');
    }
  }

  /**
   * Apply a partial update to the descriptive fields. Derived counters are
   * untouched; see updateStats.
   */
  update(id: string, changes: HabitChanges): Habit | null {
    return this.db.transaction((): Habit | null => {
      const existing = this.getById(id);
      if (!existing) {
        return null;
      }

      const merged: Habit = {
        ...existing,
        ...changes,
        id,
        createdAt: existing.createdAt,
        currentStreak: existing.currentStreak,
        longestStreak: existing.longestStreak,
        totalCompletions: existing.totalCompletions,
        completionRate: existing.completionRate,
      };

      try {
        this.db.prepare<HabitRecord>(`
          UPDATE habits SET
            title = $title,
            description = $description,
            category = $category,
            priority = $priority,
            difficulty = $difficulty,
            frequency = $frequency,
            target_days_per_week = $target_days_per_week,
            target_times_per_day = $target_times_per_day,
            preferred_time = $preferred_time,
            duration_minutes = $duration_minutes,
            created_at = $created_at,
            current_streak = $current_streak,
            longest_streak = $longest_streak,
            total_completions = $total_completions,
            completion_rate = $completion_rate,
            why_important = $why_important,
            trigger_cue = $trigger_cue,
            reward = $reward,
            environment_setup = $environment_setup,
            is_active = $is_active,
            reminder_enabled = $reminder_enabled,
            tags_json = $tags_json,
            notes = $notes
          WHERE id = $id
        `).run(habitToParams(merged));

        logger.debug('[HabitModel] Habit updated:', { id, fields: Object.keys(changes) });
      } catch (error) {
        this.handleDbError(error, 'update');
      }

      return this.getById(id);
    })();
  }

  /**
   * Persist recomputed streak, total and rate. Returns false when the habit does not exist.
   */
  updateStats(id: string, stats: HabitStats): boolean {
    try {
      const result = this.db
        .prepare<{
          id: string;
          currentStreak: number;
          longestStreak: number;
          totalCompletions: number;
          completionRate: number;
        }>(`
          UPDATE habits SET
            current_streak = $currentStreak,
            longest_streak = $longestStreak,
            total_completions = $totalCompletions,
            completion_rate = $completionRate
          WHERE id = $id
        `)
        .run({ id, ...stats });

      logger.debug('[HabitModel] Stats updated:', { id, ...stats });
      return result.changes > 0;
    } catch (error) {
      this.handleDbError(error, 'updateStats');
    }
  }

  /**
   * Delete a habit together with its completion log.
   */
  delete(id: string): boolean {
    try {
      const deleteHabit = this.db.transaction((habitId: string) => {
        this.db.prepare<{ habitId: string }>('DELETE FROM habit_completions WHERE habit_id = $habitId').run({ habitId });
        return this.db.prepare<{ habitId: string }>('DELETE FROM habits WHERE id = $habitId').run({ habitId });
      });
      const result = deleteHabit(id);

      logger.info('[HabitModel] Habit deleted:', { id, deleted: result.changes > 0 });
      return result.changes > 0;
    } catch (error) {
      this.handleDbError(error, 'delete');
    }
  }
}
