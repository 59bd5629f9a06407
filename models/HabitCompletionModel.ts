import Database from 'better-sqlite3';
import { BaseModel } from './BaseModel';
import { logger } from '../utils/logger';
import type { HabitCompletion } from '../shared/types';

interface HabitCompletionRecord {
  id: number;
  habit_id: string;
  completion_date: string;
  completion_time: string;
  note: string;
  recorded_at: string;
}

export interface NewHabitCompletion {
  habitId: string;
  completionDate: string;
  completionTime: string | null;
  note: string;
  recordedAt: string;
}

// Untimed completions are stored as '' so the unique key also covers them.
const UNTIMED = '';

function mapRecordToCompletion(record: HabitCompletionRecord): HabitCompletion {
  return {
    id: record.id,
    habitId: record.habit_id,
    completionDate: record.completion_date,
    completionTime: record.completion_time === UNTIMED ? null : record.completion_time,
    note: record.note,
    recordedAt: record.recorded_at,
  };
}

/**
 * Append-only log of habit completions, unique per (habit, date, time).
 */
export class HabitCompletionModel extends BaseModel {
  protected readonly modelName = 'HabitCompletionModel';

  constructor(db: Database.Database) {
    super(db);
    logger.debug('[HabitCompletionModel] Initialized.');
  }

  /**
   * Record a completion. Returns false when the same (habit, date, time) was already logged.
   */
  insert(completion: NewHabitCompletion): boolean {
    try {
      const result = this.db
        .prepare<{
          habitId: string;
          completionDate: string;
          completionTime: string;
          note: string;
          recordedAt: string;
        }>(`
          INSERT OR IGNORE INTO habit_completions (
            habit_id, completion_date, completion_time, note, recorded_at
          ) VALUES (
            $habitId, $completionDate, $completionTime, $note, $recordedAt
          )
        `)
        .run({ ...completion, completionTime: completion.completionTime ?? UNTIMED });

      const inserted = result.changes > 0;
      logger.debug('[HabitCompletionModel] Completion insert:', {
        habitId: completion.habitId,
        date: completion.completionDate,
        inserted,
      });
      return inserted;
    } catch (error) {
      this.handleDbError(error, 'insert');
    }
  }

  /**
   * Completions of a habit, newest date and time first, optionally bounded by
   * an inclusive date range.
   */
  getForHabit(habitId: string, startDate?: string, endDate?: string): HabitCompletion[] {
    try {
      let query = 'SELECT * FROM habit_completions WHERE habit_id = $habitId';
      const params: { habitId: string; startDate?: string; endDate?: string } = { habitId };

      if (startDate) {
        query += ' AND completion_date >= $startDate';
        params.startDate = startDate;
      }
      if (endDate) {
        query += ' AND completion_date <= $endDate';
        params.endDate = endDate;
      }
      query += ' ORDER BY completion_date DESC, completion_time DESC';

      return this.db
        .prepare<typeof params, HabitCompletionRecord>(query)
        .all(params)
        .map(mapRecordToCompletion);
    } catch (error) {
      this.handleDbError(error, 'getForHabit');
    }
  }
}
