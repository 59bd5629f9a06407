import Database from 'better-sqlite3';
import { logger } from '../utils/logger';
import { readNumberMap, readStringList, writeJson } from './columnCodecs';
import type { DailyEntry } from '../shared/types';

interface DailyEntryRecord {
  date: string;
  completed_habits_json: string;
  goal_progress_json: string;
  daily_wins_json: string;
  challenges_faced_json: string;
  lessons_learned_json: string;
  gratitude_items_json: string;
  energy_level: number | null;
  mood_rating: number | null;
  stress_level: number | null;
  sleep_hours: number | null;
  exercise_minutes: number | null;
  tomorrow_priorities_json: string;
  notes: string;
  created_at: string;
}

function mapRecordToDailyEntry(record: DailyEntryRecord): DailyEntry {
  return {
    date: record.date,
    completedHabits: readStringList(record.completed_habits_json),
    goalProgress: readNumberMap(record.goal_progress_json),
    dailyWins: readStringList(record.daily_wins_json),
    challengesFaced: readStringList(record.challenges_faced_json),
    lessonsLearned: readStringList(record.lessons_learned_json),
    gratitudeItems: readStringList(record.gratitude_items_json),
    energyLevel: record.energy_level,
    moodRating: record.mood_rating,
    stressLevel: record.stress_level,
    sleepHours: record.sleep_hours,
    exerciseMinutes: record.exercise_minutes,
    tomorrowPriorities: readStringList(record.tomorrow_priorities_json),
    notes: record.notes,
    createdAt: record.created_at,
  };
}

export class DailyEntryModel {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    logger.debug('[DailyEntryModel] Initialized.');
  }

  /**
   * Insert or fully replace the entry for `entry.date`. The write and its
   * read-back share one transaction, so an entry that cannot be decoded
   * leaves the previous row in place.
   */
  upsert(entry: DailyEntry): DailyEntry {
    return this.db.transaction((): DailyEntry => {
      try {
        this.db.prepare<DailyEntryRecord>(`
          INSERT OR REPLACE INTO daily_entries (
            date, completed_habits_json, goal_progress_json, daily_wins_json,
            challenges_faced_json, lessons_learned_json, gratitude_items_json,
            energy_level, mood_rating, stress_level, sleep_hours, exercise_minutes,
            tomorrow_priorities_json, notes, created_at
          ) VALUES (
            $date, $completed_habits_json, $goal_progress_json, $daily_wins_json,
            $challenges_faced_json, $lessons_learned_json, $gratitude_items_json,
            $energy_level, $mood_rating, $stress_level, $sleep_hours, $exercise_minutes,
            $tomorrow_priorities_json, $notes, $created_at
          )
        `).run({
          date: entry.date,
          completed_habits_json: writeJson(entry.completedHabits),
          goal_progress_json: writeJson(entry.goalProgress),
          daily_wins_json: writeJson(entry.dailyWins),
          challenges_faced_json: writeJson(entry.challengesFaced),
          lessons_learned_json: writeJson(entry.lessonsLearned),
          gratitude_items_json: writeJson(entry.gratitudeItems),
          energy_level: entry.energyLevel,
          mood_rating: entry.moodRating,
          stress_level: entry.stressLevel,
          sleep_hours: entry.sleepHours,
          exercise_minutes: entry.exerciseMinutes,
          tomorrow_priorities_json: writeJson(entry.tomorrowPriorities),
          notes: entry.notes,
          created_at: entry.createdAt,
        });

        logger.debug('[DailyEntryModel] Saved entry:', { date: entry.date });
      } catch (error) {
        logger.error('[DailyEntryModel] Error saving entry:', error);
        throw error;
      }

      const saved = this.getByDate(entry.date);
      if (!saved) {
        throw new Error(`Failed to retrieve saved daily entry: ${entry.date}`);
      }
      return saved;
    })();
  }

  getByDate(date: string): DailyEntry | null {
    try {
      const record = this.db
        .prepare<{ date: string }, DailyEntryRecord>('SELECT * FROM daily_entries WHERE date = $date')
        .get({ date });
      return record ? mapRecordToDailyEntry(record) : null;
    } catch (error) {
      logger.error('[DailyEntryModel] Error getting entry:', error);
      throw error;
    }
  }

  /**
   * Entries with `startDate <= date <= endDate`, newest first.
   */
  getRange(startDate: string, endDate: string): DailyEntry[] {
    try {
      return this.db
        .prepare<{ startDate: string; endDate: string }, DailyEntryRecord>(`
          SELECT * FROM daily_entries
          WHERE date >= $startDate AND date <= $endDate
          ORDER BY date DESC
        `)
        .all({ startDate, endDate })
        .map(mapRecordToDailyEntry);
    } catch (error) {
      logger.error('[DailyEntryModel] Error getting entry range:', error);
      throw error;
    }
  }
}
