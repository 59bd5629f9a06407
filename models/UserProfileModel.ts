import Database from 'better-sqlite3';
import { logger } from '../utils/logger';
import { readBooleanMap, readCategoryList, readStringList, writeJson } from './columnCodecs';
import { WeekdaySchema } from '../shared/schemas/commonSchemas';
import type { UserProfile } from '../shared/types';

interface UserProfileRecord {
  id: number;
  name: string;
  timezone: string;
  preferred_reminder_times_json: string;
  notification_preferences_json: string;
  primary_life_focuses_json: string;
  life_vision: string;
  core_values_json: string;
  weekly_review_day: string;
  monthly_review_day: number;
  created_at: string;
}

// The profile table holds exactly one row.
const PROFILE_ROW_ID = 1;

function mapRecordToProfile(record: UserProfileRecord): UserProfile {
  return {
    name: record.name,
    timezone: record.timezone,
    preferredReminderTimes: readStringList(record.preferred_reminder_times_json),
    notificationPreferences: readBooleanMap(record.notification_preferences_json),
    primaryLifeFocuses: readCategoryList(record.primary_life_focuses_json),
    lifeVision: record.life_vision,
    coreValues: readStringList(record.core_values_json),
    weeklyReviewDay: WeekdaySchema.parse(record.weekly_review_day),
    monthlyReviewDay: record.monthly_review_day,
    createdAt: record.created_at,
  };
}

export class UserProfileModel {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    logger.debug('[UserProfileModel] Initialized.');
  }

  get(): UserProfile | null {
    try {
      const record = this.db
        .prepare<{ id: number }, UserProfileRecord>('SELECT * FROM user_profile WHERE id = $id')
        .get({ id: PROFILE_ROW_ID });
      return record ? mapRecordToProfile(record) : null;
    } catch (error) {
      logger.error('[UserProfileModel] Error getting profile:', error);
      throw error;
    }
  }

  /**
   * Insert or replace the singleton profile row.
   */
  save(profile: UserProfile): UserProfile {
    return this.db.transaction((): UserProfile => {
      try {
        this.db.prepare<UserProfileRecord>(`
          INSERT OR REPLACE INTO user_profile (
            id, name, timezone, preferred_reminder_times_json, notification_preferences_json,
            primary_life_focuses_json, life_vision, core_values_json,
            weekly_review_day, monthly_review_day, created_at
          ) VALUES (
            $id, $name, $timezone, $preferred_reminder_times_json, $notification_preferences_json,
            $primary_life_focuses_json, $life_vision, $core_values_json,
            $weekly_review_day, $monthly_review_day, $created_at
          )
        `).run({
          id: PROFILE_ROW_ID,
          name: profile.name,
          timezone: profile.timezone,
          preferred_reminder_times_json: writeJson(profile.preferredReminderTimes),
          notification_preferences_json: writeJson(profile.notificationPreferences),
          primary_life_focuses_json: writeJson(profile.primaryLifeFocuses),
          life_vision: profile.lifeVision,
          core_values_json: writeJson(profile.coreValues),
          weekly_review_day: profile.weeklyReviewDay,
          monthly_review_day: profile.monthlyReviewDay,
          created_at: profile.createdAt,
        });

        logger.info('[UserProfileModel] Profile saved:', { name: profile.name });
      } catch (error) {
        logger.error('[UserProfileModel] Error saving profile:', error);
        throw error;
      }

      const saved = this.get();
      if (!saved) {
        throw new Error('Failed to retrieve saved profile');
      }
      return saved;
    })();
  }
}
