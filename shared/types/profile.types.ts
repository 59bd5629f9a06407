import type { LifeCategory, Weekday } from '../constants/lifeDomains';

/** The single user profile of an installation. */
export interface UserProfile {
  name: string;
  timezone: string;

  preferredReminderTimes: string[]; // HH:mm
  notificationPreferences: Record<string, boolean>;

  primaryLifeFocuses: LifeCategory[]; // at most 5
  lifeVision: string;
  coreValues: string[];

  weeklyReviewDay: Weekday;
  monthlyReviewDay: number; // 1-31

  createdAt: string; // ISO 8601 timestamp
}
