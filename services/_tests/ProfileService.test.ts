import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { ProfileService } from '../ProfileService';
import { UserProfileModel } from '../../models/UserProfileModel';
import { ValidationError } from '../base/ServiceError';
import { setupTestDatabase } from '../../test-utils/setupDatabase';
import { expectFailure, expectSuccess } from '../../test-utils/storeResult';

// Mock logger to prevent console output during tests
vi.mock('../../utils/logger', async () => (await import('../../test-utils/mocks/logger')).mockLoggerModule);

describe('ProfileService', () => {
  let db: Database.Database;
  let now: Date;
  let profileService: ProfileService;

  beforeEach(async () => {
    db = setupTestDatabase();
    now = new Date('2024-01-01T10:00:00');
    profileService = new ProfileService({
      userProfileModel: new UserProfileModel(db),
      clock: () => now,
    });
    await profileService.initialize();
  });

  afterEach(async () => {
    await profileService.cleanup();
    db.close();
    vi.clearAllMocks();
  });

  describe('getProfile', () => {
    it('should return null before the first save', async () => {
      expect(await profileService.getProfile()).toBeNull();
    });
  });

  describe('saveProfile', () => {
    it('should apply defaults on first save', async () => {
      const profile = expectSuccess(await profileService.saveProfile({ name: 'Sam' }));

      expect(profile).toEqual({
        name: 'Sam',
        timezone: 'UTC',
        preferredReminderTimes: [],
        notificationPreferences: {},
        primaryLifeFocuses: [],
        lifeVision: '',
        coreValues: [],
        weeklyReviewDay: 'Sunday',
        monthlyReviewDay: 1,
        createdAt: new Date('2024-01-01T10:00:00').toISOString(),
      });
    });

    it('should keep the first creation time across saves', async () => {
      const first = expectSuccess(await profileService.saveProfile({ name: 'Sam' }));
      now = new Date('2024-03-01T10:00:00');

      const second = expectSuccess(await profileService.saveProfile({ name: 'Sam', weeklyReviewDay: 'Friday' }));

      expect(second.createdAt).toBe(first.createdAt);
      expect(second.weeklyReviewDay).toBe('Friday');
    });

    it('should reject more than five primary focuses', async () => {
      const error = expectFailure(await profileService.saveProfile({
        name: 'Sam',
        primaryLifeFocuses: ['health_fitness', 'finances', 'family', 'creativity', 'community', 'spirituality'],
      }));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error.message).toBe('Invalid profile: primaryLifeFocuses: At most 5 primary life focuses');
      expect(await profileService.getProfile()).toBeNull();
    });

    it('should reject a malformed reminder time', async () => {
      const error = expectFailure(await profileService.saveProfile({ name: 'Sam', preferredReminderTimes: ['7am'] }));

      expect(error.message).toBe('Invalid profile: preferredReminderTimes.0: Expected a time in HH:mm format');
    });
  });
});
