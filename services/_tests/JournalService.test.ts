import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { JournalService } from '../JournalService';
import { DailyEntryModel } from '../../models/DailyEntryModel';
import { ValidationError } from '../base/ServiceError';
import { setupTestDatabase, fixedClock } from '../../test-utils/setupDatabase';
import { expectFailure, expectSuccess } from '../../test-utils/storeResult';

const NOW = '2024-06-15T21:00:00';

describe('JournalService', () => {
  let db: Database.Database;
  let service: JournalService;

  beforeEach(() => {
    db = setupTestDatabase();
    service = new JournalService({ dailyEntryModel: new DailyEntryModel(db), clock: fixedClock(NOW) });
  });

  afterEach(() => {
    db.close();
  });

  it('should fill defaults and stamp the creation time', async () => {
    const entry = expectSuccess(await service.saveDailyEntry({ date: '2024-06-15', energyLevel: 6 }));

    expect(entry).toEqual({
      date: '2024-06-15',
      completedHabits: [],
      goalProgress: {},
      dailyWins: [],
      challengesFaced: [],
      lessonsLearned: [],
      gratitudeItems: [],
      energyLevel: 6,
      moodRating: null,
      stressLevel: null,
      sleepHours: null,
      exerciseMinutes: null,
      tomorrowPriorities: [],
      notes: '',
      createdAt: new Date(NOW).toISOString(),
    });
  });

  it('should replace the entry when the same date is saved again', async () => {
    expectSuccess(await service.saveDailyEntry({ date: '2024-06-15', energyLevel: 6, dailyWins: ['Ran 5k'] }));
    expectSuccess(await service.saveDailyEntry({ date: '2024-06-15', energyLevel: 8 }));

    const stored = await service.getDailyEntry('2024-06-15');
    expect(stored?.energyLevel).toBe(8);
    expect(stored?.dailyWins).toEqual([]);
  });

  it('should reject a non-finite goal progress value and keep the previous entry', async () => {
    expectSuccess(await service.saveDailyEntry({ date: '2024-06-15', energyLevel: 7, goalProgress: { g1: 10 } }));

    const error = expectFailure(
      await service.saveDailyEntry({ date: '2024-06-15', goalProgress: { g1: Infinity } })
    );

    expect(error).toBeInstanceOf(ValidationError);
    const stored = await service.getDailyEntry('2024-06-15');
    expect(stored?.energyLevel).toBe(7);
    expect(stored?.goalProgress).toEqual({ g1: 10 });
  });

  it('should reject a rating outside 1-10', async () => {
    const error = expectFailure(await service.saveDailyEntry({ date: '2024-06-15', moodRating: 11 }));

    expect(error).toBeInstanceOf(ValidationError);
    expect(await service.getDailyEntry('2024-06-15')).toBeNull();
  });

  it('should reject a malformed lookup date', async () => {
    await expect(service.getDailyEntry('15/06/2024')).rejects.toBeInstanceOf(ValidationError);
    await expect(service.getDailyEntriesRange('2024-06-01', 'today')).rejects.toBeInstanceOf(ValidationError);
  });

  it('should return a range newest first', async () => {
    for (const date of ['2024-06-12', '2024-06-13', '2024-06-14']) {
      expectSuccess(await service.saveDailyEntry({ date }));
    }

    const entries = await service.getDailyEntriesRange('2024-06-13', '2024-06-20');

    expect(entries.map(e => e.date)).toEqual(['2024-06-14', '2024-06-13']);
  });
});
