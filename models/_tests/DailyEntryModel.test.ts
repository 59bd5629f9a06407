import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { DailyEntryModel } from '../DailyEntryModel';
import { setupTestDatabase } from '../../test-utils/setupDatabase';
import type { DailyEntry } from '../../shared/types';

function entry(date: string, overrides: Partial<DailyEntry> = {}): DailyEntry {
  return {
    date,
    completedHabits: ['habit-a'],
    goalProgress: { 'goal-a': 5, 'goal-b': 2.5 },
    dailyWins: ['Shipped the report'],
    challengesFaced: [],
    lessonsLearned: [],
    gratitudeItems: ['Sunny walk'],
    energyLevel: 7,
    moodRating: 8,
    stressLevel: null,
    sleepHours: 7.5,
    exerciseMinutes: 30,
    tomorrowPriorities: ['Plan sprint'],
    notes: '',
    createdAt: `${date}T21:00:00.000Z`,
    ...overrides,
  };
}

describe('DailyEntryModel', () => {
  let db: Database.Database;
  let model: DailyEntryModel;

  beforeEach(() => {
    db = setupTestDatabase();
    model = new DailyEntryModel(db);
  });

  afterEach(() => {
    db.close();
  });

  it('should round-trip lists, maps and nullable ratings', () => {
    const saved = model.upsert(entry('2024-06-10'));

    expect(saved).toEqual(entry('2024-06-10'));
  });

  it('should replace the whole entry on a second write for the same date', () => {
    model.upsert(entry('2024-06-10'));
    model.upsert(entry('2024-06-10', { dailyWins: [], energyLevel: 3, sleepHours: null }));

    const stored = model.getByDate('2024-06-10');
    expect(stored?.dailyWins).toEqual([]);
    expect(stored?.energyLevel).toBe(3);
    expect(stored?.sleepHours).toBeNull();
    expect(model.getRange('2024-06-01', '2024-06-30')).toHaveLength(1);
  });

  it('should roll back a write whose stored form cannot be read back', () => {
    model.upsert(entry('2024-06-10', { energyLevel: 7 }));

    expect(() => model.upsert(entry('2024-06-10', { goalProgress: { g1: Infinity } }))).toThrow();

    const stored = model.getByDate('2024-06-10');
    expect(stored?.energyLevel).toBe(7);
    expect(stored?.goalProgress).toEqual(entry('2024-06-10').goalProgress);
  });

  it('should return an inclusive range newest first', () => {
    for (const date of ['2024-06-01', '2024-06-02', '2024-06-03', '2024-06-04']) {
      model.upsert(entry(date));
    }

    expect(model.getRange('2024-06-02', '2024-06-03').map(e => e.date)).toEqual(['2024-06-03', '2024-06-02']);
  });

  it('should return null for a date without an entry', () => {
    expect(model.getByDate('2024-01-01')).toBeNull();
  });
});
