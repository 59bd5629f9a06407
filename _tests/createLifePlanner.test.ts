import { describe, it, expect, afterEach } from 'vitest';
import { createLifePlanner, Difficulty, Priority } from '../index';
import type { LifePlanner } from '../index';
import { fixedClock } from '../test-utils/setupDatabase';
import { expectSuccess } from '../test-utils/storeResult';

describe('createLifePlanner', () => {
  let planner: LifePlanner | null = null;

  afterEach(async () => {
    await planner?.close();
    planner = null;
  });

  it('should wire every service against one migrated database', async () => {
    planner = await createLifePlanner({ dbPath: ':memory:', now: fixedClock('2024-06-15T12:00:00') });

    const goal = expectSuccess(await planner.goals.createGoal({
      title: 'Plant a vegetable bed',
      category: 'home_environment',
      priority: Priority.Medium,
      difficulty: Difficulty.Easy,
    }));
    const habit = expectSuccess(await planner.habits.createHabit({
      title: 'Water the garden',
      category: 'home_environment',
      priority: Priority.Low,
      difficulty: Difficulty.VeryEasy,
      createdAt: '2024-06-15T07:00:00',
    }));
    const { habit: updated } = expectSuccess(await planner.habits.recordCompletion(habit.id, '2024-06-15', '07:30'));

    expect(updated.currentStreak).toBe(1);
    expect(updated.completionRate).toBe(100);
    expect((await planner.intelligence.prioritize()).map(g => g.id)).toEqual([goal.id]);
    expect((await planner.intelligence.generateHabitAnalytics()).totalHabits).toBe(1);
    expect(await planner.profile.getProfile()).toBeNull();
  });

  it('should report every service healthy', async () => {
    planner = await createLifePlanner({ dbPath: ':memory:' });

    const checks = await Promise.all([
      planner.goals.healthCheck(),
      planner.habits.healthCheck(),
      planner.journal.healthCheck(),
      planner.assessments.healthCheck(),
      planner.profile.healthCheck(),
      planner.intelligence.healthCheck(),
    ]);

    expect(checks).toEqual([true, true, true, true, true, true]);
  });
});
