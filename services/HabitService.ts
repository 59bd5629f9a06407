import Database from 'better-sqlite3';
import { BaseService } from './base/BaseService';
import { NotFoundError, ValidationError } from './base/ServiceError';
import { HabitModel } from '../models/HabitModel';
import { HabitCompletionModel } from '../models/HabitCompletionModel';
import { computeHabitStats } from './intelligence/habitStats';
import { validatePayload } from '../shared/schemas/validatePayload';
import {
  HabitCompletionSchema,
  HabitCreateSchema,
  HabitUpdateSchema,
} from '../shared/schemas/habitSchemas';
import type { HabitCreatePayload, HabitUpdatePayload } from '../shared/schemas/habitSchemas';
import { isDateKey, systemClock, toDateKey } from '../utils/dates';
import type { Clock } from '../utils/dates';
import type { Habit, HabitCompletion, StoreResult } from '../shared/types';

interface HabitServiceDeps {
  db: Database.Database;
  habitModel: HabitModel;
  habitCompletionModel: HabitCompletionModel;
  clock?: Clock;
}

export interface CompletionRecorded {
  habit: Habit;
  /** False when the same habit, date and time had already been logged. */
  recorded: boolean;
}

export class HabitService extends BaseService<HabitServiceDeps> {
  private readonly clock: Clock;

  constructor(deps: HabitServiceDeps) {
    super('HabitService', deps);
    this.clock = deps.clock ?? systemClock;
    this.logInfo('Initialized.');
  }

  async createHabit(payload: HabitCreatePayload): Promise<StoreResult<Habit>> {
    return this.executeWrite('createHabit', 'habit', async () => {
      const data = validatePayload(HabitCreateSchema, payload, 'habit');
      const habit = this.deps.habitModel.create({
        ...data,
        createdAt: data.createdAt ?? this.clock().toISOString(),
      });
      this.logInfo('Habit created:', { id: habit.id, title: habit.title });
      return habit;
    });
  }

  async getHabit(id: string): Promise<Habit | null> {
    return this.execute('getHabit', async () => this.deps.habitModel.getById(id), { id });
  }

  async getAllHabits(): Promise<Habit[]> {
    return this.execute('getAllHabits', async () => this.deps.habitModel.getAll());
  }

  async getActiveHabits(): Promise<Habit[]> {
    return this.execute('getActiveHabits', async () => this.deps.habitModel.getActive());
  }

  async updateHabit(id: string, payload: HabitUpdatePayload): Promise<StoreResult<Habit>> {
    return this.executeWrite('updateHabit', 'habit', async () => {
      const changes = validatePayload(HabitUpdateSchema, payload, 'habit update');
      const updated = this.deps.habitModel.update(id, changes);
      if (!updated) {
        throw new NotFoundError('Habit', id);
      }
      return updated;
    }, { id });
  }

  /**
   * Delete a habit and its completion log.
   */
  async deleteHabit(id: string): Promise<StoreResult<void>> {
    return this.executeWrite('deleteHabit', 'habit', async () => {
      if (!this.deps.habitModel.delete(id)) {
        throw new NotFoundError('Habit', id);
      }
    }, { id });
  }

  /**
   * Log a completion and refresh the habit's streak, total and rate in one
   * transaction. Repeating an already logged (date, time) is not an error.
   */
  async recordCompletion(
    habitId: string,
    date: string,
    time?: string | null,
    note?: string
  ): Promise<StoreResult<CompletionRecorded>> {
    return this.executeWrite('recordCompletion', 'habit completion', async () => {
      const completion = validatePayload(
        HabitCompletionSchema,
        { habitId, date, time: time ?? null, note: note ?? '' },
        'habit completion'
      );
      const today = toDateKey(this.clock());

      return this.withTransaction(this.deps.db, () => {
        const habit = this.deps.habitModel.getById(habitId);
        if (!habit) {
          throw new NotFoundError('Habit', habitId);
        }

        const recorded = this.deps.habitCompletionModel.insert({
          habitId,
          completionDate: completion.date,
          completionTime: completion.time,
          note: completion.note,
          recordedAt: this.clock().toISOString(),
        });

        const updated = this.refreshStats(habit, completion.date, today);
        this.logDebug('Completion recorded:', { habitId, date: completion.date, recorded });
        return { habit: updated, recorded };
      });
    }, { habitId, date, time });
  }

  async getCompletions(habitId: string, startDate?: string, endDate?: string): Promise<HabitCompletion[]> {
    return this.execute('getCompletions', async () => {
      for (const bound of [startDate, endDate]) {
        if (bound !== undefined && !isDateKey(bound)) {
          throw new ValidationError(`Invalid date: ${bound}`);
        }
      }
      return this.deps.habitCompletionModel.getForHabit(habitId, startDate, endDate);
    }, { habitId, startDate, endDate });
  }

  /**
   * Rebuild the derived counters from the completion log as of `asOf` (default today).
   */
  async recomputeStats(habitId: string, asOf?: string): Promise<StoreResult<Habit>> {
    return this.executeWrite('recomputeStats', 'habit', async () => {
      const today = toDateKey(this.clock());
      const reference = asOf ?? today;
      if (!isDateKey(reference)) {
        throw new ValidationError(`Invalid date: ${reference}`);
      }

      return this.withTransaction(this.deps.db, () => {
        const habit = this.deps.habitModel.getById(habitId);
        if (!habit) {
          throw new NotFoundError('Habit', habitId);
        }
        return this.refreshStats(habit, reference, today);
      });
    }, { habitId, asOf });
  }

  private refreshStats(habit: Habit, asOf: string, today: string): Habit {
    const completions = this.deps.habitCompletionModel.getForHabit(habit.id);
    const stats = computeHabitStats(habit, completions, asOf, today);
    this.deps.habitModel.updateStats(habit.id, stats);

    const updated = this.deps.habitModel.getById(habit.id);
    if (!updated) {
      throw new NotFoundError('Habit', habit.id);
    }
    return updated;
  }
}
