import { BaseService } from './base/BaseService';
import { ValidationError } from './base/ServiceError';
import { DailyEntryModel } from '../models/DailyEntryModel';
import { validatePayload } from '../shared/schemas/validatePayload';
import { DailyEntrySchema } from '../shared/schemas/journalSchemas';
import type { DailyEntryPayload } from '../shared/schemas/journalSchemas';
import { isDateKey, systemClock } from '../utils/dates';
import type { Clock } from '../utils/dates';
import type { DailyEntry, StoreResult } from '../shared/types';

interface JournalServiceDeps {
  dailyEntryModel: DailyEntryModel;
  clock?: Clock;
}

function assertDateKey(value: string): void {
  if (!isDateKey(value)) {
    throw new ValidationError(`Invalid date: ${value}`);
  }
}

export class JournalService extends BaseService<JournalServiceDeps> {
  private readonly clock: Clock;

  constructor(deps: JournalServiceDeps) {
    super('JournalService', deps);
    this.clock = deps.clock ?? systemClock;
    this.logInfo('Initialized.');
  }

  /**
   * Save the entry for its date, replacing any earlier entry for that date.
   */
  async saveDailyEntry(payload: DailyEntryPayload): Promise<StoreResult<DailyEntry>> {
    return this.executeWrite('saveDailyEntry', 'daily entry', async () => {
      const data = validatePayload(DailyEntrySchema, payload, 'daily entry');
      return this.deps.dailyEntryModel.upsert({
        ...data,
        createdAt: data.createdAt ?? this.clock().toISOString(),
      });
    });
  }

  async getDailyEntry(date: string): Promise<DailyEntry | null> {
    return this.execute('getDailyEntry', async () => {
      assertDateKey(date);
      return this.deps.dailyEntryModel.getByDate(date);
    }, { date });
  }

  /**
   * Entries between two dates, inclusive, newest first.
   */
  async getDailyEntriesRange(startDate: string, endDate: string): Promise<DailyEntry[]> {
    return this.execute('getDailyEntriesRange', async () => {
      assertDateKey(startDate);
      assertDateKey(endDate);
      return this.deps.dailyEntryModel.getRange(startDate, endDate);
    }, { startDate, endDate });
  }
}
