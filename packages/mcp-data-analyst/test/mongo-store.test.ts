import { describe, it, expect, afterEach, vi } from 'vitest';
import mongoose from 'mongoose';
import { DatasetHistoryModel, MongoHistoryStore } from '../src/history/mongo-store.ts';
import { DAY_MS } from '../src/history/types.ts';

type FilteredQuery = { getFilter(): Record<string, unknown> };

function historyDoc(filename: string, lastUsed: Date) {
  return new DatasetHistoryModel({
    name: filename,
    filename,
    columns: ['x'],
    rowCount: 1,
    uploadDate: lastUsed,
    lastUsed,
    isFavorite: false,
    usageCount: 1,
  });
}

describe('MongoHistoryStore.purgeStale', () => {
  const now = new Date('2024-06-01T00:00:00Z');
  const cutoff = new Date(now.getTime() - 30 * DAY_MS);
  const longAgo = new Date('2024-01-01T00:00:00Z');

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('deletes each candidate only while it still matches the stale filter', async () => {
    const stale = historyDoc('stale', longAgo);
    // Favorited between the scan and the delete: the conditional delete finds nothing.
    const favoritedMeanwhile = historyDoc('favorited', longAgo);
    const deleteFilters: Record<string, unknown>[] = [];

    vi.spyOn(mongoose.Query.prototype, 'exec').mockImplementation(async function (this: FilteredQuery) {
      const filter = this.getFilter();
      if (!('_id' in filter)) {
        return [stale, favoritedMeanwhile];
      }
      deleteFilters.push(filter);
      return String(filter._id) === stale._id.toString() ? stale : null;
    });

    const store = new MongoHistoryStore(() => now);
    const removed = await store.purgeStale(30, { excludeFavorites: true });

    expect(removed.map((entry) => entry.filename)).toEqual(['stale']);
    expect(deleteFilters.map((filter) => String(filter._id))).toEqual([
      stale._id.toString(),
      favoritedMeanwhile._id.toString(),
    ]);
    for (const filter of deleteFilters) {
      expect(filter.isFavorite).toBe(false);
      expect(filter.lastUsed).toEqual({ $lt: cutoff });
    }
  });

  it('does not filter on favorites when they are not excluded', async () => {
    const stale = historyDoc('stale', longAgo);
    const deleteFilters: Record<string, unknown>[] = [];

    vi.spyOn(mongoose.Query.prototype, 'exec').mockImplementation(async function (this: FilteredQuery) {
      const filter = this.getFilter();
      if (!('_id' in filter)) {
        return [stale];
      }
      deleteFilters.push(filter);
      return stale;
    });

    const removed = await new MongoHistoryStore(() => now).purgeStale(30, { excludeFavorites: false });

    expect(removed.map((entry) => entry.filename)).toEqual(['stale']);
    expect(deleteFilters).toHaveLength(1);
    expect('isFavorite' in deleteFilters[0]).toBe(false);
    expect(deleteFilters[0].lastUsed).toEqual({ $lt: cutoff });
  });
});
