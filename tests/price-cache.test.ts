import { DateTime } from 'luxon';
import { MemoryPriceSlotStore, PriceCache, PriceSlot } from '../src';

const utc = (iso: string): DateTime => DateTime.fromISO(iso, { zone: 'utc' });

function hourly(startIso: string, prices: number[]): PriceSlot[] {
  const first = utc(startIso);
  return prices.map((price, i) => ({
    start: first.plus({ hours: i }),
    end: first.plus({ hours: i + 1 }),
    price,
  }));
}

describe('PriceCache', () => {
  let store: MemoryPriceSlotStore;
  let cache: PriceCache;

  beforeEach(() => {
    store = new MemoryPriceSlotStore();
    cache = new PriceCache(store);
  });

  test('merge adds new slots', async () => {
    const stats = await cache.merge(hourly('2024-01-15T00:00:00Z', [1, 2, 3]), utc('2024-01-15T00:00:00Z'));

    expect(stats).toEqual({ added: 3, updated: 0, priceChanges: 0, pruned: 0, total: 3 });
    expect(cache.size).toBe(3);
  });

  test('incoming slots replace cached ones with the same start', async () => {
    const now = utc('2024-01-15T00:00:00Z');
    await cache.merge(hourly('2024-01-15T00:00:00Z', [1, 2, 3]), now);

    const stats = await cache.merge(hourly('2024-01-15T02:00:00Z', [3, 4]), now);

    expect(stats).toEqual({ added: 1, updated: 1, priceChanges: 0, pruned: 0, total: 4 });
    expect(cache.slots().map((slot) => slot.price)).toEqual([1, 2, 3, 4]);

    const changed = await cache.merge(hourly('2024-01-15T00:00:00Z', [9]), now);
    expect(changed.priceChanges).toBe(1);
    expect(cache.slots()[0].price).toBe(9);
  });

  test('keeps yesterday evening but prunes older slots', async () => {
    await cache.merge(hourly('2024-01-14T00:00:00Z', [1, 1, 1]), utc('2024-01-14T00:00:00Z'));
    await cache.merge(hourly('2024-01-14T22:00:00Z', [2, 2]), utc('2024-01-14T22:00:00Z'));

    const stats = await cache.merge(hourly('2024-01-15T00:00:00Z', [3]), utc('2024-01-15T01:30:00Z'));

    // cutoff is 2024-01-14T01:30Z: 00:00 and 01:00 go, 02:00 stays
    expect(stats.pruned).toBe(2);
    expect(cache.slots().map((slot) => slot.start.toUTC().toISO())).toEqual([
      '2024-01-14T02:00:00.000Z',
      '2024-01-14T22:00:00.000Z',
      '2024-01-14T23:00:00.000Z',
      '2024-01-15T00:00:00.000Z',
    ]);
  });

  test('slots come back ordered by start', async () => {
    const now = utc('2024-01-15T00:00:00Z');
    const slots = hourly('2024-01-15T00:00:00Z', [1, 2, 3]);
    await cache.merge([slots[2], slots[0], slots[1]], now);

    expect(cache.slots().map((slot) => slot.price)).toEqual([1, 2, 3]);
  });

  test('ignores slots without positive length', async () => {
    const start = utc('2024-01-15T00:00:00Z');

    const stats = await cache.merge([{ start, end: start, price: 5 }], start);

    expect(stats.added).toBe(0);
    expect(cache.size).toBe(0);
  });

  test('persists to the store and reloads on init', async () => {
    await cache.merge(hourly('2024-01-15T00:00:00Z', [4, 5]), utc('2024-01-15T00:00:00Z'));
    expect(await store.loadPriceSlots()).toHaveLength(2);

    const reloaded = new PriceCache(store);
    await reloaded.init();

    expect(reloaded.slots().map((slot) => slot.price)).toEqual([4, 5]);
  });
});
