import { DateTime } from 'luxon';
import { PriceSlot } from './types';
import { Logger, getSilentLogger } from './logger';

/**
 * Where the cache keeps its slots between evaluations.
 */
export interface PriceSlotStore {
  loadPriceSlots(): Promise<PriceSlot[]>;
  replacePriceSlots(slots: PriceSlot[]): Promise<void>;
}

export class MemoryPriceSlotStore implements PriceSlotStore {
  private slots: PriceSlot[] = [];

  async loadPriceSlots(): Promise<PriceSlot[]> {
    return [...this.slots];
  }

  async replacePriceSlots(slots: PriceSlot[]): Promise<void> {
    this.slots = [...slots];
  }
}

export interface MergeStats {
  added: number;
  updated: number;
  priceChanges: number;
  pruned: number;
  total: number;
}

/**
 * Keeps the price series seen so far.
 *
 * Providers usually publish today+tomorrow and drop yesterday at midnight,
 * while a window wrapping midnight still needs yesterday evening's prices.
 * Merging keeps those around for one more day.
 */
export class PriceCache {
  private slotsByStart = new Map<number, PriceSlot>();
  private logger: Logger;

  constructor(
    private store: PriceSlotStore = new MemoryPriceSlotStore(),
    logger?: Logger
  ) {
    this.logger = logger ?? getSilentLogger();
  }

  /**
   * Load previously stored slots.
   */
  async init(): Promise<void> {
    const stored = await this.store.loadPriceSlots();
    this.slotsByStart = new Map(stored.map((slot) => [slot.start.toMillis(), slot]));
  }

  /**
   * Merge `incoming` over the cached slots (incoming wins on equal start),
   * drop slots starting more than one day before `now`, persist.
   */
  async merge(incoming: PriceSlot[], now: DateTime): Promise<MergeStats> {
    let added = 0;
    let updated = 0;
    let priceChanges = 0;

    for (const slot of incoming) {
      if (slot.end.toMillis() <= slot.start.toMillis()) {
        this.logger.warn(`Ignoring price slot with non-positive length at ${slot.start.toISO() ?? 'unknown'}`);
        continue;
      }

      const key = slot.start.toMillis();
      const existing = this.slotsByStart.get(key);
      if (existing) {
        updated++;
        if (existing.price !== slot.price) {
          priceChanges++;
        }
      } else {
        added++;
      }
      this.slotsByStart.set(key, slot);
    }

    const pruned = this.prune(now);
    await this.store.replacePriceSlots(this.slots());

    const stats: MergeStats = { added, updated, priceChanges, pruned, total: this.slotsByStart.size };
    this.logger.info(
      `Updated price cache: ${added} new slots, ${updated} existing slots updated ` +
        `(${priceChanges} with price changes), ${pruned} pruned, total ${stats.total}`
    );
    return stats;
  }

  /**
   * Cached slots ordered by start.
   */
  slots(): PriceSlot[] {
    return [...this.slotsByStart.values()].sort((a, b) => a.start.toMillis() - b.start.toMillis());
  }

  get size(): number {
    return this.slotsByStart.size;
  }

  private prune(now: DateTime): number {
    const cutoff = now.minus({ days: 1 }).toMillis();
    let pruned = 0;
    for (const key of [...this.slotsByStart.keys()]) {
      if (key < cutoff) {
        this.slotsByStart.delete(key);
        pruned++;
      }
    }
    return pruned;
  }
}
