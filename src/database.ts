import BetterSqlite3, { Database as SqliteDatabase } from 'better-sqlite3';
import { DateTime } from 'luxon';
import { z } from 'zod';
import {
  IntervalMode,
  PriceMode,
  PriceSlot,
  PriceSlotRow,
  Sensor,
  SensorConfig,
  SensorRow,
} from './types';
import { PriceSlotStore } from './price-cache';
import { ConfigurationError } from './errors';

const SCHEMA = `
-- ===== PRICE SLOTS =====
CREATE TABLE IF NOT EXISTS price_slots (
  start_ms INTEGER PRIMARY KEY,
  end_ms INTEGER NOT NULL CHECK(end_ms > start_ms),
  price REAL NOT NULL,
  zone TEXT NOT NULL DEFAULT 'UTC'
);

-- ===== SENSORS =====
CREATE TABLE IF NOT EXISTS sensors (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE,
  earliest_start TEXT NOT NULL,
  latest_end TEXT NOT NULL,
  duration_seconds REAL,
  duration_signal INTEGER NOT NULL DEFAULT 0 CHECK(duration_signal IN (0, 1)),
  price_mode TEXT NOT NULL CHECK(price_mode IN ('cheapest', 'most_expensive')),
  interval_mode TEXT NOT NULL CHECK(interval_mode IN ('contiguous', 'intermittent')),
  timezone TEXT NOT NULL DEFAULT 'UTC',
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE INDEX IF NOT EXISTS idx_sensors_name ON sensors(name);

-- ===== CONFIGURATION =====
CREATE TABLE IF NOT EXISTS config (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL,
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);
`;

export const SCHEMA_VERSION = '1.0.0';

const priceModeSchema = z.nativeEnum(PriceMode);
const intervalModeSchema = z.nativeEnum(IntervalMode);

export class Database implements PriceSlotStore {
  private db: SqliteDatabase;
  private path: string;

  constructor(path: string) {
    this.path = path;
    this.db = new BetterSqlite3(path);
  }

  /**
   * Create missing tables and stamp a fresh file with SCHEMA_VERSION.
   * Files written by another schema version are refused.
   */
  async init(): Promise<void> {
    this.db.exec(SCHEMA);

    const version = await this.getConfig('version');
    if (version === null) {
      await this.setConfig('version', SCHEMA_VERSION);
    } else if (version !== SCHEMA_VERSION) {
      throw new ConfigurationError(
        `Database ${this.getPath()} has schema version ${JSON.stringify(version)}, expected ${SCHEMA_VERSION}`
      );
    }
  }

  async close(): Promise<void> {
    this.db.close();
  }

  // ===== PRICE SLOT OPERATIONS =====

  async upsertPriceSlots(slots: PriceSlot[]): Promise<void> {
    this.transaction(() => this.writePriceSlots(slots));
  }

  /**
   * Slots starting in [from, to), ordered by start. Both bounds optional.
   */
  async getPriceSlots(from?: DateTime, to?: DateTime): Promise<PriceSlot[]> {
    let sql = 'SELECT * FROM price_slots WHERE 1=1';
    const params: number[] = [];

    if (from) {
      sql += ' AND start_ms >= ?';
      params.push(from.toMillis());
    }

    if (to) {
      sql += ' AND start_ms < ?';
      params.push(to.toMillis());
    }

    sql += ' ORDER BY start_ms';

    const rows = this.db.prepare(sql).all(...params) as PriceSlotRow[];
    return rows.map((row) => this.rowToPriceSlot(row));
  }

  async deletePriceSlotsBefore(before: DateTime): Promise<number> {
    const result = this.db.prepare('DELETE FROM price_slots WHERE start_ms < ?').run(before.toMillis());
    return result.changes;
  }

  async loadPriceSlots(): Promise<PriceSlot[]> {
    return this.getPriceSlots();
  }

  async replacePriceSlots(slots: PriceSlot[]): Promise<void> {
    this.transaction(() => {
      this.db.prepare('DELETE FROM price_slots').run();
      this.writePriceSlots(slots);
    });
  }

  private writePriceSlots(slots: PriceSlot[]): void {
    const stmt = this.db.prepare(`
      INSERT INTO price_slots (start_ms, end_ms, price, zone)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(start_ms) DO UPDATE SET end_ms = excluded.end_ms, price = excluded.price, zone = excluded.zone
    `);

    for (const slot of slots) {
      stmt.run(slot.start.toMillis(), slot.end.toMillis(), slot.price, slot.start.zoneName ?? 'UTC');
    }
  }

  // ===== SENSOR OPERATIONS =====

  async insertSensor(config: SensorConfig): Promise<number> {
    const now = new Date().toISOString();
    const stmt = this.db.prepare(`
      INSERT INTO sensors (
        name, earliest_start, latest_end, duration_seconds, duration_signal,
        price_mode, interval_mode, timezone, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const result = stmt.run(
      config.name,
      config.earliestStart,
      config.latestEnd,
      config.durationSeconds ?? null,
      config.durationSignal ? 1 : 0,
      config.priceMode,
      config.intervalMode,
      config.timezone,
      now,
      now
    );

    return Number(result.lastInsertRowid);
  }

  async getSensor(id: number): Promise<Sensor | null> {
    const row = this.db.prepare('SELECT * FROM sensors WHERE id = ?').get(id) as SensorRow | undefined;
    return row ? this.rowToSensor(row) : null;
  }

  async getSensorByName(name: string): Promise<Sensor | null> {
    const row = this.db.prepare('SELECT * FROM sensors WHERE name = ?').get(name) as SensorRow | undefined;
    return row ? this.rowToSensor(row) : null;
  }

  async getSensors(): Promise<Sensor[]> {
    const rows = this.db.prepare('SELECT * FROM sensors ORDER BY name').all() as SensorRow[];
    return rows.map((row) => this.rowToSensor(row));
  }

  async updateSensor(id: number, config: SensorConfig): Promise<void> {
    this.db
      .prepare(
        `
      UPDATE sensors SET
        name = ?, earliest_start = ?, latest_end = ?, duration_seconds = ?, duration_signal = ?,
        price_mode = ?, interval_mode = ?, timezone = ?, updated_at = ?
      WHERE id = ?
    `
      )
      .run(
        config.name,
        config.earliestStart,
        config.latestEnd,
        config.durationSeconds ?? null,
        config.durationSignal ? 1 : 0,
        config.priceMode,
        config.intervalMode,
        config.timezone,
        new Date().toISOString(),
        id
      );
  }

  async deleteSensor(id: number): Promise<void> {
    this.db.prepare('DELETE FROM sensors WHERE id = ?').run(id);
  }

  // ===== CONFIG OPERATIONS =====

  async getConfig(key: string): Promise<unknown> {
    const stmt = this.db.prepare('SELECT value FROM config WHERE key = ?');
    const row = stmt.get(key) as { value: string } | undefined;
    return row ? JSON.parse(row.value) : null;
  }

  async setConfig(key: string, value: unknown): Promise<void> {
    const stmt = this.db.prepare(`
      INSERT INTO config (key, value, updated_at)
      VALUES (?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET value = ?, updated_at = ?
    `);
    const now = new Date().toISOString();
    const jsonValue = JSON.stringify(value);
    stmt.run(key, jsonValue, now, jsonValue, now);
  }

  // ===== TRANSACTIONS =====

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // ===== UTILITY METHODS =====

  getPath(): string {
    return this.path;
  }

  private rowToPriceSlot(row: PriceSlotRow): PriceSlot {
    return {
      start: DateTime.fromMillis(row.start_ms, { zone: row.zone }),
      end: DateTime.fromMillis(row.end_ms, { zone: row.zone }),
      price: row.price,
    };
  }

  private rowToSensor(row: SensorRow): Sensor {
    return {
      id: row.id,
      name: row.name,
      earliestStart: row.earliest_start,
      latestEnd: row.latest_end,
      durationSeconds: row.duration_seconds ?? undefined,
      durationSignal: row.duration_signal === 1,
      priceMode: priceModeSchema.parse(row.price_mode),
      intervalMode: intervalModeSchema.parse(row.interval_mode),
      timezone: row.timezone,
      created_at: new Date(row.created_at),
      updated_at: new Date(row.updated_at),
    };
  }
}
