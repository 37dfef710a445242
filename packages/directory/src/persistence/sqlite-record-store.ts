/**
 * SQLite Record Store
 *
 * better-sqlite3 implementation of `RecordStore`. Calls are synchronous
 * underneath and exposed through the async interface so a networked store can
 * replace it without touching callers.
 *
 * - WAL mode so query handlers can read during a cleaning pass
 * - Batch inserts and deletes run in one transaction
 * - CHECK constraints back up the coordinate range invariant
 */

import Database from 'better-sqlite3';
import type {
  CoordinateRange,
  RestroomInput,
  RestroomPatch,
  RestroomRecord,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { prepareCoordinates, type RecordStore } from './record-store.js';

const log = createLogger({ module: 'sqlite-store' });

/**
 * Migration definition
 */
export interface Migration {
  readonly version: number;
  readonly name: string;
  readonly up: (db: Database.Database) => void;
}

interface RestroomRow {
  readonly id: number;
  readonly name: string;
  readonly address: string;
  readonly zip: string;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly hours: string;
  readonly remarks: string;
}

const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: 'create_restrooms',
    up: (db) => {
      db.exec(`
        CREATE TABLE restrooms (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          name TEXT NOT NULL DEFAULT '',
          address TEXT NOT NULL,
          zip TEXT NOT NULL,
          latitude REAL,
          longitude REAL,
          hours TEXT NOT NULL DEFAULT '',
          remarks TEXT NOT NULL DEFAULT '',
          CHECK (latitude IS NULL OR latitude BETWEEN -90 AND 90),
          CHECK (longitude IS NULL OR longitude BETWEEN -180 AND 180)
        );
        CREATE INDEX idx_restrooms_lat_lon ON restrooms (latitude, longitude);
      `);
    },
  },
];

/** Columns a patch may touch, in a fixed order */
const PATCHABLE_COLUMNS = [
  'name',
  'address',
  'zip',
  'latitude',
  'longitude',
  'hours',
  'remarks',
] as const;

function toRecord(row: RestroomRow): RestroomRecord {
  return {
    id: row.id,
    name: row.name,
    address: row.address,
    zip: row.zip,
    latitude: row.latitude,
    longitude: row.longitude,
    hours: row.hours,
    remarks: row.remarks,
  };
}

export class SqliteRecordStore implements RecordStore {
  private readonly db: Database.Database;

  constructor(dbPath: string = 'restrooms.db') {
    this.db = new Database(dbPath);

    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');

    this.runMigrations();
  }

  // ============================================================================
  // Migration Management
  // ============================================================================

  private runMigrations(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      );
    `);

    const row = this.db
      .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_migrations')
      .get();
    const currentVersion = row?.version ?? 0;

    const apply = this.db.transaction(() => {
      for (const migration of MIGRATIONS) {
        if (migration.version > currentVersion) {
          migration.up(this.db);
          this.db
            .prepare('INSERT INTO schema_migrations (version, name) VALUES (?, ?)')
            .run(migration.version, migration.name);
          log.info('Applied migration', { version: migration.version, name: migration.name });
        }
      }
    });
    apply();
  }

  // ============================================================================
  // Writes
  // ============================================================================

  async insert(record: RestroomInput): Promise<RestroomRecord> {
    const prepared = prepareCoordinates(record);
    const result = this.db
      .prepare(
        `INSERT INTO restrooms (name, address, zip, latitude, longitude, hours, remarks)
         VALUES (@name, @address, @zip, @latitude, @longitude, @hours, @remarks)`
      )
      .run(prepared);

    return { id: Number(result.lastInsertRowid), ...prepared };
  }

  async insertMany(records: readonly RestroomInput[]): Promise<number> {
    const prepared = records.map((record) => prepareCoordinates(record));
    const statement = this.db.prepare(
      `INSERT INTO restrooms (name, address, zip, latitude, longitude, hours, remarks)
       VALUES (@name, @address, @zip, @latitude, @longitude, @hours, @remarks)`
    );

    const insertAll = this.db.transaction((rows: readonly RestroomInput[]) => {
      for (const row of rows) {
        statement.run(row);
      }
      return rows.length;
    });

    return insertAll(prepared);
  }

  async update(id: number, patch: RestroomPatch): Promise<void> {
    const prepared = prepareCoordinates(patch);
    const assignments: string[] = [];
    const values: Array<string | number | null> = [];

    for (const column of PATCHABLE_COLUMNS) {
      const value = prepared[column];
      if (value !== undefined) {
        assignments.push(`${column} = ?`);
        values.push(value);
      }
    }

    if (assignments.length === 0) return;

    this.db
      .prepare(`UPDATE restrooms SET ${assignments.join(', ')} WHERE id = ?`)
      .run(...values, id);
  }

  async deleteMany(ids: readonly number[]): Promise<number> {
    if (ids.length === 0) return 0;

    const statement = this.db.prepare('DELETE FROM restrooms WHERE id = ?');
    const deleteAll = this.db.transaction((toDelete: readonly number[]) => {
      let removed = 0;
      for (const id of toDelete) {
        removed += statement.run(id).changes;
      }
      return removed;
    });

    return deleteAll(ids);
  }

  // ============================================================================
  // Reads
  // ============================================================================

  async get(id: number): Promise<RestroomRecord | null> {
    const row = this.db
      .prepare<[number], RestroomRow>('SELECT * FROM restrooms WHERE id = ?')
      .get(id);
    return row ? toRecord(row) : null;
  }

  async all(): Promise<readonly RestroomRecord[]> {
    return this.db
      .prepare<[], RestroomRow>('SELECT * FROM restrooms ORDER BY id')
      .all()
      .map(toRecord);
  }

  async withCoordinates(
    range?: CoordinateRange,
    limit?: number
  ): Promise<readonly RestroomRecord[]> {
    const conditions = ['latitude IS NOT NULL', 'longitude IS NOT NULL'];
    const params: number[] = [];

    if (range) {
      conditions.push('latitude BETWEEN ? AND ?', 'longitude BETWEEN ? AND ?');
      params.push(range.latMin, range.latMax, range.lonMin, range.lonMax);
    }

    let sql = `SELECT * FROM restrooms WHERE ${conditions.join(' AND ')} ORDER BY id`;
    if (limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(limit);
    }

    return this.db.prepare<number[], RestroomRow>(sql).all(...params).map(toRecord);
  }

  async count(): Promise<number> {
    const row = this.db
      .prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM restrooms')
      .get();
    return row?.total ?? 0;
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
