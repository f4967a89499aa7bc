/**
 * RatesStore - persistence for observed exchange rates
 *
 * Two artifacts:
 * - Journal: append-only SQLite table of every observation (better-sqlite3,
 *   WAL mode, schema managed by the SQL files in ./migrations)
 * - Snapshot: JSON document with the current rate per pair, replaced as a
 *   whole by writing a temp file in the same directory and renaming it over
 *   the target, so readers see the old or the new document and nothing else
 *
 * Snapshot document:
 *   { "pairs": { "BTC_USD": { "rate", "updated_at", "source" } }, "last_refresh" }
 */

import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { existsSync, mkdirSync, readFileSync, readdirSync, realpathSync } from 'fs';
import { readFile, rename, rm, writeFile } from 'fs/promises';
import { basename, dirname, join, resolve, sep } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

import {
  RatesError,
  RatesErrorCode,
  err,
  getErrorMessage,
  ok,
  toRatesError,
  type Result,
} from '../errors/rates-errors.js';
import type {
  CacheEntry,
  CacheSnapshot,
  IRatesStore,
  ObservationMetadata,
  RateObservation,
} from '../types/rates.types.js';
import { pairKey, parsePairKey } from '../utils/currency.js';
import { LogEvents, RatesLogger, createSilentLogger, type IRatesLogger } from '../utils/rates-logger.js';

// ============================================================================
// Constants
// ============================================================================

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const MIGRATIONS_DIR = join(__dirname, 'migrations');

/** Base directories persistence files may live under unless configured otherwise */
export const DEFAULT_ALLOWED_DATA_DIRS: readonly string[] = ['./data', './test-data'];

/** SQLite busy timeout in milliseconds */
const BUSY_TIMEOUT_MS = 5000;

const NOT_INITIALIZED_MESSAGE = 'RatesStore not initialized. Call initialize() first.';

// ============================================================================
// Row & Document Shapes
// ============================================================================

interface ObservationRow {
  id: number;
  record_id: string;
  base: string;
  quote: string;
  rate: number;
  observed_at: string;
  source: string;
  metadata_json: string | null;
}

interface ObservationParams {
  recordId: string;
  base: string;
  quote: string;
  rate: number;
  observedAt: string;
  source: string;
  metadataJson: string | null;
}

const SnapshotDocumentSchema = z.object({
  pairs: z.record(
    z.string(),
    z.object({
      rate: z.number().positive(),
      updated_at: z.string(),
      source: z.string(),
    })
  ),
  last_refresh: z.string(),
});

type SnapshotDocument = z.infer<typeof SnapshotDocumentSchema>;

const MetadataSchema = z.record(z.string(), z.string());

function prepareStatements(db: Database.Database) {
  return {
    insertObservation: db.prepare<ObservationParams>(`
      INSERT INTO rate_observations (
        record_id, base, quote, rate, observed_at, source, metadata_json
      ) VALUES (
        @recordId, @base, @quote, @rate, @observedAt, @source, @metadataJson
      )
    `),
    selectJournal: db.prepare<[], ObservationRow>(`
      SELECT * FROM rate_observations ORDER BY id ASC
    `),
    countJournal: db.prepare<[], { count: number }>(`
      SELECT COUNT(*) AS count FROM rate_observations
    `),
    deleteOlderThan: db.prepare<[string]>(`
      DELETE FROM rate_observations WHERE observed_at < ?
    `),
  };
}

type JournalStatements = ReturnType<typeof prepareStatements>;

// ============================================================================
// Types
// ============================================================================

export interface RatesStoreConfig {
  /** SQLite journal file */
  journalPath: string;
  /** JSON snapshot file */
  snapshotPath: string;
  /** Directories both paths must resolve under (default: ./data, ./test-data) */
  allowedDataDirs?: readonly string[];
  logger?: IRatesLogger;
}

function isWithin(path: string, base: string): boolean {
  return path === base || path.startsWith(base + sep);
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// ============================================================================
// RatesStore Implementation
// ============================================================================

export class RatesStore implements IRatesStore {
  private db: Database.Database | null = null;
  private statements: JournalStatements | null = null;
  private readonly journalPath: string;
  private readonly snapshotPath: string;
  private readonly allowedDataDirs: readonly string[];
  private readonly logger: IRatesLogger;

  constructor(config: RatesStoreConfig) {
    this.journalPath = config.journalPath;
    this.snapshotPath = config.snapshotPath;
    this.allowedDataDirs = config.allowedDataDirs ?? DEFAULT_ALLOWED_DATA_DIRS;
    this.logger = config.logger ?? createSilentLogger('store');
  }

  // ============================================================================
  // Database Access (Safe Getters)
  // ============================================================================

  private get database(): Database.Database {
    if (!this.db) {
      throw new RatesError(NOT_INITIALIZED_MESSAGE, RatesErrorCode.PERSISTENCE_ERROR);
    }
    return this.db;
  }

  private get journal(): JournalStatements {
    if (!this.statements) {
      throw new RatesError(NOT_INITIALIZED_MESSAGE, RatesErrorCode.PERSISTENCE_ERROR);
    }
    return this.statements;
  }

  // ============================================================================
  // Lifecycle Methods
  // ============================================================================

  /**
   * Validate paths, create directories, open the journal and run migrations.
   * Throws a PERSISTENCE_ERROR RatesError when a path is outside the allowed
   * directories or the database cannot be opened.
   */
  async initialize(): Promise<void> {
    if (this.db) {
      return;
    }

    if (resolve(this.journalPath) === resolve(this.snapshotPath)) {
      throw new RatesError(
        'Journal and snapshot paths must differ',
        RatesErrorCode.PERSISTENCE_ERROR
      );
    }

    for (const path of [this.journalPath, this.snapshotPath]) {
      this.validateDataPath(path);
      mkdirSync(dirname(path), { recursive: true });
    }

    const db = new Database(this.journalPath);
    try {
      db.pragma('journal_mode = WAL');
      db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
      this.runMigrations(db);
      this.statements = prepareStatements(db);
    } catch (error) {
      db.close();
      throw toRatesError(error, RatesErrorCode.PERSISTENCE_ERROR);
    }
    this.db = db;

    this.logger.info(LogEvents.STORE_INITIALIZED, {
      path: this.journalPath,
      recordCount: this.journal.countJournal.get()?.count ?? 0,
    });
  }

  /**
   * Close the journal database
   */
  async close(): Promise<void> {
    this.statements = null;
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  isInitialized(): boolean {
    return this.db !== null;
  }

  private assertInitialized(): void {
    if (!this.db) {
      throw new RatesError(NOT_INITIALIZED_MESSAGE, RatesErrorCode.PERSISTENCE_ERROR);
    }
  }

  /**
   * Reject paths that resolve outside the allowed data directories,
   * including through a symlinked parent directory.
   */
  private validateDataPath(path: string): void {
    const resolvedPath = resolve(path);
    const allowedBases = this.allowedDataDirs.map((dir) => resolve(dir));

    if (!allowedBases.some((base) => isWithin(resolvedPath, base))) {
      throw new RatesError(`Invalid data path specified: ${path}`, RatesErrorCode.PERSISTENCE_ERROR);
    }

    const parentDir = dirname(resolvedPath);
    if (existsSync(parentDir)) {
      const realDir = realpathSync(parentDir);
      const realBases = allowedBases.map((base) => (existsSync(base) ? realpathSync(base) : base));
      if (!realBases.some((base) => isWithin(realDir, base))) {
        throw new RatesError(`Invalid data path specified: ${path}`, RatesErrorCode.PERSISTENCE_ERROR);
      }
    }
  }

  // ============================================================================
  // Journal
  // ============================================================================

  async appendObservation(observation: RateObservation): Promise<Result<void>> {
    return this.appendObservations([observation]);
  }

  /**
   * Append observations in a single transaction: all rows or none.
   */
  async appendObservations(observations: readonly RateObservation[]): Promise<Result<void>> {
    if (observations.length === 0) {
      return ok(undefined);
    }

    try {
      const insert = this.journal.insertObservation;
      const insertAll = this.database.transaction((rows: readonly RateObservation[]) => {
        for (const row of rows) {
          insert.run(toObservationParams(row));
        }
      });
      insertAll(observations);
    } catch (error) {
      return err(this.persistenceFailure('Failed to append observations', error));
    }

    this.logger.info(LogEvents.JOURNAL_APPENDED, {
      source: observations[0].source,
      recordCount: observations.length,
    });
    return ok(undefined);
  }

  /**
   * All observations in insertion order
   */
  async loadJournal(): Promise<RateObservation[]> {
    return this.journal.selectJournal.all().map((row) => this.rowToObservation(row));
  }

  async getJournalSize(): Promise<number> {
    return this.journal.countJournal.get()?.count ?? 0;
  }

  /**
   * Delete observations observed strictly before the cutoff.
   * @returns number of rows removed
   */
  async pruneJournal(olderThan: Date): Promise<Result<number>> {
    const cutoff = olderThan.toISOString();
    let removed: number;
    try {
      removed = this.journal.deleteOlderThan.run(cutoff).changes;
    } catch (error) {
      return err(this.persistenceFailure('Failed to prune journal', error));
    }

    this.logger.info(LogEvents.JOURNAL_PRUNED, { recordCount: removed, message: `before ${cutoff}` });
    return ok(removed);
  }

  // ============================================================================
  // Snapshot
  // ============================================================================

  /**
   * Atomically replace the snapshot. On failure the previous document is
   * left untouched and the temp file is removed.
   */
  async replaceSnapshot(snapshot: CacheSnapshot): Promise<Result<void>> {
    const tempPath = join(
      dirname(this.snapshotPath),
      `.${basename(this.snapshotPath)}.${randomUUID()}.tmp`
    );

    try {
      this.assertInitialized();
      await writeFile(tempPath, JSON.stringify(toSnapshotDocument(snapshot), null, 2), 'utf-8');
      await rename(tempPath, this.snapshotPath);
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn(LogEvents.PERSISTENCE_ERROR, {
          path: tempPath,
          error: RatesLogger.sanitizeErrorMessage(cleanupError),
          message: 'Failed to remove temporary snapshot file',
        });
      });
      return err(this.persistenceFailure('Failed to replace snapshot', error));
    }

    this.logger.info(LogEvents.SNAPSHOT_REPLACED, {
      path: this.snapshotPath,
      rateCount: Object.keys(snapshot.entries).length,
      lastRefresh: snapshot.lastRefresh,
    });
    return ok(undefined);
  }

  /**
   * Current snapshot, or null when none has been written yet.
   * A document that cannot be read or parsed is reported and treated as absent.
   */
  async loadSnapshot(): Promise<CacheSnapshot | null> {
    this.assertInitialized();

    let raw: string;
    try {
      raw = await readFile(this.snapshotPath, 'utf-8');
    } catch (error) {
      if (!isMissingFileError(error)) {
        this.logger.error(LogEvents.SNAPSHOT_UNREADABLE, {
          path: this.snapshotPath,
          error: RatesLogger.sanitizeErrorMessage(error),
        });
      }
      return null;
    }

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(raw);
    } catch (error) {
      this.logger.error(LogEvents.SNAPSHOT_UNREADABLE, {
        path: this.snapshotPath,
        error: RatesLogger.sanitizeErrorMessage(error),
      });
      return null;
    }

    const parsed = SnapshotDocumentSchema.safeParse(parsedJson);
    if (!parsed.success) {
      this.logger.error(LogEvents.SNAPSHOT_UNREADABLE, {
        path: this.snapshotPath,
        error: parsed.error.issues[0]?.message ?? 'invalid document',
      });
      return null;
    }

    return this.fromSnapshotDocument(parsed.data);
  }

  /**
   * True when there is no snapshot or it is at least `ttlMs` old
   */
  async isStale(ttlMs: number, now: Date = new Date()): Promise<boolean> {
    const snapshot = await this.loadSnapshot();
    if (!snapshot) {
      return true;
    }
    const refreshedAt = Date.parse(snapshot.lastRefresh);
    if (Number.isNaN(refreshedAt)) {
      return true;
    }
    return now.getTime() - refreshedAt >= ttlMs;
  }

  // ============================================================================
  // Migrations
  // ============================================================================

  private runMigrations(db: Database.Database): void {
    const hasVersionTable =
      db
        .prepare<[], { name: string }>(
          "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'"
        )
        .get() !== undefined;

    let currentVersion = 0;
    if (hasVersionTable) {
      const row = db
        .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_version')
        .get();
      currentVersion = row?.version ?? 0;
    }

    for (const file of this.getMigrationFiles()) {
      if (extractMigrationVersion(file) > currentVersion) {
        db.exec(readFileSync(join(MIGRATIONS_DIR, file), 'utf-8'));
      }
    }
  }

  private getMigrationFiles(): string[] {
    if (!existsSync(MIGRATIONS_DIR)) {
      return [];
    }
    return readdirSync(MIGRATIONS_DIR)
      .filter((file) => file.endsWith('.sql'))
      .sort((a, b) => extractMigrationVersion(a) - extractMigrationVersion(b));
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  private persistenceFailure(context: string, error: unknown): RatesError {
    const failure = new RatesError(
      `${context}: ${getErrorMessage(error)}`,
      RatesErrorCode.PERSISTENCE_ERROR,
      error
    );
    this.logger.error(LogEvents.PERSISTENCE_ERROR, {
      error: RatesLogger.sanitizeErrorMessage(failure),
      errorCode: failure.code,
    });
    return failure;
  }

  private rowToObservation(row: ObservationRow): RateObservation {
    const metadata = this.parseMetadata(row);
    return {
      pair: { base: row.base, quote: row.quote },
      rate: row.rate,
      observedAt: row.observed_at,
      source: row.source,
      ...(metadata ? { metadata } : {}),
    };
  }

  private parseMetadata(row: ObservationRow): ObservationMetadata | undefined {
    if (row.metadata_json === null) {
      return undefined;
    }
    try {
      const parsed = MetadataSchema.safeParse(JSON.parse(row.metadata_json));
      return parsed.success ? parsed.data : undefined;
    } catch (error) {
      this.logger.warn(LogEvents.ERROR, {
        pair: `${row.base}_${row.quote}`,
        error: RatesLogger.sanitizeErrorMessage(error),
        message: `Ignoring unparsable metadata on observation ${row.id}`,
      });
      return undefined;
    }
  }

  private fromSnapshotDocument(document: SnapshotDocument): CacheSnapshot {
    const entries: Record<string, CacheEntry> = {};

    for (const [key, entry] of Object.entries(document.pairs)) {
      const pair = parsePairKey(key);
      if (!pair.ok) {
        this.logger.warn(LogEvents.SNAPSHOT_UNREADABLE, {
          pair: key,
          error: pair.error.message,
          message: 'Skipping snapshot entry with an invalid pair key',
        });
        continue;
      }
      entries[pairKey(pair.value)] = {
        pair: pair.value,
        rate: entry.rate,
        updatedAt: entry.updated_at,
        source: entry.source,
      };
    }

    return { entries, lastRefresh: document.last_refresh };
  }
}

// ============================================================================
// Mapping Functions
// ============================================================================

function extractMigrationVersion(filename: string): number {
  const match = filename.match(/^(\d+)/);
  return match ? parseInt(match[1], 10) : 0;
}

function toObservationParams(observation: RateObservation): ObservationParams {
  const key = pairKey(observation.pair);
  return {
    recordId: `${key}_${observation.observedAt}`,
    base: observation.pair.base,
    quote: observation.pair.quote,
    rate: observation.rate,
    observedAt: observation.observedAt,
    source: observation.source,
    metadataJson: observation.metadata ? JSON.stringify(observation.metadata) : null,
  };
}

function toSnapshotDocument(snapshot: CacheSnapshot): SnapshotDocument {
  const pairs: SnapshotDocument['pairs'] = {};
  for (const [key, entry] of Object.entries(snapshot.entries)) {
    pairs[key] = { rate: entry.rate, updated_at: entry.updatedAt, source: entry.source };
  }
  return { pairs, last_refresh: snapshot.lastRefresh };
}
