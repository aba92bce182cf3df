/**
 * PostgreSQL Progress Store
 *
 * One row per workflow:
 *   workflow TEXT PRIMARY KEY, record JSONB, updated_at TIMESTAMPTZ
 *
 * Each commit runs in its own transaction and locks the row with
 * SELECT ... FOR UPDATE, so concurrent engines cannot interleave
 * read-modify-write on the same workflow.
 */

import { Pool } from 'pg';

import { systemClock, type Clock } from '../utils/clock.js';
import { KeyedLock } from './keyed-lock.js';
import { applyMutation } from './record.js';
import { ProgressRecordSchema } from './schema.js';
import { ProgressStoreError, type ProgressStore } from './store.js';
import type { ProgressMutation, ProgressRecord } from './types.js';

// =============================================================================
// POOL SHAPE
// =============================================================================

/**
 * The subset of pg's Pool this store uses.
 */
export interface ProgressQueryable {
  query(text: string, values?: unknown[]): Promise<{ rows: Array<Record<string, unknown>> }>;
}

export interface ProgressPoolClient extends ProgressQueryable {
  release(): void;
}

export interface ProgressPool extends ProgressQueryable {
  connect(): Promise<ProgressPoolClient>;
  end(): Promise<void>;
}

export interface PostgresProgressStoreOptions {
  connectionString?: string;
  /** Use an existing pool; the store will not end it on close. */
  pool?: ProgressPool;
  tableName?: string;
  clock?: Clock;
}

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

// =============================================================================
// POSTGRES STORE
// =============================================================================

export class PostgresProgressStore implements ProgressStore {
  private pool: ProgressPool;
  private ownsPool: boolean;
  private tableName: string;
  private clock: Clock;
  private lock = new KeyedLock();
  private initialized = false;

  constructor(options: PostgresProgressStoreOptions) {
    if (options.pool) {
      this.pool = options.pool;
      this.ownsPool = false;
    } else if (options.connectionString) {
      this.pool = new Pool({ connectionString: options.connectionString });
      this.ownsPool = true;
    } else {
      throw new ProgressStoreError('PostgresProgressStore needs a pool or a connection string');
    }

    const tableName = options.tableName ?? 'workflow_progress';
    if (!TABLE_NAME_PATTERN.test(tableName)) {
      throw new ProgressStoreError(`Invalid progress table name: ${tableName}`);
    }
    this.tableName = tableName;
    this.clock = options.clock ?? systemClock;
  }

  async open(): Promise<void> {
    if (this.initialized) return;

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS ${this.tableName} (
        workflow TEXT PRIMARY KEY,
        record JSONB NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    this.initialized = true;
  }

  async load(workflow: string): Promise<ProgressRecord | null> {
    this.requireOpen();
    const result = await this.pool.query(
      `SELECT record FROM ${this.tableName} WHERE workflow = $1`,
      [workflow]
    );
    const row = result.rows[0];
    return row ? this.parseRecord(workflow, row.record) : null;
  }

  async loadAll(): Promise<ProgressRecord[]> {
    this.requireOpen();
    const result = await this.pool.query(
      `SELECT workflow, record FROM ${this.tableName} ORDER BY workflow`
    );
    return result.rows.map((row) => this.parseRecord(String(row.workflow), row.record));
  }

  async commit(workflow: string, mutation: ProgressMutation): Promise<ProgressRecord> {
    this.requireOpen();

    return this.lock.run(workflow, async () => {
      const client = await this.pool.connect();
      try {
        await client.query('BEGIN');

        const existing = await client.query(
          `SELECT record FROM ${this.tableName} WHERE workflow = $1 FOR UPDATE`,
          [workflow]
        );
        const row = existing.rows[0];
        const current = row ? this.parseRecord(workflow, row.record) : null;

        const next = applyMutation(current, workflow, mutation, this.clock.now());

        await client.query(
          `INSERT INTO ${this.tableName} (workflow, record, updated_at)
           VALUES ($1, $2::jsonb, to_timestamp($3 / 1000.0))
           ON CONFLICT (workflow)
           DO UPDATE SET record = EXCLUDED.record, updated_at = EXCLUDED.updated_at`,
          [workflow, JSON.stringify(next), next.updated_at]
        );

        await client.query('COMMIT');
        return next;
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      } finally {
        client.release();
      }
    });
  }

  async close(): Promise<void> {
    this.initialized = false;
    if (this.ownsPool) {
      await this.pool.end();
    }
  }

  // ===========================================================================
  // PRIVATE
  // ===========================================================================

  private requireOpen(): void {
    if (!this.initialized) {
      throw new ProgressStoreError(`Progress store not open: ${this.tableName}`);
    }
  }

  /**
   * JSONB columns come back parsed; text drivers return strings.
   */
  private parseRecord(workflow: string, value: unknown): ProgressRecord {
    const raw: unknown = typeof value === 'string' ? JSON.parse(value) : value;
    const parsed = ProgressRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProgressStoreError(
        `Stored progress for ${workflow} is invalid: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`
      );
    }
    return parsed.data;
  }
}
