import { Pool, type PoolClient } from "pg";
import { RECORD_ID_MAX, type BatchInput, type BatchRecord, type RecordStatus, type RecordType, type TrackedRecord, type TrackedRecordInput } from "../types/batch.js";
import { BatchNotFoundError, DuplicateBatchNameError } from "./errors.js";
import type { RecordStore } from "./recordStore.js";

interface BatchRow {
  id: number;
  batch_name: string;
  record_type: RecordType;
  description: string | null;
  created_at: Date;
}

interface RecordRow {
  id: number;
  batch_id: number;
  record_id: number;
  status: RecordStatus;
  record_metadata: string | null;
  created_at: Date;
}

const UNIQUE_VIOLATION = "23505";
const FOREIGN_KEY_VIOLATION = "23503";

function mapBatchRow(row: BatchRow): BatchRecord {
  return {
    id: row.id,
    batchName: row.batch_name,
    recordType: row.record_type,
    description: row.description,
    createdAt: row.created_at.toISOString()
  };
}

function mapRecordRow(row: RecordRow): TrackedRecord {
  return {
    id: row.id,
    batchId: row.batch_id,
    recordId: row.record_id,
    status: row.status,
    recordMetadata: row.record_metadata,
    createdAt: row.created_at.toISOString()
  };
}

// A batch id beyond the SERIAL range cannot exist; Postgres would reject it with 22003.
function isStorableBatchId(batchId: number): boolean {
  return Number.isInteger(batchId) && batchId > 0 && batchId <= RECORD_ID_MAX;
}

function pgErrorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  return typeof error.code === "string" ? error.code : undefined;
}

export class PgRecordStore implements RecordStore {
  private readonly pool: Pool;
  private schemaReady = false;

  constructor(connectionString: string) {
    this.pool = new Pool({
      connectionString,
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000
    });
  }

  async createBatch(input: BatchInput): Promise<BatchRecord> {
    await this.ensureSchema();
    try {
      const { rows } = await this.pool.query<BatchRow>(
        `
        INSERT INTO batches (batch_name, record_type, description)
        VALUES ($1, $2, $3)
        RETURNING id, batch_name, record_type, description, created_at
        `,
        [input.batchName, input.recordType, input.description ?? null]
      );
      return mapBatchRow(rows[0]);
    } catch (error) {
      if (pgErrorCode(error) === UNIQUE_VIOLATION) throw new DuplicateBatchNameError(input.batchName);
      throw error;
    }
  }

  async getBatch(batchId: number): Promise<BatchRecord | null> {
    if (!isStorableBatchId(batchId)) return null;
    await this.ensureSchema();
    const { rows } = await this.pool.query<BatchRow>(
      `
      SELECT id, batch_name, record_type, description, created_at
      FROM batches
      WHERE id = $1
      `,
      [batchId]
    );
    return rows[0] ? mapBatchRow(rows[0]) : null;
  }

  async getBatchByName(batchName: string): Promise<BatchRecord | null> {
    await this.ensureSchema();
    const { rows } = await this.pool.query<BatchRow>(
      `
      SELECT id, batch_name, record_type, description, created_at
      FROM batches
      WHERE batch_name = $1
      `,
      [batchName]
    );
    return rows[0] ? mapBatchRow(rows[0]) : null;
  }

  async listBatches(): Promise<BatchRecord[]> {
    await this.ensureSchema();
    const { rows } = await this.pool.query<BatchRow>(
      `
      SELECT id, batch_name, record_type, description, created_at
      FROM batches
      ORDER BY id ASC
      `
    );
    return rows.map(mapBatchRow);
  }

  async deleteBatch(batchId: number): Promise<boolean> {
    if (!isStorableBatchId(batchId)) return false;
    await this.ensureSchema();
    const result = await this.pool.query(`DELETE FROM batches WHERE id = $1`, [batchId]);
    return (result.rowCount ?? 0) > 0;
  }

  async clearAll(): Promise<{ batches: number; records: number }> {
    await this.ensureSchema();
    return this.withTransaction(async (client) => {
      const records = await client.query(`DELETE FROM records`);
      const batches = await client.query(`DELETE FROM batches`);
      return { batches: batches.rowCount ?? 0, records: records.rowCount ?? 0 };
    });
  }

  async insertRecord(batchId: number, input: TrackedRecordInput): Promise<TrackedRecord> {
    const [record] = await this.insertRecords(batchId, [input]);
    return record;
  }

  async insertRecords(batchId: number, inputs: TrackedRecordInput[]): Promise<TrackedRecord[]> {
    if (!isStorableBatchId(batchId)) throw new BatchNotFoundError(batchId);
    await this.ensureSchema();
    if (inputs.length === 0) return [];
    try {
      const { rows } = await this.pool.query<RecordRow>(
        `
        INSERT INTO records (batch_id, record_id, status, record_metadata)
        SELECT $1, input.record_id, input.status, input.record_metadata
        FROM UNNEST($2::integer[], $3::text[], $4::text[]) WITH ORDINALITY
          AS input(record_id, status, record_metadata, position)
        ORDER BY input.position
        RETURNING id, batch_id, record_id, status, record_metadata, created_at
        `,
        [
          batchId,
          inputs.map((input) => input.recordId),
          inputs.map((input) => input.status),
          inputs.map((input) => input.recordMetadata ?? null)
        ]
      );
      return rows.map(mapRecordRow);
    } catch (error) {
      if (pgErrorCode(error) === FOREIGN_KEY_VIOLATION) throw new BatchNotFoundError(batchId);
      throw error;
    }
  }

  async listRecords(batchId: number, status?: RecordStatus): Promise<TrackedRecord[]> {
    if (!isStorableBatchId(batchId)) return [];
    await this.ensureSchema();
    const { rows } = await this.pool.query<RecordRow>(
      `
      SELECT id, batch_id, record_id, status, record_metadata, created_at
      FROM records
      WHERE batch_id = $1
        AND ($2::text IS NULL OR status = $2)
      ORDER BY id ASC
      `,
      [batchId, status ?? null]
    );
    return rows.map(mapRecordRow);
  }

  async fetchIds(batchId: number, status: RecordStatus): Promise<number[]> {
    if (!isStorableBatchId(batchId)) return [];
    await this.ensureSchema();
    const { rows } = await this.pool.query<{ record_id: number }>(
      `
      SELECT record_id
      FROM records
      WHERE batch_id = $1 AND status = $2
      ORDER BY record_id ASC
      `,
      [batchId, status]
    );
    return rows.map((row) => row.record_id);
  }

  async countRecords(batchId: number, status?: RecordStatus): Promise<number> {
    if (!isStorableBatchId(batchId)) return 0;
    await this.ensureSchema();
    const { rows } = await this.pool.query<{ count: string }>(
      `
      SELECT COUNT(*) AS count
      FROM records
      WHERE batch_id = $1
        AND ($2::text IS NULL OR status = $2)
      `,
      [batchId, status ?? null]
    );
    return Number(rows[0]?.count ?? 0);
  }

  async clearRecords(batchId: number): Promise<number> {
    if (!isStorableBatchId(batchId)) return 0;
    await this.ensureSchema();
    const result = await this.pool.query(`DELETE FROM records WHERE batch_id = $1`, [batchId]);
    return result.rowCount ?? 0;
  }

  async ping(): Promise<void> {
    await this.pool.query("SELECT 1");
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async withTransaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await work(client);
      await client.query("COMMIT");
      return result;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  private async ensureSchema(): Promise<void> {
    if (this.schemaReady) return;
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS batches (
        id SERIAL PRIMARY KEY,
        batch_name TEXT NOT NULL UNIQUE,
        record_type TEXT NOT NULL CHECK (record_type IN ('order', 'transaction', 'file', 'shipment', 'payment')),
        description TEXT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS records (
        id SERIAL PRIMARY KEY,
        batch_id INTEGER NOT NULL REFERENCES batches(id) ON DELETE CASCADE,
        record_id INTEGER NOT NULL,
        status TEXT NOT NULL CHECK (status IN ('expected', 'processed')),
        record_metadata TEXT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `);
    await this.pool.query(`CREATE INDEX IF NOT EXISTS idx_records_batch_status ON records (batch_id, status, record_id);`);
    this.schemaReady = true;
  }
}
