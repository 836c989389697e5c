/**
 * PgStore
 * Durable KeyValueStore on Postgres. One row per (namespace, key); values go through the
 * bigint-aware JSON codec and are stored as text so amounts round-trip exactly.
 * Transactions belong to the caller (see PgHost); the store only reads and writes rows.
 */
import type { KeyValueStore } from '../host/types'
import { decodeValue, encodeValue } from './codec'

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: Array<Record<string, unknown>> }>
}

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/

export class PgStore implements KeyValueStore {
  constructor(
    private client: SqlClient,
    private namespace: string,
    private table = 'custodia_state'
  ) {
    if (!IDENTIFIER.test(table)) throw new Error(`invalid table name: ${table}`)
  }

  async ensureSchema(): Promise<void> {
    await this.client.query(
      `CREATE TABLE IF NOT EXISTS ${this.table} (
        namespace TEXT NOT NULL,
        key TEXT NOT NULL,
        value TEXT NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        PRIMARY KEY (namespace, key)
      )`
    )
  }

  async get(key: string): Promise<unknown> {
    const res = await this.client.query(`SELECT value FROM ${this.table} WHERE namespace = $1 AND key = $2`, [this.namespace, key])
    const row = res.rows[0]
    if (!row) return undefined
    const value = row.value
    if (typeof value !== 'string') throw new Error(`unexpected value type for ${this.namespace}/${key}`)
    return decodeValue(value)
  }

  async set(key: string, value: unknown): Promise<void> {
    await this.client.query(
      `INSERT INTO ${this.table} (namespace, key, value) VALUES ($1, $2, $3)
       ON CONFLICT (namespace, key) DO UPDATE SET value = EXCLUDED.value, updated_at = now()`,
      [this.namespace, key, encodeValue(value)]
    )
  }

  async has(key: string): Promise<boolean> {
    const res = await this.client.query(`SELECT 1 FROM ${this.table} WHERE namespace = $1 AND key = $2`, [this.namespace, key])
    return res.rows.length > 0
  }
}
