/**
 * PgHost
 * Host whose durable state lives in Postgres. Every entry point runs between BEGIN and COMMIT
 * on one dedicated connection, and a rejected call issues ROLLBACK, so none of its store
 * writes survive. Calls are queued on a promise chain since a connection holds one
 * transaction at a time.
 *
 * Transfers go through the injected TransferClient and are only undone with the store when
 * that client writes through the same connection.
 */
import { Pool } from 'pg'
import type { Identity } from '@custodia/dto'
import type { AuthGuard, Clock, SettlementHost, TransferClient } from '../types'
import { PgStore, SqlClient } from '../../store/PgStore'

export interface PgHostOptions {
  /** A single connection; pooled clients would spread one call over several transactions. */
  client: SqlClient
  namespace: string
  auth: AuthGuard
  token: TransferClient
  clock: Clock
  custody: Identity
  table?: string
}

export class PgHost implements SettlementHost {
  readonly auth: AuthGuard
  readonly token: TransferClient
  readonly clock: Clock
  readonly custody: Identity
  readonly store: PgStore
  private client: SqlClient
  private tail: Promise<unknown> = Promise.resolve()

  constructor(
    opts: PgHostOptions,
    private onClose?: () => Promise<void>
  ) {
    this.client = opts.client
    this.auth = opts.auth
    this.token = opts.token
    this.clock = opts.clock
    this.custody = opts.custody
    this.store = new PgStore(opts.client, opts.namespace, opts.table)
  }

  /** Checks out one connection from a new pool and makes sure the state table exists. */
  static async connect(connectionString: string, opts: Omit<PgHostOptions, 'client'>): Promise<PgHost> {
    const pool = new Pool({ connectionString })
    const conn = await pool.connect()
    const client: SqlClient = {
      query: async (text, values) => {
        const res = await conn.query(text, values)
        return { rows: res.rows }
      },
    }
    const host = new PgHost({ ...opts, client }, async () => {
      conn.release()
      await pool.end()
    })
    await host.store.ensureSchema()
    return host
  }

  transaction<T>(fn: () => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      await this.client.query('BEGIN')
      try {
        const result = await fn()
        await this.client.query('COMMIT')
        return result
      } catch (e) {
        await this.client.query('ROLLBACK')
        throw e
      }
    }
    const result = this.tail.then(run, run)
    this.tail = result.catch(() => undefined)
    return result
  }

  async close(): Promise<void> {
    await this.onClose?.()
  }
}
