import { reject } from '@custodia/reasons'
import type { KeyValueStore } from '../host/types'
import type { StorageKey } from './keys'

/**
 * TypedStore
 * Schema-checked view over the host's KeyValueStore. An absent key reads as undefined;
 * a present value that fails its schema is corruption and rejects with INTERNAL_ERROR.
 */
export class TypedStore {
  constructor(private kv: KeyValueStore) {}

  async get<T>(key: StorageKey<T>): Promise<T | undefined> {
    const raw = await this.kv.get(key.name)
    if (raw === undefined) return undefined
    const res = key.schema.safeParse(raw)
    if (!res.success) {
      throw reject('INTERNAL_ERROR', {
        message: `stored value under "${key.name}" failed validation`,
        context: { key: key.name, issue: res.error.issues[0]?.message ?? 'unknown' },
      })
    }
    return res.data
  }

  async getOr<T>(key: StorageKey<T>, fallback: T): Promise<T> {
    const v = await this.get(key)
    return v === undefined ? fallback : v
  }

  async set<T>(key: StorageKey<T>, value: T): Promise<void> {
    await this.kv.set(key.name, value)
  }

  has<T>(key: StorageKey<T>): Promise<boolean> {
    return this.kv.has(key.name)
  }
}
