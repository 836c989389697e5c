/* In-memory durable store. Values are deep-copied on the way in and out so callers
   can never mutate persisted state except through set(). */

import type { KeyValueStore } from '../types'

export class MemoryStore implements KeyValueStore {
  private entries: Map<string, unknown> = new Map()

  async get(key: string): Promise<unknown> {
    const v = this.entries.get(key)
    return v === undefined ? undefined : structuredClone(v)
  }

  async set(key: string, value: unknown): Promise<void> {
    this.entries.set(key, structuredClone(value))
  }

  async has(key: string): Promise<boolean> {
    return this.entries.has(key)
  }

  snapshot(): Map<string, unknown> {
    return structuredClone(this.entries)
  }

  restore(snap: Map<string, unknown>): void {
    this.entries = structuredClone(snap)
  }
}
