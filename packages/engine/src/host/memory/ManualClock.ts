import type { Timestamp } from '@custodia/dto'
import type { Clock } from '../types'

/** Clock that only moves when told to; never goes backwards. */
export class ManualClock implements Clock {
  constructor(private current: Timestamp = 0) {}

  async now(): Promise<Timestamp> {
    return this.current
  }

  set(ts: Timestamp): void {
    if (ts < this.current) throw new Error(`clock cannot move backwards: ${ts} < ${this.current}`)
    this.current = ts
  }

  advance(seconds: number): void {
    this.set(this.current + seconds)
  }
}
