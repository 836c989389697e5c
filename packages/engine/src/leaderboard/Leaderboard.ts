/**
 * Leaderboard
 * Rows ordered by totalScore descending; rank = index + 1.
 * Tie-break: a player who reaches a total keeps their place ahead of anyone who ties it later,
 * so a row whose total grows is re-inserted after every row with an equal or higher score.
 * Updates binary-search the insertion point instead of re-sorting the whole board.
 */
import type { Identity, PlayerScore } from '@custodia/dto'

export interface RecordResult {
  row: PlayerScore
  isNew: boolean
}

export class Leaderboard {
  private rows: PlayerScore[]

  /** `rows` must already be in board order, as produced by toArray(). */
  constructor(rows: readonly PlayerScore[] = []) {
    this.rows = rows.map((r) => ({ ...r }))
    this.rerank(0)
  }

  get size(): number {
    return this.rows.length
  }

  get(player: Identity): PlayerScore | undefined {
    const row = this.rows.find((r) => r.player === player)
    return row ? { ...row } : undefined
  }

  /** Adds one game's score for `player`, inserting a new row on their first game. */
  record(player: Identity, score: number): RecordResult {
    const idx = this.rows.findIndex((r) => r.player === player)
    if (idx !== -1 && score === 0) {
      // total unchanged: the row keeps its place
      const row = this.rows[idx]
      row.totalGames += 1
      return { row: { ...row }, isNew: false }
    }
    let row: PlayerScore
    if (idx === -1) {
      row = { player, totalGames: 1, totalScore: score, rank: 0 }
    } else {
      const [existing] = this.rows.splice(idx, 1)
      row = { ...existing, totalGames: existing.totalGames + 1, totalScore: existing.totalScore + score }
    }
    const at = this.insertionPoint(row.totalScore)
    this.rows.splice(at, 0, row)
    this.rerank(Math.min(at, idx === -1 ? at : idx))
    return { row: { ...row }, isNew: idx === -1 }
  }

  top(n: number): PlayerScore[] {
    return this.rows.slice(0, Math.max(0, n)).map((r) => ({ ...r }))
  }

  toArray(): PlayerScore[] {
    return this.rows.map((r) => ({ ...r }))
  }

  // first index whose score is strictly lower than `score`
  private insertionPoint(score: number): number {
    let lo = 0
    let hi = this.rows.length
    while (lo < hi) {
      const mid = (lo + hi) >>> 1
      if (this.rows[mid].totalScore >= score) lo = mid + 1
      else hi = mid
    }
    return lo
  }

  private rerank(from: number): void {
    for (let i = from; i < this.rows.length; i++) this.rows[i].rank = i + 1
  }
}
