/**
 * Confidence of the strategy tier that produced a match.
 */
export type MatchConfidence = 'high' | 'medium' | 'low'

/**
 * Outcome of reconciling one incoming row.
 *
 * `matched` reuses an existing identifier, `minted` created a new one,
 * `rejected` means the natural key was empty.
 */
export type Resolution =
  | {
      status: 'matched'
      id: string
      strategy: string
      confidence: MatchConfidence
      /** Number of existing identifiers the winning tier returned */
      candidates: number
    }
  | {
      status: 'minted'
      id: string
      /** Natural key the identifier was minted for */
      naturalKey: string
    }
  | {
      status: 'rejected'
      reason: string
    }

/**
 * Resolution of a row tagged with the row it belongs to.
 */
export interface ResolvedRow<TRow> {
  row: TRow
  resolution: Resolution
}
