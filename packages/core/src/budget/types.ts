/**
 * Budget Types
 *
 * @module budget/types
 */

/** Cost per token, in USD */
export interface ParticipantRate {
  input: number
  output: number
}

export interface RateTable {
  [participant: string]: ParticipantRate
}

export interface BudgetLimits {
  /** Hard cap; the session stops once total tokens reach it */
  tokenLimit: number
  /** Fraction of the limit at which usage is flagged (default: 0.9) */
  warningThreshold?: number
}

export interface TurnUsage {
  tokens: number
  cost: number
}

export interface ParticipantUsage {
  inputTokens: number
  outputTokens: number
  totalTokens: number
  cost: number
}

/**
 * Detached snapshot of the ledger. Mutating it never touches the ledger.
 */
export interface BudgetSummary {
  tokenLimit: number
  totalTokens: number
  totalCost: number
  usagePercentage: number
  remaining: number
  isWarning: boolean
  isExceeded: boolean
  participants: Record<string, ParticipantUsage>
}
