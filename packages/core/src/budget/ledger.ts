import { TokenizationError } from '../errors'
import { DEFAULT_RATES, estimateCost } from './pricing'
import { cl100kTokenizer, type Tokenizer } from './tokenizer'
import type { BudgetLimits, BudgetSummary, ParticipantUsage, RateTable, TurnUsage } from './types'

export const DEFAULT_WARNING_THRESHOLD = 0.9

export interface BudgetLedgerOptions extends BudgetLimits {
  rates?: RateTable
  tokenizer?: Tokenizer
}

interface TokenCounts {
  inputTokens: number
  outputTokens: number
}

/**
 * Token and cost accounting for one session.
 *
 * The limit is only consulted between turns, so the realized total can pass
 * it by at most one turn's usage.
 *
 * @example
 * ```typescript
 * const ledger = new BudgetLedger({ tokenLimit: 20_000 })
 * const { tokens, cost } = ledger.record('claude', topic, response)
 * if (ledger.isExceeded()) stop()
 * ```
 */
export class BudgetLedger {
  private readonly tokenLimit: number
  private readonly warningThreshold: number
  private readonly rates: RateTable
  private readonly tokenizer: Tokenizer
  private readonly usage = new Map<string, TokenCounts>()
  private totalTokens = 0
  private totalCost = 0

  constructor(options: BudgetLedgerOptions) {
    this.tokenLimit = options.tokenLimit
    this.warningThreshold = options.warningThreshold ?? DEFAULT_WARNING_THRESHOLD
    this.rates = options.rates ?? DEFAULT_RATES
    this.tokenizer = options.tokenizer ?? cl100kTokenizer
  }

  get limit(): number {
    return this.tokenLimit
  }

  get tokens(): number {
    return this.totalTokens
  }

  get cost(): number {
    return this.totalCost
  }

  /**
   * Count both texts and charge them to `participant`.
   *
   * Counting happens before any counter moves, so a {@link TokenizationError}
   * leaves the ledger exactly as it was.
   */
  record(participant: string, inputText: string, outputText: string): TurnUsage {
    const inputTokens = this.count(inputText)
    const outputTokens = this.count(outputText)
    const cost = estimateCost(participant, inputTokens, outputTokens, this.rates)

    const current = this.usage.get(participant) ?? { inputTokens: 0, outputTokens: 0 }
    this.usage.set(participant, {
      inputTokens: current.inputTokens + inputTokens,
      outputTokens: current.outputTokens + outputTokens,
    })

    const tokens = inputTokens + outputTokens
    this.totalTokens += tokens
    this.totalCost += cost

    return { tokens, cost }
  }

  isExceeded(): boolean {
    return this.totalTokens >= this.tokenLimit
  }

  isWarning(): boolean {
    if (this.tokenLimit <= 0) return false
    return this.usagePercentage() >= this.warningThreshold * 100
  }

  usagePercentage(): number {
    return this.tokenLimit > 0 ? (this.totalTokens / this.tokenLimit) * 100 : 0
  }

  remaining(): number {
    return Math.max(0, this.tokenLimit - this.totalTokens)
  }

  summary(): BudgetSummary {
    const participants: Record<string, ParticipantUsage> = {}
    for (const [name, counts] of this.usage) {
      participants[name] = {
        inputTokens: counts.inputTokens,
        outputTokens: counts.outputTokens,
        totalTokens: counts.inputTokens + counts.outputTokens,
        cost: estimateCost(name, counts.inputTokens, counts.outputTokens, this.rates),
      }
    }

    return {
      tokenLimit: this.tokenLimit,
      totalTokens: this.totalTokens,
      totalCost: this.totalCost,
      usagePercentage: this.usagePercentage(),
      remaining: this.remaining(),
      isWarning: this.isWarning(),
      isExceeded: this.isExceeded(),
      participants,
    }
  }

  private count(text: string): number {
    try {
      return this.tokenizer.count(text)
    } catch (error) {
      throw new TokenizationError(error)
    }
  }
}
