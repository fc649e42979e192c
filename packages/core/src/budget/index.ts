export { BudgetLedger, type BudgetLedgerOptions, DEFAULT_WARNING_THRESHOLD } from './ledger'
export { DEFAULT_RATES, estimateCost, findRate } from './pricing'
export { cl100kTokenizer, type Tokenizer, wordTokenizer } from './tokenizer'
export type {
  BudgetLimits,
  BudgetSummary,
  ParticipantRate,
  ParticipantUsage,
  RateTable,
  TurnUsage,
} from './types'
