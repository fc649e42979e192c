import type { ParticipantRate, RateTable } from './types'

const PER_MILLION = 1 / 1_000_000

/**
 * Per-token rates in USD keyed by participant name.
 * Gemini Flash runs on the free tier, hence zero.
 */
export const DEFAULT_RATES: RateTable = {
  claude: { input: 3.0 * PER_MILLION, output: 15.0 * PER_MILLION },
  openai: { input: 2.5 * PER_MILLION, output: 10.0 * PER_MILLION },
  gemini: { input: 0, output: 0 },
}

const FREE: ParticipantRate = { input: 0, output: 0 }

export function findRate(participant: string, rates: RateTable = DEFAULT_RATES): ParticipantRate {
  return rates[participant] ?? rates[participant.toLowerCase()] ?? FREE
}

export function estimateCost(
  participant: string,
  inputTokens: number,
  outputTokens: number,
  rates: RateTable = DEFAULT_RATES,
): number {
  const rate = findRate(participant, rates)
  return inputTokens * rate.input + outputTokens * rate.output
}
