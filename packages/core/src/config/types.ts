/**
 * Configuration Types
 */

import type { RateTable } from '../budget/types'
import { DEFAULT_ENGINE_CONFIG } from '../engine/ConversationEngine'
import type { ConversationEngineConfig } from '../engine/types'

export type ParticipantName = 'claude' | 'openai' | 'gemini' | string

export interface ProviderSettings {
  apiKey?: string
  model?: string
  baseUrl?: string
  temperature?: number
}

/**
 * Resolved configuration snapshot, built once per session and passed down.
 */
export interface ColloquyConfig {
  /** Conversation topic */
  topic: string
  /** Participants taking part, by provider name */
  participants: ParticipantName[]
  budget: {
    tokenLimit: number
    warningThreshold: number
  }
  conversation: {
    contextWindowSize: number
    interTurnDelayMs: number
    retryBackoffMs: number
    maxResponseLength: number
    generationTimeoutMs?: number
  }
  /** Per-token rates keyed by participant name */
  rates: RateTable
  providers: Record<ParticipantName, ProviderSettings>
  session: {
    dir: string
  }
}

/**
 * Partial configuration as read from a file, the environment or a caller.
 */
export interface ColloquyConfigInput {
  topic?: string
  participants?: ParticipantName[]
  budget?: Partial<ColloquyConfig['budget']>
  conversation?: Partial<ColloquyConfig['conversation']>
  rates?: RateTable
  providers?: Record<ParticipantName, ProviderSettings>
  session?: Partial<ColloquyConfig['session']>
}

export interface ConfigLoaderOptions {
  /** YAML file to read */
  path?: string
  env?: Record<string, string | undefined>
  /** Applied last, e.g. from CLI flags */
  overrides?: ColloquyConfigInput
}

export const DEFAULT_TOPIC = 'An open discussion on a topic of your choice'

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: ColloquyConfig = {
  topic: DEFAULT_TOPIC,
  participants: ['claude', 'openai', 'gemini'],
  budget: {
    tokenLimit: DEFAULT_ENGINE_CONFIG.tokenLimit,
    warningThreshold: DEFAULT_ENGINE_CONFIG.warningThreshold,
  },
  conversation: {
    contextWindowSize: DEFAULT_ENGINE_CONFIG.contextWindowSize,
    interTurnDelayMs: DEFAULT_ENGINE_CONFIG.interTurnDelayMs,
    retryBackoffMs: DEFAULT_ENGINE_CONFIG.retryBackoffMs,
    maxResponseLength: DEFAULT_ENGINE_CONFIG.maxResponseLength,
  },
  rates: DEFAULT_ENGINE_CONFIG.rates,
  providers: {},
  session: {
    dir: DEFAULT_ENGINE_CONFIG.logDir,
  },
}

/**
 * Flatten a resolved configuration into what {@link ConversationEngine} takes.
 */
export function toEngineConfig(config: ColloquyConfig): ConversationEngineConfig {
  return {
    tokenLimit: config.budget.tokenLimit,
    warningThreshold: config.budget.warningThreshold,
    contextWindowSize: config.conversation.contextWindowSize,
    interTurnDelayMs: config.conversation.interTurnDelayMs,
    retryBackoffMs: config.conversation.retryBackoffMs,
    maxResponseLength: config.conversation.maxResponseLength,
    generationTimeoutMs: config.conversation.generationTimeoutMs,
    rates: config.rates,
    logDir: config.session.dir,
  }
}
