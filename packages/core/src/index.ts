/**
 * @colloquy/core
 *
 * Multi-AI Conversation Engine - Core Library
 *
 * @example
 * ```typescript
 * import { ClaudeProvider, ConversationEngine, GeminiProvider, OpenAIProvider } from '@colloquy/core'
 *
 * const engine = new ConversationEngine({ tokenLimit: 20_000 })
 *
 * const result = await engine.run({
 *   topic: 'What makes a city livable?',
 *   participants: [new ClaudeProvider(), new OpenAIProvider(), new GeminiProvider()],
 * })
 *
 * console.log(result.reason, result.summary.totalTokens)
 * ```
 */

// Budget - Token and cost accounting
export {
  BudgetLedger,
  type BudgetLedgerOptions,
  type BudgetLimits,
  type BudgetSummary,
  cl100kTokenizer,
  DEFAULT_RATES,
  DEFAULT_WARNING_THRESHOLD,
  estimateCost,
  findRate,
  type ParticipantRate,
  type ParticipantUsage,
  type RateTable,
  type Tokenizer,
  type TurnUsage,
  wordTokenizer,
} from './budget'
// Config - Configuration management
export {
  API_KEY_ENV,
  canonicalParticipant,
  type ColloquyConfig,
  type ColloquyConfigInput,
  type ConfigLoaderOptions,
  configSchema,
  DEFAULT_CONFIG,
  DEFAULT_TOPIC,
  getDefaultConfig,
  loadConfig,
  loadConfigFromEnv,
  loadConfigFromFile,
  mergeConfig,
  missingApiKeys,
  PARTICIPANT_ALIASES,
  type ParticipantName,
  type ProviderSettings,
  toEngineConfig,
  validateConfig,
} from './config'
// Engine - Turn loop, scheduling and context windows
export {
  type BudgetWarningEvent,
  ContextBuilder,
  type ContextBuilderOptions,
  ConversationEngine,
  type ConversationEngineConfig,
  type ConversationEngineDeps,
  type ConversationEvent,
  type ConversationOptions,
  type ConversationResult,
  DEFAULT_CONTEXT_WINDOW,
  DEFAULT_ENGINE_CONFIG,
  type EngineState,
  type SessionEndEvent,
  type SessionStartEvent,
  sleep,
  type TerminationReason,
  TOPIC_LABEL,
  type TurnEndEvent,
  type TurnFailedEvent,
  TurnScheduler,
  type TurnStartEvent,
} from './engine'
// Errors
export { ConfigError, GenerationError, isTurnRecoverable, PreconditionError, TokenizationError } from './errors'
// Providers - AI provider implementations (powered by Vercel AI SDK)
export {
  AISDKBackend,
  type AISDKProviderType,
  BaseProvider,
  type ChatMessage,
  ClaudeProvider,
  type ClaudeProviderConfig,
  type ConversationContext,
  DEFAULT_MODELS,
  GeminiProvider,
  type GeminiProviderConfig,
  type GenerateOptions,
  OpenAIProvider,
  type OpenAIProviderConfig,
  type Participant,
  type ProviderBackend,
  type ProviderConfig,
  type ProviderFactory,
  type ProviderResponse,
  providerFactory,
  toModelMessages,
} from './providers'
// Session - Transcripts, snapshots and cost reporting
export {
  type ConversationSummary,
  type CostTotals,
  DEFAULT_LOG_DIR,
  formatTimestamp,
  type ParticipantStats,
  type SessionArtifacts,
  type SessionIndexEntry,
  type SessionListOptions,
  SessionManager,
  SessionRecorder,
  type SessionRecorderOptions,
  type SessionSnapshot,
  type SessionStatus,
  sessionManager,
  sessionNameFor,
  sessionSnapshotSchema,
  sessionStatusSchema,
  summarize,
  type Utterance,
  utteranceSchema,
} from './session'
// Utils - Logger and utilities
export { createLogger, Logger, logger } from './utils/logger'
