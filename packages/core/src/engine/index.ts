/**
 * Engine Module
 *
 * Conversation orchestration: speaker scheduling, context windows and the turn loop.
 */

export { ContextBuilder, type ContextBuilderOptions, DEFAULT_CONTEXT_WINDOW, TOPIC_LABEL } from './context'
export { ConversationEngine, DEFAULT_ENGINE_CONFIG, sleep } from './ConversationEngine'
export { TurnScheduler } from './scheduler'
export type {
  BudgetWarningEvent,
  ConversationEngineConfig,
  ConversationEngineDeps,
  ConversationEvent,
  ConversationOptions,
  ConversationResult,
  EngineState,
  SessionEndEvent,
  SessionStartEvent,
  TerminationReason,
  TurnEndEvent,
  TurnFailedEvent,
  TurnStartEvent,
} from './types'
