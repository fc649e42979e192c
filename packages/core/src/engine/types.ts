/**
 * Conversation Engine Types
 *
 * @packageDocumentation
 * @module engine/types
 */

import type { BudgetSummary, RateTable, Tokenizer } from '../budget'
import type { GenerationError, TokenizationError } from '../errors'
import type { Participant } from '../providers/types'
import type { ConversationSummary, SessionArtifacts, SessionStatus, Utterance } from '../session/types'

/**
 * Lifecycle of one engine run.
 *
 * `idle → initializing → running → terminating → done`. A run with fewer than
 * two available participants goes from `initializing` straight to `terminating`.
 */
export type EngineState = 'idle' | 'initializing' | 'running' | 'terminating' | 'done'

/**
 * Why a run stopped.
 *
 * - `budget_exceeded`: total tokens reached the limit (normal end)
 * - `cancelled`: the abort signal fired, or the event stream was abandoned
 * - `insufficient_participants`: fewer than two participants passed the availability probe
 * - `error`: an unexpected error escaped a turn; it is rethrown after finalization
 */
export type TerminationReason = 'budget_exceeded' | 'cancelled' | 'insufficient_participants' | 'error'

export interface ConversationEngineConfig {
  /** Hard token cap for the session */
  tokenLimit: number
  /** Fraction of the cap that triggers the one-time warning (default: 0.9) */
  warningThreshold: number
  /** History entries given to each participant (default: 10) */
  contextWindowSize: number
  /** Pause between turns, in ms (default: 2000) */
  interTurnDelayMs: number
  /** Pause after a failed turn, in ms (default: 2000) */
  retryBackoffMs: number
  /** Length hint forwarded to every generation call (default: 1000) */
  maxResponseLength: number
  /** Abort a single generation call after this many ms (default: no limit) */
  generationTimeoutMs?: number
  /** Per-token rates keyed by participant name */
  rates: RateTable
  /** Directory for transcripts and snapshots */
  logDir: string
}

/**
 * Collaborators the engine would otherwise create itself. Tests swap these.
 */
export interface ConversationEngineDeps {
  tokenizer?: Tokenizer
  /** Random source for speaker selection, in [0, 1) */
  random?: () => number
  now?: () => Date
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
}

/**
 * @example
 * ```typescript
 * const options: ConversationOptions = {
 *   topic: 'What makes a city livable?',
 *   participants: [new ClaudeProvider(), new OpenAIProvider(), new GeminiProvider()],
 *   signal: controller.signal,
 * }
 * ```
 */
export interface ConversationOptions {
  topic: string
  /** At least two, with distinct names */
  participants: Participant[]
  /** Cooperative cancellation, checked at the top of each turn */
  signal?: AbortSignal
  /** Session name; derived from the start time when omitted */
  sessionName?: string
  /** Override engine configuration for this run */
  config?: Partial<ConversationEngineConfig>
}

interface EventBase {
  /** Epoch ms */
  timestamp: number
}

export interface SessionStartEvent extends EventBase {
  type: 'session_start'
  sessionName: string
  topic: string
  tokenLimit: number
  /** Participants that passed the availability probe */
  participants: string[]
  /** Participants that did not */
  unavailable: string[]
}

export interface TurnStartEvent extends EventBase {
  type: 'turn_start'
  /** 1-based number of the turn being attempted */
  turn: number
  speaker: string
}

export interface TurnEndEvent extends EventBase {
  type: 'turn_end'
  turn: number
  utterance: Utterance
  budget: BudgetSummary
}

export interface TurnFailedEvent extends EventBase {
  type: 'turn_failed'
  turn: number
  speaker: string
  error: GenerationError | TokenizationError
}

export interface BudgetWarningEvent extends EventBase {
  type: 'budget_warning'
  budget: BudgetSummary
}

export interface SessionEndEvent extends EventBase {
  type: 'session_end'
  reason: TerminationReason
  status: SessionStatus
  summary: ConversationSummary
  budget: BudgetSummary
  artifacts: SessionArtifacts
}

export type ConversationEvent =
  | SessionStartEvent
  | TurnStartEvent
  | TurnEndEvent
  | TurnFailedEvent
  | BudgetWarningEvent
  | SessionEndEvent

export interface ConversationResult {
  sessionName: string
  topic: string
  reason: TerminationReason
  status: SessionStatus
  history: Utterance[]
  summary: ConversationSummary
  budget: BudgetSummary
  artifacts: SessionArtifacts
  /** Turns that failed and were retried */
  failedTurns: number
  metadata: {
    startTime: number
    endTime: number
    totalDurationMs: number
    participantCount: number
  }
}
