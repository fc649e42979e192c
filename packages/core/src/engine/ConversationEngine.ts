/**
 * Conversation Engine
 *
 * Drives a round-robin conversation between participants until the token
 * budget runs out or the caller cancels, recording every turn durably.
 *
 * @packageDocumentation
 * @module engine/ConversationEngine
 */

import { setTimeout as delay } from 'node:timers/promises'
import { BudgetLedger, DEFAULT_RATES, type Tokenizer } from '../budget'
import { GenerationError, isTurnRecoverable, PreconditionError } from '../errors'
import type { ConversationContext, Participant } from '../providers/types'
import { DEFAULT_LOG_DIR, SessionRecorder } from '../session/recorder'
import type { SessionArtifacts, SessionStatus, Utterance } from '../session/types'
import { createLogger } from '../utils/logger'
import { ContextBuilder, DEFAULT_CONTEXT_WINDOW } from './context'
import { TurnScheduler } from './scheduler'
import type {
  ConversationEngineConfig,
  ConversationEngineDeps,
  ConversationEvent,
  ConversationOptions,
  ConversationResult,
  EngineState,
  TerminationReason,
} from './types'

const log = createLogger('engine')

export const DEFAULT_ENGINE_CONFIG: ConversationEngineConfig = {
  tokenLimit: 50_000,
  warningThreshold: 0.9,
  contextWindowSize: DEFAULT_CONTEXT_WINDOW,
  interTurnDelayMs: 2000,
  retryBackoffMs: 2000,
  maxResponseLength: 1000,
  rates: DEFAULT_RATES,
  logDir: DEFAULT_LOG_DIR,
}

/**
 * Wait `ms`, returning early (without throwing) once `signal` aborts.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return
  try {
    await delay(ms, undefined, { signal })
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') return
    throw error
  }
}

function statusFor(reason: TerminationReason): Exclude<SessionStatus, 'running'> {
  switch (reason) {
    case 'cancelled':
      return 'cancelled'
    case 'error':
    case 'insufficient_participants':
      return 'failed'
    default:
      return 'completed'
  }
}

/**
 * Everything one run's turn loop reads and mutates.
 */
interface TurnLoop {
  topic: string
  config: ConversationEngineConfig
  speakers: Map<string, Participant>
  signal?: AbortSignal
  ledger: BudgetLedger
  recorder: SessionRecorder
  scheduler: TurnScheduler
  contextBuilder: ContextBuilder
  history: Utterance[]
  /** Last speaker whose turn was recorded */
  previous: string | null
  failedTurns: number
  warned: boolean
}

/**
 * Multi-participant Conversation Engine
 *
 * Each turn: pick a speaker who did not just speak, give it the last
 * `contextWindowSize` entries of history, record its answer and charge its
 * tokens. A failed generation is logged and retried after a short backoff;
 * it never ends the session. The budget is the only hard stop, checked
 * between turns, so the final total may pass the limit by one turn's usage.
 *
 * The session is finalized on every exit path: budget, cancellation, an
 * unexpected error, or a consumer that stops reading the event stream.
 *
 * @example Basic usage
 * ```typescript
 * const engine = new ConversationEngine({ tokenLimit: 20_000 })
 *
 * const result = await engine.run({
 *   topic: 'What makes a city livable?',
 *   participants: [new ClaudeProvider(), new OpenAIProvider(), new GeminiProvider()],
 * })
 *
 * console.log(result.summary.messageCount, result.artifacts.textLog)
 * ```
 *
 * @example Streaming events
 * ```typescript
 * for await (const event of engine.runStreaming(options)) {
 *   if (event.type === 'turn_end') {
 *     console.log(`${event.utterance.speaker}: ${event.utterance.content}`)
 *   }
 * }
 * ```
 */
export class ConversationEngine {
  private config: ConversationEngineConfig
  private readonly tokenizer?: Tokenizer
  private readonly random: () => number
  private readonly now: () => Date
  private readonly wait: (ms: number, signal?: AbortSignal) => Promise<void>
  private currentState: EngineState = 'idle'
  private active: SessionRecorder | null = null

  constructor(config: Partial<ConversationEngineConfig> = {}, deps: ConversationEngineDeps = {}) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...config }
    this.tokenizer = deps.tokenizer
    this.random = deps.random ?? Math.random
    this.now = deps.now ?? (() => new Date())
    this.wait = deps.sleep ?? sleep
  }

  getConfig(): ConversationEngineConfig {
    return { ...this.config }
  }

  get state(): EngineState {
    return this.currentState
  }

  /**
   * Run a whole conversation and return its result.
   */
  async run(options: ConversationOptions): Promise<ConversationResult> {
    const stream = this.runStreaming(options)
    let next = await stream.next()
    while (!next.done) {
      next = await stream.next()
    }
    return next.value
  }

  /**
   * Run a conversation, yielding an event for each step.
   *
   * @throws PreconditionError before anything is written when fewer than two
   *   participants are given, names collide, or this engine is already running
   */
  async *runStreaming(options: ConversationOptions): AsyncGenerator<ConversationEvent, ConversationResult, undefined> {
    const { topic, participants, signal } = options
    const config: ConversationEngineConfig = { ...this.config, ...options.config }
    this.assertCanStart(participants)

    this.transition('initializing')
    const startTime = this.now().getTime()

    let recorder: SessionRecorder
    try {
      recorder = await SessionRecorder.start({
        dir: config.logDir,
        sessionName: options.sessionName,
        topic,
        now: this.now,
      })
    } catch (error) {
      this.transition('done')
      throw error
    }
    this.active = recorder

    const ledger = new BudgetLedger({
      tokenLimit: config.tokenLimit,
      warningThreshold: config.warningThreshold,
      rates: config.rates,
      tokenizer: this.tokenizer,
    })
    const history: Utterance[] = []
    let reason: TerminationReason
    let failedTurns = 0
    let participantCount = 0
    let settled = false

    try {
      const { available, unavailable } = await this.probe(participants)
      participantCount = available.length

      await recorder.note(`Topic: ${topic}`)
      await recorder.note(`Token limit: ${config.tokenLimit.toLocaleString('en-US')}`)
      await recorder.note(`Participants: ${available.map((p) => p.name).join(', ') || 'none'}`)

      yield {
        type: 'session_start',
        sessionName: recorder.name,
        topic,
        tokenLimit: config.tokenLimit,
        participants: available.map((p) => p.name),
        unavailable: unavailable.map((p) => p.name),
        timestamp: this.now().getTime(),
      }

      if (available.length < 2) {
        log.warn(`At least 2 available participants are required, found ${available.length}`)
        reason = 'insufficient_participants'
      } else {
        this.transition('running')
        const loop: TurnLoop = {
          topic,
          config,
          speakers: new Map(available.map((p) => [p.name, p])),
          signal,
          ledger,
          recorder,
          scheduler: new TurnScheduler(this.random),
          contextBuilder: new ContextBuilder({
            participants: participants.map((p) => p.name),
            windowSize: config.contextWindowSize,
            maxResponseLength: config.maxResponseLength,
          }),
          history,
          previous: null,
          failedTurns: 0,
          warned: false,
        }
        reason = yield* this.converse(loop)
        failedTurns = loop.failedTurns
      }
      settled = true
    } catch (error) {
      settled = true
      this.transition('terminating')
      await this.finalizeAfterFailure(recorder, 'failed')
      this.transition('done')
      throw error
    } finally {
      // Reached without settling only when the consumer stopped iterating
      if (!settled) {
        log.debug('Event stream closed early; finalizing as cancelled')
        this.transition('terminating')
        await this.finalizeAfterFailure(recorder, 'cancelled')
        this.transition('done')
      }
    }

    this.transition('terminating')
    const status = statusFor(reason)
    const summary = recorder.summary()
    const budget = ledger.summary()
    let artifacts: SessionArtifacts
    try {
      artifacts = await recorder.finalize(summary, status)
    } finally {
      this.transition('done')
    }

    const endTime = this.now().getTime()
    log.debug(`Session ${recorder.name} ended`, { reason, turns: history.length, tokens: budget.totalTokens })

    yield {
      type: 'session_end',
      reason,
      status,
      summary,
      budget,
      artifacts,
      timestamp: endTime,
    }

    return {
      sessionName: recorder.name,
      topic,
      reason,
      status,
      history: [...history],
      summary,
      budget,
      artifacts,
      failedTurns,
      metadata: {
        startTime,
        endTime,
        totalDurationMs: endTime - startTime,
        participantCount,
      },
    }
  }

  private async *converse(loop: TurnLoop): AsyncGenerator<ConversationEvent, TerminationReason, undefined> {
    const { topic, config, ledger, recorder, history } = loop
    const names = [...loop.speakers.keys()]

    while (true) {
      if (loop.signal?.aborted) return 'cancelled'
      if (ledger.isExceeded()) return 'budget_exceeded'

      const speaker = loop.scheduler.selectNext(names, loop.previous)
      const participant = loop.speakers.get(speaker)
      if (!participant) {
        throw new PreconditionError(`Scheduler selected unknown participant: ${speaker}`)
      }

      const turn = history.length + 1
      yield { type: 'turn_start', turn, speaker, timestamp: this.now().getTime() }

      const context = loop.contextBuilder.build(history, topic, speaker)
      let utterance: Utterance
      try {
        const response = await this.generate(participant, context, config)
        const usage = ledger.record(speaker, topic, response)
        utterance = Object.freeze({
          speaker,
          content: response,
          timestamp: this.now().toISOString(),
          tokens: usage.tokens,
          cost: usage.cost,
        })
      } catch (error) {
        if (!isTurnRecoverable(error)) throw error

        loop.failedTurns += 1
        log.warn(`Turn ${turn} (${speaker}) failed; continuing`, error)
        yield { type: 'turn_failed', turn, speaker, error, timestamp: this.now().getTime() }
        await this.wait(config.retryBackoffMs, loop.signal)
        continue
      }

      history.push(utterance)
      loop.previous = speaker
      await recorder.append(utterance)

      const budget = ledger.summary()
      yield { type: 'turn_end', turn, utterance, budget, timestamp: this.now().getTime() }

      if (!loop.warned && budget.isWarning) {
        loop.warned = true
        log.warn(
          `Token usage at ${budget.usagePercentage.toFixed(1)}% ` +
            `(${budget.totalTokens}/${budget.tokenLimit}, ${budget.remaining} remaining)`,
        )
        yield { type: 'budget_warning', budget, timestamp: this.now().getTime() }
      }

      if (ledger.isExceeded() || loop.signal?.aborted) continue
      await this.wait(config.interTurnDelayMs, loop.signal)
    }
  }

  /**
   * One generation call, bounded by `generationTimeoutMs` when set.
   * Anything a participant throws comes back as a {@link GenerationError}.
   */
  private async generate(
    participant: Participant,
    context: ConversationContext,
    config: ConversationEngineConfig,
  ): Promise<string> {
    const timeoutMs = config.generationTimeoutMs
    const controller = new AbortController()
    let timer: NodeJS.Timeout | undefined

    try {
      const calls: Promise<string>[] = [
        participant.generate(context, config.maxResponseLength, { signal: controller.signal }),
      ]
      if (timeoutMs && timeoutMs > 0) {
        calls.push(
          new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
              reject(new Error(`timed out after ${timeoutMs} ms`))
              controller.abort()
            }, timeoutMs)
          }),
        )
      }
      return await Promise.race(calls)
    } catch (error) {
      if (error instanceof GenerationError) throw error
      throw new GenerationError(participant.name, error)
    } finally {
      clearTimeout(timer)
    }
  }

  /**
   * Finalize the session in progress as cancelled without waiting for the
   * turn in flight. Meant for a host that is about to exit; the running
   * stream should not be resumed afterwards.
   *
   * @returns the session's artifacts, or `null` when nothing is running
   */
  async finalizeActive(): Promise<SessionArtifacts | null> {
    const recorder = this.active
    if (!recorder) return null
    return recorder.finalize(recorder.summary(), 'cancelled')
  }

  private async probe(participants: Participant[]): Promise<{ available: Participant[]; unavailable: Participant[] }> {
    const available: Participant[] = []
    const unavailable: Participant[] = []

    for (const participant of participants) {
      let ok: boolean
      try {
        ok = participant.isAvailable ? await participant.isAvailable() : true
      } catch (error) {
        log.warn(`Availability check for ${participant.name} failed`, error)
        ok = false
      }
      log.debug(`${participant.name}: ${ok ? 'available' : 'unavailable'}`)
      if (ok) {
        available.push(participant)
      } else {
        unavailable.push(participant)
      }
    }

    return { available, unavailable }
  }

  private assertCanStart(participants: Participant[]): void {
    if (this.currentState !== 'idle' && this.currentState !== 'done') {
      throw new PreconditionError(`Engine is already running (state: ${this.currentState})`)
    }
    if (participants.length < 2) {
      throw new PreconditionError(`At least 2 participants are required, got ${participants.length}`)
    }
    const names = new Set(participants.map((p) => p.name))
    if (names.size !== participants.length) {
      throw new PreconditionError('Participant names must be unique')
    }
  }

  /**
   * Finalize while another error (or an abandoned stream) is already being
   * handled. A failure here is only logged so the first error propagates.
   */
  private async finalizeAfterFailure(recorder: SessionRecorder, status: 'failed' | 'cancelled'): Promise<void> {
    try {
      await recorder.finalize(recorder.summary(), status)
    } catch (error) {
      log.error(`Failed to finalize session ${recorder.name}`, error)
    }
  }

  private transition(next: EngineState): void {
    log.debug(`${this.currentState} -> ${next}`)
    this.currentState = next
    if (next === 'done') this.active = null
  }
}
