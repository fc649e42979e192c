/**
 * ConversationEngine Tests
 */

import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { ConversationEngine, sleep } from '../engine/ConversationEngine'
import type {
  BudgetWarningEvent,
  ConversationEngineConfig,
  ConversationEngineDeps,
  ConversationEvent,
  ConversationResult,
} from '../engine/types'
import { GenerationError, PreconditionError, TokenizationError } from '../errors'
import type { Participant } from '../providers/types'
import { type SessionArtifacts, sessionSnapshotSchema } from '../session/types'
import { failingTokenizer, fixedTokenizer, HangingParticipant, MockParticipant, noSleep, sequence, steppingClock } from './mocks'

const TOPIC = 'urban gardens'

let dir: string
let logDir: string

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'colloquy-engine-'))
  logDir = join(dir, 'logs')
})

afterEach(async () => {
  await rm(dir, { recursive: true, force: true })
})

function createEngine(config: Partial<ConversationEngineConfig> = {}, deps: ConversationEngineDeps = {}) {
  return new ConversationEngine(
    { tokenLimit: 100, interTurnDelayMs: 0, retryBackoffMs: 0, logDir, ...config },
    { tokenizer: fixedTokenizer(20), random: sequence([0]), now: steppingClock(), sleep: noSleep, ...deps },
  )
}

async function collect(
  stream: AsyncGenerator<ConversationEvent, ConversationResult, undefined>,
): Promise<{ events: ConversationEvent[]; result: ConversationResult }> {
  const events: ConversationEvent[] = []
  let next = await stream.next()
  while (!next.done) {
    events.push(next.value)
    next = await stream.next()
  }
  return { events, result: next.value }
}

async function readSnapshot(name: string) {
  return sessionSnapshotSchema.parse(JSON.parse(await readFile(join(logDir, `${name}.json`), 'utf-8')))
}

describe('ConversationEngine', () => {
  describe('constructor', () => {
    test('creates with default config', () => {
      const config = new ConversationEngine().getConfig()

      expect(config.tokenLimit).toBe(50_000)
      expect(config.warningThreshold).toBe(0.9)
      expect(config.contextWindowSize).toBe(10)
      expect(config.interTurnDelayMs).toBe(2000)
      expect(config.logDir).toBe('logs')
    })

    test('merges partial config with defaults', () => {
      const config = new ConversationEngine({ tokenLimit: 500 }).getConfig()

      expect(config.tokenLimit).toBe(500)
      expect(config.retryBackoffMs).toBe(2000)
    })

    test('starts idle', () => {
      expect(new ConversationEngine().state).toBe('idle')
    })
  })

  describe('budget', () => {
    test('stops on the first turn that reaches the limit', async () => {
      const claude = new MockParticipant('claude', ['c1', 'c2'])
      const openai = new MockParticipant('openai', ['o1'])
      const gemini = new MockParticipant('gemini', ['g1'])
      const engine = createEngine()

      const { events, result } = await collect(
        engine.runStreaming({ topic: TOPIC, participants: [claude, openai, gemini], sessionName: 'budget' }),
      )

      expect(result.reason).toBe('budget_exceeded')
      expect(result.status).toBe('completed')
      expect(result.history.map((u) => [u.speaker, u.content])).toEqual([
        ['claude', 'c1'],
        ['openai', 'o1'],
        ['claude', 'c2'],
      ])
      expect(result.summary.totalTokens).toBe(120)
      expect(result.budget.totalTokens).toBe(120)
      expect(result.budget.totalCost).toBeCloseTo(2 * (20 * 3e-6 + 20 * 15e-6) + (20 * 2.5e-6 + 20 * 10e-6), 12)
      expect(result.metadata.participantCount).toBe(3)
      expect(engine.state).toBe('done')

      expect(events.map((e) => e.type)).toEqual([
        'session_start',
        'turn_start',
        'turn_end',
        'turn_start',
        'turn_end',
        'turn_start',
        'turn_end',
        'budget_warning',
        'session_end',
      ])
    })

    test('stops before any turn when the limit is zero', async () => {
      const claude = new MockParticipant('claude')
      const openai = new MockParticipant('openai')

      const result = await createEngine({ tokenLimit: 0 }).run({ topic: TOPIC, participants: [claude, openai] })

      expect(result.reason).toBe('budget_exceeded')
      expect(result.history).toEqual([])
      expect(claude.getCallCount() + openai.getCallCount()).toBe(0)
    })

    test('emits the warning only once', async () => {
      const engine = createEngine({ tokenLimit: 200, warningThreshold: 0.5 })

      const { events } = await collect(
        engine.runStreaming({
          topic: TOPIC,
          participants: [new MockParticipant('claude'), new MockParticipant('openai')],
        }),
      )

      const warnings = events.filter((e): e is BudgetWarningEvent => e.type === 'budget_warning')
      expect(warnings).toHaveLength(1)
      expect(warnings[0]?.budget.totalTokens).toBe(120)
    })
  })

  describe('turns', () => {
    test('gives each speaker the windowed history', async () => {
      const claude = new MockParticipant('claude', ['c1', 'c2'])
      const openai = new MockParticipant('openai', ['o1'])

      await createEngine().run({ topic: TOPIC, participants: [claude, openai] })

      expect(openai.contexts[0]?.speaker).toBe('openai')
      expect(openai.contexts[0]?.messages.slice(1)).toEqual([
        { role: 'assistant', content: TOPIC },
        { role: 'user', content: 'c1' },
      ])
      expect(claude.contexts[1]?.messages.slice(1)).toEqual([
        { role: 'assistant', content: TOPIC },
        { role: 'user', content: 'c1' },
        { role: 'assistant', content: 'o1' },
      ])
    })

    test('never lets the same participant speak twice in a row', async () => {
      const engine = createEngine({ tokenLimit: 1000 }, { random: Math.random })

      const result = await engine.run({
        topic: TOPIC,
        participants: [new MockParticipant('claude'), new MockParticipant('openai'), new MockParticipant('gemini')],
      })

      expect(result.history).toHaveLength(25)
      for (let i = 1; i < result.history.length; i++) {
        expect(result.history[i]?.speaker).not.toBe(result.history[i - 1]?.speaker)
      }
    })

    test('freezes recorded utterances', async () => {
      const result = await createEngine().run({
        topic: TOPIC,
        participants: [new MockParticipant('claude'), new MockParticipant('openai')],
      })

      expect(Object.isFrozen(result.history[0])).toBe(true)
    })

    test('retries after a failed generation without charging it', async () => {
      const claude = new MockParticipant('claude', [new Error('rate limited'), 'c-ok'])
      const openai = new MockParticipant('openai', ['o1'])

      const { events, result } = await collect(
        createEngine({ tokenLimit: 80 }).runStreaming({ topic: TOPIC, participants: [claude, openai] }),
      )

      expect(result.failedTurns).toBe(1)
      expect(result.history.map((u) => u.content)).toEqual(['c-ok', 'o1'])
      expect(result.budget.totalTokens).toBe(80)

      const failed = events.find((e) => e.type === 'turn_failed')
      expect(failed?.type).toBe('turn_failed')
      if (failed?.type === 'turn_failed') {
        expect(failed.turn).toBe(1)
        expect(failed.speaker).toBe('claude')
        expect(failed.error).toBeInstanceOf(GenerationError)
        expect(failed.error.message).toBe('claude failed to generate a response: rate limited')
      }
    })

    test('treats a tokenizer failure like a failed generation', async () => {
      const claude = new MockParticipant('claude', ['c1', 'c2'])
      const openai = new MockParticipant('openai', ['o1'])
      const engine = createEngine({ tokenLimit: 80 }, { tokenizer: failingTokenizer(20, [1]) })

      const { events, result } = await collect(engine.runStreaming({ topic: TOPIC, participants: [claude, openai] }))

      expect(result.failedTurns).toBe(1)
      expect(result.reason).toBe('budget_exceeded')
      expect(result.history.map((u) => u.content)).toEqual(['c2', 'o1'])
      expect(result.budget.totalTokens).toBe(80)

      const failed = events.find((e) => e.type === 'turn_failed')
      expect(failed?.type).toBe('turn_failed')
      if (failed?.type === 'turn_failed') {
        expect(failed.turn).toBe(1)
        expect(failed.speaker).toBe('claude')
        expect(failed.error).toBeInstanceOf(TokenizationError)
        expect(failed.error.message).toBe('Tokenization failed: encoder out of memory')
      }
    })

    test('retries turn 2 after it fails, leaving history and budget alone', async () => {
      const claude = new MockParticipant('claude', ['c1', 'c2'])
      const openai = new MockParticipant('openai', ['o1', 'o2'])
      // Calls 1-2 count turn 1; call 3 is the first count of turn 2
      const engine = createEngine({ tokenLimit: 100 }, { tokenizer: failingTokenizer(20, [3]) })

      const { events, result } = await collect(engine.runStreaming({ topic: TOPIC, participants: [claude, openai] }))

      const steps = events.map((e) =>
        e.type === 'turn_start' || e.type === 'turn_failed' ? `${e.type}:${e.turn}` : e.type,
      )
      expect(steps).toEqual([
        'session_start',
        'turn_start:1',
        'turn_end',
        'turn_start:2',
        'turn_failed:2',
        'turn_start:2',
        'turn_end',
        'turn_start:3',
        'turn_end',
        'budget_warning',
        'session_end',
      ])

      const ends = events.filter((e) => e.type === 'turn_end')
      expect(ends.map((e) => (e.type === 'turn_end' ? e.budget.totalTokens : 0))).toEqual([40, 80, 120])
      expect(ends.map((e) => (e.type === 'turn_end' ? e.turn : 0))).toEqual([1, 2, 3])
      expect(result.failedTurns).toBe(1)
      expect(result.history.map((u) => [u.speaker, u.content])).toEqual([
        ['claude', 'c1'],
        ['openai', 'o2'],
        ['claude', 'c2'],
      ])
    })

    test('backs off after a failure and pauses between turns', async () => {
      const waits: number[] = []
      const engine = createEngine(
        { tokenLimit: 80, interTurnDelayMs: 7, retryBackoffMs: 3 },
        {
          sleep: async (ms) => {
            waits.push(ms)
          },
        },
      )

      await engine.run({
        topic: TOPIC,
        participants: [new MockParticipant('claude', [new Error('boom'), 'ok']), new MockParticipant('openai')],
      })

      expect(waits).toEqual([3, 7])
    })

    test('gives up on a generation that exceeds the timeout', async () => {
      const engine = createEngine({ tokenLimit: 40, generationTimeoutMs: 20 }, { random: sequence([0, 0.99]) })

      const { events, result } = await collect(
        engine.runStreaming({
          topic: TOPIC,
          participants: [new HangingParticipant('claude'), new MockParticipant('openai', ['o1'])],
        }),
      )

      expect(result.failedTurns).toBe(1)
      expect(result.history.map((u) => u.speaker)).toEqual(['openai'])
      const failed = events.find((e) => e.type === 'turn_failed')
      expect(failed?.type === 'turn_failed' && failed.error.message).toBe(
        'claude failed to generate a response: timed out after 20 ms',
      )
    })
  })

  describe('cancellation', () => {
    test('finishes the turn in flight, then stops', async () => {
      const controller = new AbortController()
      const claude: Participant = {
        name: 'claude',
        generate: async () => {
          controller.abort()
          return 'last words'
        },
      }

      const result = await createEngine().run({
        topic: TOPIC,
        participants: [claude, new MockParticipant('openai')],
        signal: controller.signal,
        sessionName: 'cancelled',
      })

      expect(result.reason).toBe('cancelled')
      expect(result.status).toBe('cancelled')
      expect(result.history.map((u) => u.content)).toEqual(['last words'])

      const snapshot = await readSnapshot('cancelled')
      expect(snapshot.status).toBe('cancelled')
      expect(snapshot.messageCount).toBe(1)
    })

    test('runs no turn when already aborted', async () => {
      const controller = new AbortController()
      controller.abort()
      const claude = new MockParticipant('claude')

      const result = await createEngine().run({
        topic: TOPIC,
        participants: [claude, new MockParticipant('openai')],
        signal: controller.signal,
      })

      expect(result.reason).toBe('cancelled')
      expect(result.history).toEqual([])
      expect(claude.getCallCount()).toBe(0)
    })

    test('finalizes when the consumer stops reading', async () => {
      const engine = createEngine({ tokenLimit: 1000 })

      for await (const event of engine.runStreaming({
        topic: TOPIC,
        participants: [new MockParticipant('claude'), new MockParticipant('openai')],
        sessionName: 'abandoned',
      })) {
        if (event.type === 'turn_end') break
      }

      const snapshot = await readSnapshot('abandoned')
      expect(snapshot.status).toBe('cancelled')
      expect(snapshot.messageCount).toBe(1)
      expect(engine.state).toBe('done')
    })

    test('finalizes the session in progress on request', async () => {
      const engine = createEngine({ tokenLimit: 1000 })
      let artifacts: SessionArtifacts | null = null

      for await (const event of engine.runStreaming({
        topic: TOPIC,
        participants: [new MockParticipant('claude'), new MockParticipant('openai')],
        sessionName: 'forced',
      })) {
        if (event.type === 'turn_end') {
          artifacts = await engine.finalizeActive()
          break
        }
      }

      expect(artifacts).toEqual({
        sessionName: 'forced',
        textLog: join(logDir, 'forced.txt'),
        snapshot: join(logDir, 'forced.json'),
      })
      const snapshot = await readSnapshot('forced')
      expect(snapshot.status).toBe('cancelled')
      expect(snapshot.messageCount).toBe(1)
      const transcript = await readFile(join(logDir, 'forced.txt'), 'utf-8')
      expect(transcript.split('=== Conversation session ended:').length).toBe(2)
      expect(await engine.finalizeActive()).toBeNull()
    })
  })

  describe('participants', () => {
    test('rejects fewer than two participants before writing anything', async () => {
      const engine = createEngine()

      await expect(engine.run({ topic: TOPIC, participants: [new MockParticipant('claude')] })).rejects.toThrow(
        PreconditionError,
      )
      expect(await readdir(dir)).toEqual([])
    })

    test('rejects duplicate names', async () => {
      const engine = createEngine()

      await expect(
        engine.run({ topic: TOPIC, participants: [new MockParticipant('claude'), new MockParticipant('claude')] }),
      ).rejects.toThrow('Participant names must be unique')
    })

    test('ends without turns when fewer than two are available', async () => {
      const claude = new MockParticipant('claude')
      const openai = new MockParticipant('openai', ['o1'], false)
      const gemini = new MockParticipant('gemini', ['g1'], new Error('network down'))

      const { events, result } = await collect(
        createEngine().runStreaming({ topic: TOPIC, participants: [claude, openai, gemini], sessionName: 'alone' }),
      )

      expect(result.reason).toBe('insufficient_participants')
      expect(result.status).toBe('failed')
      expect(result.history).toEqual([])
      expect(claude.getCallCount()).toBe(0)
      expect(events.map((e) => e.type)).toEqual(['session_start', 'session_end'])

      const start = events[0]
      expect(start?.type === 'session_start' && start.unavailable).toEqual(['openai', 'gemini'])
      expect((await readSnapshot('alone')).status).toBe('failed')
    })

    test('skips unavailable participants', async () => {
      const openai = new MockParticipant('openai', ['o1'], false)

      const result = await createEngine({ tokenLimit: 120 }).run({
        topic: TOPIC,
        participants: [new MockParticipant('claude'), openai, new MockParticipant('gemini')],
      })

      expect(openai.getCallCount()).toBe(0)
      expect(result.history.map((u) => u.speaker)).toEqual(['claude', 'gemini', 'claude'])
      expect(result.metadata.participantCount).toBe(2)
    })

    test('refuses a second run while one is in progress', async () => {
      const engine = createEngine()
      const options = { topic: TOPIC, participants: [new MockParticipant('claude'), new MockParticipant('openai')] }

      for await (const event of engine.runStreaming(options)) {
        expect(event.type).toBe('session_start')
        await expect(engine.run(options)).rejects.toThrow(PreconditionError)
        break
      }
    })
  })

  describe('failures', () => {
    test('finalizes as failed and rethrows unexpected errors', async () => {
      const engine = createEngine(
        { tokenLimit: 1000, interTurnDelayMs: 5 },
        {
          sleep: async () => {
            throw new Error('clock broke')
          },
        },
      )

      await expect(
        engine.run({
          topic: TOPIC,
          participants: [new MockParticipant('claude'), new MockParticipant('openai')],
          sessionName: 'broken',
        }),
      ).rejects.toThrow('clock broke')

      const snapshot = await readSnapshot('broken')
      expect(snapshot.status).toBe('failed')
      expect(snapshot.messageCount).toBe(1)
      expect(engine.state).toBe('done')
    })

    test('returns to done when the final write fails', async () => {
      const engine = createEngine({ tokenLimit: 40 })
      const participants = [new MockParticipant('claude'), new MockParticipant('openai')]

      const stream = engine.runStreaming({ topic: TOPIC, participants, sessionName: 'lost' })
      await expect(
        (async () => {
          let next = await stream.next()
          while (!next.done) {
            if (next.value.type === 'turn_end') await rm(logDir, { recursive: true })
            next = await stream.next()
          }
        })(),
      ).rejects.toThrow('ENOENT')
      expect(engine.state).toBe('done')

      const result = await engine.run({ topic: TOPIC, participants, sessionName: 'again' })
      expect(result.status).toBe('completed')
      expect(engine.state).toBe('done')
    })
  })

  describe('recording', () => {
    test('writes notes and every turn to the transcript', async () => {
      const result = await createEngine({ tokenLimit: 40 }).run({
        topic: TOPIC,
        participants: [new MockParticipant('claude', ['Hello there']), new MockParticipant('openai')],
        sessionName: 'transcript',
      })

      const transcript = await readFile(result.artifacts.textLog, 'utf-8')
      expect(transcript).toContain(`\nTopic: ${TOPIC}\n`)
      expect(transcript).toContain('\nToken limit: 40\n')
      expect(transcript).toContain('\nParticipants: claude, openai\n')
      expect(transcript).toContain('\nHello there\n\nTokens: 40, Cost: $0.0004\n')
      expect(transcript).toContain('- Status: completed\n- Messages: 1\n')
    })
  })
})

describe('sleep', () => {
  test('returns immediately for zero', async () => {
    await expect(sleep(0)).resolves.toBeUndefined()
  })

  test('returns early once the signal aborts', async () => {
    const controller = new AbortController()
    const started = Date.now()

    const pending = sleep(10_000, controller.signal)
    controller.abort()
    await pending

    expect(Date.now() - started).toBeLessThan(5000)
  })
})
