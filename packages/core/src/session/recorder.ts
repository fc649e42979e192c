import { appendFile, mkdir, rename, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { PreconditionError } from '../errors'
import { createLogger } from '../utils/logger'
import type {
  ConversationSummary,
  ParticipantStats,
  SessionArtifacts,
  SessionSnapshot,
  SessionStatus,
  Utterance,
} from './types'

const log = createLogger('recorder')

export const DEFAULT_LOG_DIR = 'logs'

const RULE = '='.repeat(80)
const DIVIDER = '-'.repeat(50)

export interface SessionRecorderOptions {
  /** Log directory, created if missing (default: ./logs) */
  dir?: string
  /** Session name; derived from the start time when omitted */
  sessionName?: string
  /** Conversation topic, stored in the snapshot */
  topic?: string
  /** Clock for markers and the derived name */
  now?: () => Date
}

function pad(value: number): string {
  return value.toString().padStart(2, '0')
}

/**
 * `YYYY-MM-DD HH:MM:SS` in local time.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  )
}

/**
 * `conversation_YYYYMMDD_HHMMSS` in local time.
 */
export function sessionNameFor(date: Date): string {
  return (
    `conversation_${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  )
}

/**
 * Summarize a list of utterances. Pure; used by {@link SessionRecorder.summary}.
 */
export function summarize(sessionName: string, messages: readonly Utterance[]): ConversationSummary {
  const participants: Record<string, ParticipantStats> = {}
  let totalTokens = 0
  let totalCost = 0

  for (const message of messages) {
    const stats = participants[message.speaker] ?? { count: 0, tokens: 0, cost: 0 }
    stats.count += 1
    stats.tokens += message.tokens
    stats.cost += message.cost
    participants[message.speaker] = stats
    totalTokens += message.tokens
    totalCost += message.cost
  }

  const first = messages[0]
  const last = messages[messages.length - 1]
  const durationMinutes =
    first && last && messages.length >= 2 ? (Date.parse(last.timestamp) - Date.parse(first.timestamp)) / 60_000 : 0

  return {
    sessionName,
    messageCount: messages.length,
    totalTokens,
    totalCost,
    durationMinutes,
    startTime: first?.timestamp ?? null,
    endTime: last?.timestamp ?? null,
    participants,
  }
}

function formatUtterance(utterance: Utterance): string {
  return `
[${formatTimestamp(new Date(utterance.timestamp))}] ${utterance.speaker}
${DIVIDER}
${utterance.content}

Tokens: ${utterance.tokens}, Cost: $${utterance.cost.toFixed(4)}
${RULE}

`
}

function formatSummary(summary: ConversationSummary, status: SessionStatus): string {
  return `
Summary:
- Status: ${status}
- Messages: ${summary.messageCount}
- Total tokens: ${summary.totalTokens.toLocaleString('en-US')}
- Total cost: $${summary.totalCost.toFixed(4)}
- Duration: ${summary.durationMinutes.toFixed(1)} min
`
}

/**
 * Durable, append-only recording of one conversation session.
 *
 * Every write is awaited before the call returns, so a crash after
 * {@link append} resolves cannot lose that turn. The JSON snapshot is
 * replaced atomically (temp file + rename).
 *
 * @example
 * ```typescript
 * const recorder = await SessionRecorder.start({ dir: 'logs', topic })
 * await recorder.append(utterance)
 * const artifacts = await recorder.finalize(recorder.summary(), 'completed')
 * ```
 */
export class SessionRecorder {
  private readonly sessionName: string
  private readonly textLogPath: string
  private readonly snapshotPath: string
  private readonly topic?: string
  private readonly now: () => Date
  private readonly startedAt: Date
  private readonly messages: Utterance[] = []
  private status: SessionStatus = 'running'
  private endedAt: Date | null = null
  private finalSummary: ConversationSummary | undefined
  private artifacts: SessionArtifacts | null = null
  private endMarkerWritten = false

  private constructor(dir: string, sessionName: string, topic: string | undefined, now: () => Date) {
    this.sessionName = sessionName
    this.textLogPath = join(dir, `${sessionName}.txt`)
    this.snapshotPath = join(dir, `${sessionName}.json`)
    this.topic = topic
    this.now = now
    this.startedAt = now()
  }

  /**
   * Open a new session: create the directory, write the start marker and an
   * initial snapshot. The transcript is visible before any turn exists.
   */
  static async start(options: SessionRecorderOptions = {}): Promise<SessionRecorder> {
    const dir = options.dir ?? DEFAULT_LOG_DIR
    const now = options.now ?? (() => new Date())
    const sessionName = options.sessionName ?? sessionNameFor(now())

    await mkdir(dir, { recursive: true })

    const recorder = new SessionRecorder(dir, sessionName, options.topic, now)
    await writeFile(
      recorder.textLogPath,
      `=== Conversation session started: ${formatTimestamp(recorder.startedAt)} ===\n`,
      'utf-8',
    )
    await recorder.writeSnapshot()

    log.debug(`Started session ${sessionName}`, { dir })
    return recorder
  }

  get name(): string {
    return this.sessionName
  }

  get paths(): SessionArtifacts {
    return { sessionName: this.sessionName, textLog: this.textLogPath, snapshot: this.snapshotPath }
  }

  get isFinalized(): boolean {
    return this.artifacts !== null
  }

  /**
   * Recorded utterances, oldest first.
   */
  get history(): readonly Utterance[] {
    return this.messages
  }

  /**
   * Write a system note (topic, limits, roster) to the transcript.
   * Notes are not utterances and never count towards the summary.
   */
  async note(text: string): Promise<void> {
    this.assertOpen('note')
    const entry = `
[${formatTimestamp(this.now())}] System
${DIVIDER}
${text}
${RULE}

`
    await appendFile(this.textLogPath, entry, 'utf-8')
  }

  async append(utterance: Utterance): Promise<void> {
    this.assertOpen('append')
    await appendFile(this.textLogPath, formatUtterance(utterance), 'utf-8')
    this.messages.push(utterance)
    await this.writeSnapshot()
  }

  summary(): ConversationSummary {
    return summarize(this.sessionName, this.messages)
  }

  /**
   * Write the end marker and the final snapshot.
   *
   * Runs once. Later calls write nothing and return the same artifacts.
   * After a failed write it may be called again; the end marker is never
   * written twice.
   */
  async finalize(
    summary: ConversationSummary,
    status: Exclude<SessionStatus, 'running'> = 'completed',
  ): Promise<SessionArtifacts> {
    if (this.artifacts) {
      log.debug(`Session ${this.sessionName} already finalized`)
      return this.artifacts
    }

    if (!this.endMarkerWritten) {
      this.endedAt = this.now()
      this.status = status
      this.finalSummary = summary
      await appendFile(
        this.textLogPath,
        `\n=== Conversation session ended: ${formatTimestamp(this.endedAt)} ===\n${formatSummary(summary, status)}`,
        'utf-8',
      )
      this.endMarkerWritten = true
    }
    await this.writeSnapshot()
    const artifacts = this.paths
    this.artifacts = artifacts

    log.debug(`Finalized session ${this.sessionName}`, { status })
    return artifacts
  }

  private assertOpen(operation: string): void {
    if (this.endMarkerWritten) {
      throw new PreconditionError(`Cannot ${operation}: session ${this.sessionName} is already finalized`)
    }
  }

  private async writeSnapshot(): Promise<void> {
    const snapshot: SessionSnapshot = {
      v: 1,
      sessionName: this.sessionName,
      status: this.status,
      ...(this.topic !== undefined && { topic: this.topic }),
      startedAt: this.startedAt.toISOString(),
      endedAt: this.endedAt ? this.endedAt.toISOString() : null,
      messageCount: this.messages.length,
      messages: [...this.messages],
      ...(this.finalSummary && { summary: this.finalSummary }),
    }

    const tempPath = `${this.snapshotPath}.tmp`
    await writeFile(tempPath, JSON.stringify(snapshot, null, 2), 'utf-8')
    await rename(tempPath, this.snapshotPath)
  }
}
