import { readdir, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { createLogger } from '../utils/logger'
import { DEFAULT_LOG_DIR } from './recorder'
import { type SessionSnapshot, type SessionStatus, sessionSnapshotSchema } from './types'

const log = createLogger('sessions')

export interface SessionListOptions {
  limit?: number
  offset?: number
  status?: SessionStatus
}

export interface SessionIndexEntry {
  sessionName: string
  status: SessionStatus
  topic?: string
  startedAt: string
  endedAt: string | null
  messageCount: number
  totalTokens: number
  totalCost: number
}

export interface CostTotals {
  sessions: number
  messages: number
  totalTokens: number
  totalCost: number
  participants: Record<string, { tokens: number; cost: number }>
}

function toIndexEntry(snapshot: SessionSnapshot): SessionIndexEntry {
  const totals = snapshot.summary ?? {
    totalTokens: snapshot.messages.reduce((sum, m) => sum + m.tokens, 0),
    totalCost: snapshot.messages.reduce((sum, m) => sum + m.cost, 0),
  }
  return {
    sessionName: snapshot.sessionName,
    status: snapshot.status,
    ...(snapshot.topic !== undefined && { topic: snapshot.topic }),
    startedAt: snapshot.startedAt,
    endedAt: snapshot.endedAt,
    messageCount: snapshot.messageCount,
    totalTokens: totals.totalTokens,
    totalCost: totals.totalCost,
  }
}

/**
 * Read side over a log directory written by {@link SessionRecorder}.
 */
export class SessionManager {
  private sessionsDir: string

  constructor(sessionsDir?: string) {
    this.sessionsDir = sessionsDir || process.env.COLLOQUY_LOG_DIR || DEFAULT_LOG_DIR
  }

  get dir(): string {
    return this.sessionsDir
  }

  /**
   * Sessions newest first. Unreadable or foreign JSON files are skipped.
   */
  async list(options: SessionListOptions = {}): Promise<SessionIndexEntry[]> {
    const { limit = 50, offset = 0, status } = options

    let names: string[]
    try {
      names = await readdir(this.sessionsDir)
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return []
      }
      throw error
    }

    const snapshots: SessionSnapshot[] = []
    for (const name of names) {
      if (!name.endsWith('.json')) continue
      const snapshot = await this.get(name.slice(0, -'.json'.length))
      if (!snapshot) continue
      if (status && snapshot.status !== status) continue
      snapshots.push(snapshot)
    }

    return snapshots
      .sort((a, b) => b.startedAt.localeCompare(a.startedAt))
      .slice(offset, offset + limit)
      .map(toIndexEntry)
  }

  async get(sessionName: string): Promise<SessionSnapshot | null> {
    const snapshotPath = join(this.sessionsDir, `${sessionName}.json`)

    let content: string
    try {
      content = await readFile(snapshotPath, 'utf-8')
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null
      }
      throw error
    }

    let raw: unknown
    try {
      raw = JSON.parse(content)
    } catch (error) {
      log.debug(`Skipping ${snapshotPath}: not valid JSON`, String(error))
      return null
    }

    const parsed = sessionSnapshotSchema.safeParse(raw)
    if (!parsed.success) {
      log.debug(`Skipping ${snapshotPath}: not a session snapshot`)
      return null
    }
    return parsed.data
  }

  async getTranscript(sessionName: string): Promise<string | null> {
    try {
      return await readFile(join(this.sessionsDir, `${sessionName}.txt`), 'utf-8')
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null
      }
      throw error
    }
  }

  async getTotalCost(): Promise<CostTotals> {
    const sessions = await this.list({ limit: Number.MAX_SAFE_INTEGER })
    const totals: CostTotals = { sessions: 0, messages: 0, totalTokens: 0, totalCost: 0, participants: {} }

    for (const entry of sessions) {
      const snapshot = await this.get(entry.sessionName)
      if (!snapshot) continue

      totals.sessions += 1
      totals.messages += snapshot.messageCount
      for (const message of snapshot.messages) {
        totals.totalTokens += message.tokens
        totals.totalCost += message.cost
        const participant = totals.participants[message.speaker] ?? { tokens: 0, cost: 0 }
        participant.tokens += message.tokens
        participant.cost += message.cost
        totals.participants[message.speaker] = participant
      }
    }

    return totals
  }
}

export const sessionManager = new SessionManager()
