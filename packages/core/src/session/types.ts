/**
 * Session recording types
 *
 * Each conversation is one session, persisted as two artifacts in the log
 * directory:
 *
 * - `<name>.txt`: human-readable, append-only transcript (safe to `tail -f`)
 * - `<name>.json`: consolidated snapshot, rewritten after every turn
 */

import { z } from 'zod'

// =============================================================================
// Utterances
// =============================================================================

export const utteranceSchema = z.object({
  speaker: z.string(),
  content: z.string(),
  /** ISO8601 timestamp */
  timestamp: z.string(),
  tokens: z.number().int().nonnegative(),
  cost: z.number().nonnegative(),
})

/**
 * One recorded turn. Frozen once it enters the history.
 */
export type Utterance = Readonly<z.infer<typeof utteranceSchema>>

// =============================================================================
// Summary
// =============================================================================

export const participantStatsSchema = z.object({
  count: z.number(),
  tokens: z.number(),
  cost: z.number(),
})

export type ParticipantStats = z.infer<typeof participantStatsSchema>

export const conversationSummarySchema = z.object({
  sessionName: z.string(),
  messageCount: z.number(),
  totalTokens: z.number(),
  totalCost: z.number(),
  /** Minutes between the first and last utterance; 0 with fewer than two */
  durationMinutes: z.number(),
  /** Timestamp of the first utterance */
  startTime: z.string().nullable(),
  /** Timestamp of the last utterance */
  endTime: z.string().nullable(),
  participants: z.record(participantStatsSchema),
})

export type ConversationSummary = z.infer<typeof conversationSummarySchema>

// =============================================================================
// Snapshot
// =============================================================================

export const sessionStatusSchema = z.enum(['running', 'completed', 'cancelled', 'failed'])

export type SessionStatus = z.infer<typeof sessionStatusSchema>

export const sessionSnapshotSchema = z.object({
  /** Schema version */
  v: z.literal(1),
  sessionName: z.string(),
  status: sessionStatusSchema,
  topic: z.string().optional(),
  /** ISO8601, when the recorder started */
  startedAt: z.string(),
  /** ISO8601, set once by finalize */
  endedAt: z.string().nullable(),
  messageCount: z.number(),
  messages: z.array(utteranceSchema),
  summary: conversationSummarySchema.optional(),
})

export type SessionSnapshot = z.infer<typeof sessionSnapshotSchema>

// =============================================================================
// Artifacts
// =============================================================================

export interface SessionArtifacts {
  sessionName: string
  /** Append-only transcript */
  textLog: string
  /** Consolidated JSON snapshot */
  snapshot: string
}
