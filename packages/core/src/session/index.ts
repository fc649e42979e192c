export {
  type CostTotals,
  type SessionIndexEntry,
  type SessionListOptions,
  SessionManager,
  sessionManager,
} from './manager'
export {
  DEFAULT_LOG_DIR,
  formatTimestamp,
  SessionRecorder,
  type SessionRecorderOptions,
  sessionNameFor,
  summarize,
} from './recorder'
export type {
  ConversationSummary,
  ParticipantStats,
  SessionArtifacts,
  SessionSnapshot,
  SessionStatus,
  Utterance,
} from './types'
export { sessionSnapshotSchema, sessionStatusSchema, utteranceSchema } from './types'
