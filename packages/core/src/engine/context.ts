import type { ChatMessage, ConversationContext } from '../providers/types'
import type { Utterance } from '../session/types'

export const DEFAULT_CONTEXT_WINDOW = 10
export const TOPIC_LABEL = 'Topic'

export interface ContextBuilderOptions {
  /** Participant names whose `"name: "` prefix is stripped from history */
  participants: readonly string[]
  /** History entries kept in the window (default: 10) */
  windowSize?: number
  /** Length hint quoted in the etiquette rules */
  maxResponseLength?: number
}

const SYSTEM_PROMPT = (topic: string, maxResponseLength: number) => `You are in a conversation with other AIs.
Current topic: ${topic}

Conversation rules:
1. Keep the conversation natural and interesting
2. Respond to what the other AIs have said
3. Bring in new perspectives or questions instead of repeating earlier points
4. Be concise (within ${maxResponseLength} characters)
5. Let your own personality show
6. Do not include the other AIs' names; respond directly`

/**
 * Converts raw history into the bounded, role-tagged context a participant
 * receives for its next turn.
 *
 * The window is the topic announcement followed by every utterance, trimmed
 * to its last `windowSize` entries. Roles alternate by position in that
 * window (assistant, user, assistant, ...) without regard to who actually
 * spoke: the backends expect a two-party exchange, so with three or more
 * participants a speaker's own earlier turns can appear as `user`.
 */
export class ContextBuilder {
  private readonly labels: Set<string>
  private readonly windowSize: number
  private readonly maxResponseLength: number

  constructor(options: ContextBuilderOptions) {
    this.labels = new Set([...options.participants, TOPIC_LABEL])
    this.windowSize = Math.max(0, options.windowSize ?? DEFAULT_CONTEXT_WINDOW)
    this.maxResponseLength = options.maxResponseLength ?? 1000
  }

  build(history: readonly Utterance[], topic: string, speaker: string): ConversationContext {
    const messages: ChatMessage[] = [{ role: 'system', content: SYSTEM_PROMPT(topic, this.maxResponseLength) }]

    const entries = [`${TOPIC_LABEL}: ${topic}`, ...history.map((utterance) => utterance.content)]
    const window = this.windowSize > 0 ? entries.slice(-this.windowSize) : []

    window.forEach((entry, index) => {
      messages.push({
        role: index % 2 === 0 ? 'assistant' : 'user',
        content: this.stripSpeakerPrefix(entry),
      })
    })

    return { speaker, messages }
  }

  /**
   * Drop a leading `"<label>: "` when the label is a participant name or the
   * topic label. Anything else is left untouched.
   */
  stripSpeakerPrefix(content: string): string {
    const separator = content.indexOf(': ')
    if (separator === -1) return content

    const label = content.slice(0, separator)
    return this.labels.has(label) ? content.slice(separator + 2) : content
  }
}
