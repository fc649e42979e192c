/**
 * Provider Types
 *
 * Defines the generation capability every conversation participant exposes.
 * The engine depends only on {@link Participant}; concrete backends
 * (Anthropic, OpenAI, Google via the Vercel AI SDK) sit behind it.
 *
 * @packageDocumentation
 * @module providers/types
 */

/**
 * One role-tagged entry in a participant's context.
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant'
  content: string
}

/**
 * Bounded, role-tagged context handed to a participant for its next turn.
 *
 * @example
 * ```typescript
 * const context: ConversationContext = {
 *   speaker: 'claude',
 *   messages: [
 *     { role: 'system', content: 'You are talking with other AIs...' },
 *     { role: 'assistant', content: 'Topic: the future of cities' },
 *   ],
 * }
 * ```
 */
export interface ConversationContext {
  /** Participant the context was built for */
  speaker: string
  /** System entry first, then at most `contextWindowSize` history entries */
  messages: ChatMessage[]
}

/**
 * Per-call options passed alongside the context.
 */
export interface GenerateOptions {
  /** Aborts this call only (used for the optional per-call timeout) */
  signal?: AbortSignal
}

/**
 * Core participant interface.
 *
 * @example Implementing a custom participant
 * ```typescript
 * class EchoParticipant implements Participant {
 *   readonly name = 'echo'
 *
 *   async generate(context: ConversationContext): Promise<string> {
 *     return context.messages.at(-1)?.content ?? ''
 *   }
 * }
 * ```
 */
export interface Participant {
  /** Unique identity within a session */
  readonly name: string
  /**
   * Generate the next utterance.
   * @param maxLength - Upper bound on the response length, forwarded to the backend
   * @throws GenerationError when the backend fails
   */
  generate(context: ConversationContext, maxLength: number, options?: GenerateOptions): Promise<string>
  /**
   * Whether this participant can take part (credentials present, backend reachable).
   * Participants without this method are treated as available.
   */
  isAvailable?(): Promise<boolean>
}

/**
 * Response from a generation backend.
 */
export interface ProviderResponse {
  /** The generated text */
  content: string
  /** Usage reported by the backend, logged in debug mode */
  metadata?: {
    model?: string
    inputTokens?: number
    outputTokens?: number
    totalTokens?: number
    latencyMs?: number
  }
}

/**
 * Configuration for a concrete provider.
 *
 * @example
 * ```typescript
 * const config: ProviderConfig = {
 *   apiKey: process.env.ANTHROPIC_API_KEY,
 *   model: 'claude-3-5-sonnet-20241022',
 * }
 * ```
 */
export interface ProviderConfig {
  /** API key for direct API calls */
  apiKey?: string
  /** Model to use (provider-specific) */
  model?: string
  /** Base URL for API (for self-hosted or proxy) */
  baseUrl?: string
  /** Sampling temperature (default: 0.7) */
  temperature?: number
}

/**
 * Backend that turns a context into text.
 */
export interface ProviderBackend {
  execute(
    context: ConversationContext,
    maxLength: number,
    config: ProviderConfig,
    signal?: AbortSignal,
  ): Promise<ProviderResponse>
}

/**
 * Factory for creating provider instances by name.
 */
export interface ProviderFactory {
  create(name: string, config?: ProviderConfig): Participant
  register(name: string, provider: new (config?: ProviderConfig) => Participant): void
  list(): string[]
}
