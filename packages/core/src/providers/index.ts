/**
 * Providers Module
 *
 * Re-exports all provider implementations and types.
 */

export type {
  ChatMessage,
  ConversationContext,
  GenerateOptions,
  Participant,
  ProviderBackend,
  ProviderConfig,
  ProviderFactory,
  ProviderResponse,
} from './types'

export { BaseProvider } from './BaseProvider'

export {
  AISDKBackend,
  type AISDKProviderType,
  DEFAULT_MODELS,
  toModelMessages,
} from './ai-sdk'

export { ClaudeProvider, type ClaudeProviderConfig } from './claude'
export { GeminiProvider, type GeminiProviderConfig } from './gemini'
export { OpenAIProvider, type OpenAIProviderConfig } from './openai'

import { ClaudeProvider } from './claude'
import { GeminiProvider } from './gemini'
import { OpenAIProvider } from './openai'
import type { Participant, ProviderConfig, ProviderFactory } from './types'

const providers = new Map<string, new (config?: ProviderConfig) => Participant>([
  ['claude', ClaudeProvider],
  ['anthropic', ClaudeProvider], // Alias
  ['openai', OpenAIProvider],
  ['chatgpt', OpenAIProvider], // Alias
  ['gemini', GeminiProvider],
  ['google', GeminiProvider], // Alias
])

export const providerFactory: ProviderFactory = {
  create(name: string, config?: ProviderConfig): Participant {
    const ProviderClass = providers.get(name.toLowerCase())
    if (!ProviderClass) {
      throw new Error(`Unknown provider: ${name}. Available: ${[...providers.keys()].join(', ')}`)
    }
    return new ProviderClass(config)
  },

  register(name: string, provider: new (config?: ProviderConfig) => Participant): void {
    providers.set(name.toLowerCase(), provider)
  },

  list(): string[] {
    return [...providers.keys()]
  },
}
