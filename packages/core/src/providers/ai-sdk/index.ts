/**
 * AI SDK Backend
 *
 * Unified backend using Vercel AI SDK for all providers.
 */

import { createAnthropic } from '@ai-sdk/anthropic'
import { createGoogleGenerativeAI } from '@ai-sdk/google'
import { createOpenAI } from '@ai-sdk/openai'
import { generateText, type LanguageModel, type ModelMessage } from 'ai'
import type { ConversationContext, ProviderBackend, ProviderConfig, ProviderResponse } from '../types'

/**
 * Supported AI SDK providers
 */
export type AISDKProviderType = 'anthropic' | 'openai' | 'google'

type ModelFactory = (options: { apiKey?: string; baseURL?: string }) => (modelId: string) => LanguageModel

const PROVIDER_FACTORIES: Record<AISDKProviderType, ModelFactory> = {
  anthropic: (options) => {
    const sdk = createAnthropic(options)
    return (modelId) => sdk(modelId)
  },
  openai: (options) => {
    const sdk = createOpenAI(options)
    return (modelId) => sdk(modelId)
  },
  google: (options) => {
    const sdk = createGoogleGenerativeAI(options)
    return (modelId) => sdk(modelId)
  },
}

export const DEFAULT_MODELS: Record<AISDKProviderType, string> = {
  anthropic: 'claude-3-5-sonnet-20241022',
  openai: 'gpt-4o',
  google: 'gemini-2.0-flash-exp',
}

const DEFAULT_TEMPERATURE = 0.7

/**
 * Split a context into the AI SDK's `system` prompt and message list.
 *
 * System entries are concatenated; everything else keeps its order and role.
 */
export function toModelMessages(context: ConversationContext): { system?: string; messages: ModelMessage[] } {
  const systemParts: string[] = []
  const messages: ModelMessage[] = []

  for (const message of context.messages) {
    switch (message.role) {
      case 'system':
        systemParts.push(message.content)
        break
      case 'user':
        messages.push({ role: 'user', content: message.content })
        break
      case 'assistant':
        messages.push({ role: 'assistant', content: message.content })
        break
    }
  }

  return {
    system: systemParts.length > 0 ? systemParts.join('\n\n') : undefined,
    messages,
  }
}

/**
 * AI SDK Backend Implementation
 */
export class AISDKBackend implements ProviderBackend {
  private providerType: AISDKProviderType
  private sdk: (modelId: string) => LanguageModel

  constructor(providerType: AISDKProviderType, config: ProviderConfig) {
    this.providerType = providerType
    this.sdk = PROVIDER_FACTORIES[providerType]({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
    })
  }

  async execute(
    context: ConversationContext,
    maxLength: number,
    config: ProviderConfig,
    signal?: AbortSignal,
  ): Promise<ProviderResponse> {
    const startTime = Date.now()
    const modelId = config.model || DEFAULT_MODELS[this.providerType]
    const { system, messages } = toModelMessages(context)

    const { text, usage } = await generateText({
      model: this.sdk(modelId),
      system,
      messages,
      maxOutputTokens: maxLength,
      temperature: config.temperature ?? DEFAULT_TEMPERATURE,
      abortSignal: signal,
    })

    return {
      content: text.trim(),
      metadata: {
        model: modelId,
        inputTokens: usage.inputTokens,
        outputTokens: usage.outputTokens,
        totalTokens: usage.totalTokens,
        latencyMs: Date.now() - startTime,
      },
    }
  }
}
