import { AISDKBackend } from '../ai-sdk'
import { BaseProvider } from '../BaseProvider'
import type { ProviderConfig } from '../types'

export interface OpenAIProviderConfig extends ProviderConfig {
  model?: 'gpt-4o' | 'gpt-4o-mini' | 'gpt-4.1' | string
}

/**
 * OpenAI (ChatGPT) participant
 */
export class OpenAIProvider extends BaseProvider {
  readonly name = 'openai'
  protected readonly backend: AISDKBackend

  constructor(config: OpenAIProviderConfig = {}) {
    super({ ...config, apiKey: config.apiKey ?? process.env.OPENAI_API_KEY })
    this.backend = new AISDKBackend('openai', this.config)
  }
}
