import { AISDKBackend } from '../ai-sdk'
import { BaseProvider } from '../BaseProvider'
import type { ProviderConfig } from '../types'

export interface ClaudeProviderConfig extends ProviderConfig {
  model?: 'claude-3-5-sonnet-20241022' | 'claude-3-5-haiku-20241022' | 'claude-sonnet-4-20250514' | string
}

/**
 * Anthropic Claude participant
 */
export class ClaudeProvider extends BaseProvider {
  readonly name = 'claude'
  protected readonly backend: AISDKBackend

  constructor(config: ClaudeProviderConfig = {}) {
    super({ ...config, apiKey: config.apiKey ?? process.env.ANTHROPIC_API_KEY })
    this.backend = new AISDKBackend('anthropic', this.config)
  }
}
