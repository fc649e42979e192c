import { AISDKBackend } from '../ai-sdk'
import { BaseProvider } from '../BaseProvider'
import type { ProviderConfig } from '../types'

export interface GeminiProviderConfig extends ProviderConfig {
  model?: 'gemini-2.0-flash-exp' | 'gemini-2.0-flash' | 'gemini-2.5-flash' | string
}

/**
 * Google Gemini participant. Runs on the free tier by default, so its rates are zero.
 */
export class GeminiProvider extends BaseProvider {
  readonly name = 'gemini'
  protected readonly backend: AISDKBackend

  constructor(config: GeminiProviderConfig = {}) {
    super({ ...config, apiKey: config.apiKey ?? process.env.GOOGLE_API_KEY ?? process.env.GEMINI_API_KEY })
    this.backend = new AISDKBackend('google', this.config)
  }
}
