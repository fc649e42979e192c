import { GenerationError } from '../errors'
import { createLogger } from '../utils/logger'
import type { ConversationContext, GenerateOptions, Participant, ProviderBackend, ProviderConfig } from './types'

const log = createLogger('provider')

/**
 * Abstract base class for AI providers
 *
 * Every failure from the backend leaves as a {@link GenerationError}
 * carrying this provider's name, so the engine can treat all backends alike.
 */
export abstract class BaseProvider implements Participant {
  abstract readonly name: string
  protected config: ProviderConfig
  protected abstract readonly backend: ProviderBackend

  constructor(config: ProviderConfig = {}) {
    this.config = config
  }

  async generate(context: ConversationContext, maxLength: number, options: GenerateOptions = {}): Promise<string> {
    try {
      const response = await this.backend.execute(context, maxLength, this.config, options.signal)
      log.debug(`${this.name} responded`, response.metadata)
      return response.content
    } catch (error) {
      throw new GenerationError(this.name, error)
    }
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.config.apiKey)
  }

  get model(): string | undefined {
    return this.config.model
  }
}
