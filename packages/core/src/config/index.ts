/**
 * Config Module
 *
 * Configuration loading and management.
 */

export {
  API_KEY_ENV,
  canonicalParticipant,
  configSchema,
  getDefaultConfig,
  loadConfig,
  loadConfigFromEnv,
  loadConfigFromFile,
  mergeConfig,
  missingApiKeys,
  PARTICIPANT_ALIASES,
  validateConfig,
} from './loader'
export type {
  ColloquyConfig,
  ColloquyConfigInput,
  ConfigLoaderOptions,
  ParticipantName,
  ProviderSettings,
} from './types'
export { DEFAULT_CONFIG, DEFAULT_TOPIC, toEngineConfig } from './types'
