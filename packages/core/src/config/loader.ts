/**
 * Configuration Loader
 *
 * Loads configuration from YAML files and environment variables, merges it
 * over the defaults and validates the result. Keys may be camelCase or
 * snake_case in files.
 */

import { readFile } from 'node:fs/promises'
import { parse } from 'yaml'
import { z } from 'zod'
import { ConfigError } from '../errors'
import type { ColloquyConfig, ColloquyConfigInput, ConfigLoaderOptions, ProviderSettings } from './types'
import { DEFAULT_CONFIG } from './types'

const rateSchema = z.object({
  input: z.number().nonnegative(),
  output: z.number().nonnegative(),
})

const providerSettingsSchema = z.object({
  apiKey: z.string().optional(),
  model: z.string().optional(),
  baseUrl: z.string().url().optional(),
  temperature: z.number().min(0).max(2).optional(),
})

const budgetSchema = z.object({
  tokenLimit: z.number().int().positive(),
  warningThreshold: z.number().gt(0).max(1),
})

const conversationSchema = z.object({
  contextWindowSize: z.number().int().min(1),
  interTurnDelayMs: z.number().nonnegative(),
  retryBackoffMs: z.number().nonnegative(),
  maxResponseLength: z.number().int().positive(),
  generationTimeoutMs: z.number().int().positive().optional(),
})

const sessionSchema = z.object({
  dir: z.string().min(1),
})

const participantsSchema = z
  .array(z.string().min(1))
  .min(2, 'at least 2 participants are required')
  .refine((names) => new Set(names).size === names.length, 'participants must be distinct')

export const configSchema = z.object({
  topic: z.string().trim().min(1),
  participants: participantsSchema,
  budget: budgetSchema,
  conversation: conversationSchema,
  rates: z.record(rateSchema),
  providers: z.record(providerSettingsSchema),
  session: sessionSchema,
})

const configInputSchema = z.object({
  topic: z.string().optional(),
  participants: z.array(z.string()).optional(),
  budget: budgetSchema.partial().optional(),
  conversation: conversationSchema.partial().optional(),
  rates: z.record(rateSchema).optional(),
  providers: z.record(providerSettingsSchema).optional(),
  session: sessionSchema.partial().optional(),
})

/** Env var holding each built-in participant's API key */
export const API_KEY_ENV: Record<string, string> = {
  claude: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
  gemini: 'GOOGLE_API_KEY',
}

/** Alternative names accepted for the built-in participants */
export const PARTICIPANT_ALIASES: Record<string, string> = {
  anthropic: 'claude',
  chatgpt: 'openai',
  google: 'gemini',
}

/**
 * Lowercase a participant name and resolve aliases (`chatgpt` → `openai`).
 */
export function canonicalParticipant(name: string): string {
  const lower = name.trim().toLowerCase()
  return PARTICIPANT_ALIASES[lower] ?? lower
}

function canonicalKeys<T extends object>(entries: Record<string, T>): Record<string, T> {
  const result: Record<string, T> = {}
  for (const [name, value] of Object.entries(entries)) {
    const key = canonicalParticipant(name)
    const existing = result[key]
    result[key] = existing ? { ...existing, ...value } : value
  }
  return result
}

/**
 * Resolve participant aliases everywhere a participant is named, so settings
 * and rates line up with the provider that ends up speaking.
 */
function canonicalize(input: ColloquyConfigInput): ColloquyConfigInput {
  return {
    ...input,
    ...(input.participants && { participants: input.participants.map(canonicalParticipant) }),
    ...(input.providers && { providers: canonicalKeys(input.providers) }),
    ...(input.rates && { rates: canonicalKeys(input.rates) }),
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
}

function camelize(key: string): string {
  return key.replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase())
}

/**
 * snake_case → camelCase, recursively. Keys naming participants (directly
 * under `rates` and `providers`) are left as written.
 */
function normalizeKeys(value: unknown, preserveOwnKeys = false): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => normalizeKeys(item))
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {}
    for (const [rawKey, child] of Object.entries(value)) {
      const key = preserveOwnKeys ? rawKey : camelize(rawKey)
      result[key] = normalizeKeys(child, !preserveOwnKeys && (key === 'rates' || key === 'providers'))
    }
    return result
  }
  return value
}

function parseInput(raw: unknown, source: string): ColloquyConfigInput {
  const result = configInputSchema.safeParse(normalizeKeys(raw ?? {}))
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${source}`, formatIssues(result.error))
  }
  return canonicalize(result.data)
}

/**
 * Load configuration from a YAML file
 */
export async function loadConfigFromFile(path: string): Promise<ColloquyConfigInput> {
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${path}`)
    }
    throw error
  }

  let raw: unknown
  try {
    raw = parse(content)
  } catch (error) {
    throw new ConfigError(`Failed to parse ${path}: ${error instanceof Error ? error.message : String(error)}`)
  }

  return parseInput(raw, path)
}

function settings(entries: ProviderSettings): ProviderSettings | undefined {
  const result: ProviderSettings = {}
  if (entries.apiKey) result.apiKey = entries.apiKey
  if (entries.model) result.model = entries.model
  if (entries.baseUrl) result.baseUrl = entries.baseUrl
  return Object.keys(result).length > 0 ? result : undefined
}

/**
 * Load settings from environment variables
 */
export function loadConfigFromEnv(env: Record<string, string | undefined> = process.env): ColloquyConfigInput {
  const config: ColloquyConfigInput = {}
  const providers: Record<string, ProviderSettings> = {}

  const claude = settings({ apiKey: env.ANTHROPIC_API_KEY, model: env.CLAUDE_MODEL, baseUrl: env.ANTHROPIC_BASE_URL })
  if (claude) providers.claude = claude

  const openai = settings({ apiKey: env.OPENAI_API_KEY, model: env.OPENAI_MODEL, baseUrl: env.OPENAI_BASE_URL })
  if (openai) providers.openai = openai

  const gemini = settings({ apiKey: env.GOOGLE_API_KEY || env.GEMINI_API_KEY, model: env.GEMINI_MODEL })
  if (gemini) providers.gemini = gemini

  if (Object.keys(providers).length > 0) {
    config.providers = providers
  }

  if (env.DEFAULT_TOKEN_LIMIT) {
    const tokenLimit = Number(env.DEFAULT_TOKEN_LIMIT)
    if (!Number.isInteger(tokenLimit)) {
      throw new ConfigError(`DEFAULT_TOKEN_LIMIT must be an integer, got "${env.DEFAULT_TOKEN_LIMIT}"`)
    }
    config.budget = { tokenLimit }
  }

  if (env.DEFAULT_THEME) {
    config.topic = env.DEFAULT_THEME
  }

  if (env.COLLOQUY_LOG_DIR) {
    config.session = { dir: env.COLLOQUY_LOG_DIR }
  }

  return config
}

/**
 * Deep merge a partial configuration over a complete one
 */
export function mergeConfig(base: ColloquyConfig, override: ColloquyConfigInput): ColloquyConfig {
  const providers: Record<string, ProviderSettings> = { ...base.providers }
  for (const [name, value] of Object.entries(override.providers ?? {})) {
    providers[name] = { ...providers[name], ...value }
  }

  return {
    topic: override.topic ?? base.topic,
    participants: [...(override.participants ?? base.participants)],
    budget: { ...base.budget, ...override.budget },
    conversation: { ...base.conversation, ...override.conversation },
    rates: { ...base.rates, ...override.rates },
    providers,
    session: { ...base.session, ...override.session },
  }
}

/**
 * @throws ConfigError listing every invalid field
 */
export function validateConfig(config: ColloquyConfig): ColloquyConfig {
  const result = configSchema.safeParse(config)
  if (!result.success) {
    throw new ConfigError('Invalid configuration', formatIssues(result.error))
  }
  return result.data
}

/**
 * Load configuration: defaults, then file, then environment, then overrides.
 */
export async function loadConfig(options: ConfigLoaderOptions = {}): Promise<ColloquyConfig> {
  let config: ColloquyConfig = getDefaultConfig()

  if (options.path) {
    config = mergeConfig(config, await loadConfigFromFile(options.path))
  }

  config = mergeConfig(config, loadConfigFromEnv(options.env))

  if (options.overrides) {
    config = mergeConfig(config, parseInput(options.overrides, 'overrides'))
  }

  return validateConfig(config)
}

/**
 * Get default configuration
 */
export function getDefaultConfig(): ColloquyConfig {
  return mergeConfig(DEFAULT_CONFIG, {})
}

/**
 * Env vars a configured participant still needs.
 */
export function missingApiKeys(config: ColloquyConfig): string[] {
  return config.participants
    .filter((name) => !config.providers[name]?.apiKey)
    .map((name) => API_KEY_ENV[name] ?? `${name.toUpperCase()}_API_KEY`)
}
