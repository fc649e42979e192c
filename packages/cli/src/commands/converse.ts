/**
 * Converse Command
 *
 * Run a budget-bounded conversation between AI participants.
 */

import { readFile, writeFile } from 'node:fs/promises'
import { parseArgs } from 'node:util'
import {
  type ColloquyConfig,
  type ColloquyConfigInput,
  ConversationEngine,
  type ConversationEvent,
  type ConversationResult,
  loadConfig,
  missingApiKeys,
  type Participant,
  providerFactory,
  toEngineConfig,
} from '@colloquy/core'

const HELP = `
Usage: colloquy converse [topic] [options]

Arguments:
  topic                    The topic to discuss (default: DEFAULT_THEME or the config file)

Options:
  -p, --participants <list> Comma-separated participants (default: claude,openai,gemini;
                           aliases: anthropic, chatgpt, google)
  -t, --token-limit <n>    Stop once this many tokens are used (default: 50000)
  -c, --config <path>      YAML configuration file
  -f, --file <path>        Read the topic from a file
  -o, --output <path>      Save the result to a file (JSON)
  --log-dir <path>         Directory for transcripts (default: ./logs)
  --delay <ms>             Pause between turns (default: 2000)
  --max-length <n>         Response length hint in characters (default: 1000)
  -h, --help               Show this help message

Examples:
  colloquy converse "What makes a city livable?"
  colloquy converse "Topic" --participants claude,gemini --token-limit 20000
  colloquy converse --config colloquy.yaml
`

// ANSI colors
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  red: '\x1b[31m',
}

function getProviderColor(name: string): string {
  if (name.startsWith('claude')) return colors.cyan
  if (name.startsWith('openai')) return colors.green
  if (name.startsWith('gemini')) return colors.yellow
  return colors.magenta
}

function parseInteger(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined
  const parsed = Number(value)
  if (!Number.isInteger(parsed)) {
    console.error(`Error: --${flag} must be an integer, got "${value}"`)
    process.exit(1)
  }
  return parsed
}

function createParticipants(config: ColloquyConfig): Participant[] {
  return config.participants.map((name) => providerFactory.create(name, config.providers[name]))
}

function printEvent(event: ConversationEvent): void {
  switch (event.type) {
    case 'session_start':
      console.log(`${colors.dim}Session: ${event.sessionName}${colors.reset}`)
      console.log(`\n${colors.bold}📋 Topic:${colors.reset} ${event.topic}`)
      console.log(
        `${colors.dim}Token limit: ${event.tokenLimit.toLocaleString('en-US')} | ` +
          `Participants: ${event.participants.join(', ') || 'none'}${colors.reset}`,
      )
      if (event.unavailable.length > 0) {
        console.log(`${colors.dim}Unavailable: ${event.unavailable.join(', ')}${colors.reset}`)
      }
      console.log(`\n${colors.bold}🚀 Starting conversation...${colors.reset}\n`)
      break

    case 'turn_start':
      process.stdout.write(`${colors.dim}[${event.turn}] ${event.speaker} is thinking...${colors.reset}\r`)
      break

    case 'turn_end': {
      const { utterance, budget } = event
      const color = getProviderColor(utterance.speaker)
      process.stdout.write('\x1b[2K')
      console.log(`${color}${colors.bold}[${utterance.speaker}]${colors.reset} ${utterance.content}`)
      console.log(
        `${colors.dim}Tokens: ${utterance.tokens} | Cost: $${utterance.cost.toFixed(4)} | ` +
          `Total: ${budget.totalTokens.toLocaleString('en-US')}/${budget.tokenLimit.toLocaleString('en-US')} ` +
          `(${budget.usagePercentage.toFixed(1)}%)${colors.reset}\n`,
      )
      break
    }

    case 'turn_failed':
      process.stdout.write('\x1b[2K')
      console.log(`${colors.red}✗ ${event.speaker}: ${event.error.message}${colors.reset}\n`)
      break

    case 'budget_warning':
      console.log(
        `${colors.yellow}⚠ Token usage at ${event.budget.usagePercentage.toFixed(1)}% ` +
          `(${event.budget.remaining.toLocaleString('en-US')} remaining)${colors.reset}\n`,
      )
      break

    case 'session_end':
      break
  }
}

function printResult(result: ConversationResult): void {
  const elapsed = (result.metadata.totalDurationMs / 1000).toFixed(1)

  console.log(`${colors.bold}━━━ Results ━━━${colors.reset}`)
  console.log(`Ended: ${result.reason} | Time: ${elapsed}s | Messages: ${result.summary.messageCount}`)
  console.log(
    `Tokens: ${result.summary.totalTokens.toLocaleString('en-US')} | ` +
      `Cost: $${result.summary.totalCost.toFixed(4)}`,
  )
  if (result.failedTurns > 0) {
    console.log(`Failed turns: ${result.failedTurns}`)
  }

  for (const [name, stats] of Object.entries(result.summary.participants)) {
    const color = getProviderColor(name)
    console.log(
      `  ${color}${name}${colors.reset}: ${stats.count} messages, ` +
        `${stats.tokens.toLocaleString('en-US')} tokens, $${stats.cost.toFixed(4)}`,
    )
  }

  console.log(`\n${colors.dim}Transcript: ${result.artifacts.textLog}${colors.reset}`)
}

export async function converse(args: string[]) {
  const { values, positionals } = parseArgs({
    args,
    options: {
      participants: { type: 'string', short: 'p' },
      'token-limit': { type: 'string', short: 't' },
      config: { type: 'string', short: 'c' },
      file: { type: 'string', short: 'f' },
      output: { type: 'string', short: 'o' },
      'log-dir': { type: 'string' },
      delay: { type: 'string' },
      'max-length': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: true,
  })

  if (values.help) {
    console.log(HELP)
    return
  }

  const overrides: ColloquyConfigInput = {}
  if (values.file) {
    overrides.topic = (await readFile(values.file, 'utf-8')).trim()
  } else if (positionals.length > 0) {
    overrides.topic = positionals.join(' ')
  }
  if (values.participants) {
    overrides.participants = values.participants.split(',').map((p) => p.trim())
  }
  const tokenLimit = parseInteger('token-limit', values['token-limit'])
  if (tokenLimit !== undefined) {
    overrides.budget = { tokenLimit }
  }
  const delay = parseInteger('delay', values.delay)
  const maxLength = parseInteger('max-length', values['max-length'])
  if (delay !== undefined || maxLength !== undefined) {
    overrides.conversation = {
      ...(delay !== undefined && { interTurnDelayMs: delay }),
      ...(maxLength !== undefined && { maxResponseLength: maxLength }),
    }
  }
  if (values['log-dir']) {
    overrides.session = { dir: values['log-dir'] }
  }

  const config = await loadConfig({ path: values.config, overrides })

  const missing = missingApiKeys(config)
  if (missing.length > 0) {
    console.log(`${colors.dim}Missing API keys: ${missing.join(', ')}${colors.reset}`)
  }

  const participants = createParticipants(config)
  const engine = new ConversationEngine(toEngineConfig(config))

  // First Ctrl+C finishes the current turn and ends the session; a second one
  // closes the session as cancelled and exits without waiting for the turn
  const controller = new AbortController()
  const onInterrupt = () => {
    if (controller.signal.aborted) {
      void engine
        .finalizeActive()
        .catch((error: unknown) => {
          const message = error instanceof Error ? error.message : String(error)
          console.error(`${colors.red}Failed to close the session: ${message}${colors.reset}`)
        })
        .finally(() => process.exit(130))
      return
    }
    console.log(`\n${colors.yellow}Stopping after the current turn...${colors.reset}`)
    controller.abort()
  }
  process.on('SIGINT', onInterrupt)

  let result: ConversationResult
  try {
    const stream = engine.runStreaming({ topic: config.topic, participants, signal: controller.signal })
    let next = await stream.next()
    while (!next.done) {
      printEvent(next.value)
      next = await stream.next()
    }
    result = next.value
  } finally {
    process.off('SIGINT', onInterrupt)
  }

  printResult(result)

  if (result.reason === 'insufficient_participants') {
    console.error('\nError: At least 2 available participants are required')
    console.error('Set API keys:')
    console.error('  - Claude: set ANTHROPIC_API_KEY')
    console.error('  - OpenAI: set OPENAI_API_KEY')
    console.error('  - Gemini: set GOOGLE_API_KEY')
    process.exitCode = 1
  }

  if (values.output) {
    await writeFile(values.output, JSON.stringify(result, null, 2), 'utf-8')
    console.log(`\n${colors.green}✓${colors.reset} Results saved to ${values.output}`)
  }
}
