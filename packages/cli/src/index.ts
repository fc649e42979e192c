#!/usr/bin/env tsx
/**
 * Colloquy CLI
 *
 * Run budget-bounded conversations between AI models from the command line.
 *
 * Usage:
 *   colloquy converse "What makes a city livable?"
 *   colloquy converse "Topic" --participants claude,gemini --token-limit 20000
 *   colloquy session list
 */

import { converse } from './commands/converse'
import { session } from './commands/session'

const HELP = `
Colloquy - Multi-AI Conversation CLI

Usage:
  colloquy <command> [options]

Commands:
  converse [topic]  Run a conversation on the given topic
  session           Browse transcripts and cost totals

Options:
  -h, --help        Show this help message
  -v, --version     Show version

Examples:
  colloquy converse "What makes a city livable?"
  colloquy converse --config colloquy.yaml
  colloquy session list          # List recorded sessions
  colloquy session cost          # Show total cost across sessions
`

async function main() {
  const args = process.argv.slice(2)

  if (args.length === 0 || args[0] === '-h' || args[0] === '--help') {
    console.log(HELP)
    process.exit(0)
  }

  if (args[0] === '-v' || args[0] === '--version') {
    console.log('colloquy v0.1.0')
    process.exit(0)
  }

  const command = args[0]

  switch (command) {
    case 'converse':
      await converse(args.slice(1))
      break
    case 'session':
      await session(args.slice(1))
      break
    default:
      console.error(`Unknown command: ${command}`)
      console.log(HELP)
      process.exit(1)
  }
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : String(error))
  process.exit(1)
})
