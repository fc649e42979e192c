import { parseArgs } from 'node:util'
import { SessionManager, type SessionStatus, sessionStatusSchema } from '@colloquy/core'

const HELP = `
Usage: colloquy session <subcommand> [options]

Subcommands:
  list              List recorded sessions
  show <name>       Show the transcript of a session
  cost              Show the cost summary across sessions

Options:
  -h, --help        Show this help message
  --json            Output as JSON
  --log-dir <path>  Directory holding the sessions (default: ./logs)
  --status <status> Only list sessions with this status
  --limit <n>       Maximum number of sessions to list (default: 50)

Examples:
  colloquy session list
  colloquy session list --status completed --json
  colloquy session show conversation_20250101_120000
  colloquy session cost
`

const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
}

function formatDate(iso: string): string {
  return new Date(iso).toLocaleString()
}

function formatCost(usd: number): string {
  return `$${usd.toFixed(4)}`
}

function formatTokens(count: number): string {
  if (count < 1000) return count.toString()
  return `${(count / 1000).toFixed(1)}k`
}

function statusColor(status: SessionStatus): string {
  if (status === 'completed') return colors.green
  if (status === 'failed') return colors.red
  return colors.yellow
}

async function listSessions(manager: SessionManager, json: boolean, limit: number, status?: SessionStatus) {
  const sessions = await manager.list({ limit, status })

  if (json) {
    console.log(JSON.stringify(sessions, null, 2))
    return
  }

  if (sessions.length === 0) {
    console.log('No sessions found.')
    return
  }

  console.log(`${colors.bold}Sessions (${sessions.length})${colors.reset}\n`)
  console.log(
    `${'Name'.padEnd(32)} ${'Status'.padEnd(10)} ${'Started'.padEnd(24)} ${'Messages'.padEnd(9)} ${'Tokens'.padEnd(8)} Cost`,
  )
  console.log('-'.repeat(96))

  for (const session of sessions) {
    const status = `${statusColor(session.status)}${session.status.padEnd(10)}${colors.reset}`
    console.log(
      `${session.sessionName.padEnd(32)} ${status} ${formatDate(session.startedAt).padEnd(24)} ` +
        `${String(session.messageCount).padEnd(9)} ${formatTokens(session.totalTokens).padEnd(8)} ` +
        formatCost(session.totalCost),
    )
  }
}

async function showSession(manager: SessionManager, name: string, json: boolean) {
  if (json) {
    const snapshot = await manager.get(name)
    if (!snapshot) {
      console.error(`Session not found: ${name}`)
      process.exit(1)
    }
    console.log(JSON.stringify(snapshot, null, 2))
    return
  }

  const transcript = await manager.getTranscript(name)
  if (transcript === null) {
    console.error(`Session not found: ${name}`)
    process.exit(1)
  }
  console.log(transcript)
}

async function showCost(manager: SessionManager, json: boolean) {
  const totals = await manager.getTotalCost()

  if (json) {
    console.log(JSON.stringify(totals, null, 2))
    return
  }

  console.log(`${colors.bold}Total Cost Summary${colors.reset}`)
  console.log(`  Sessions:      ${totals.sessions}`)
  console.log(`  Messages:      ${totals.messages}`)
  console.log(`  Total tokens:  ${formatTokens(totals.totalTokens)}`)
  console.log(`  Total cost:    ${formatCost(totals.totalCost)}`)

  const participants = Object.entries(totals.participants)
  if (participants.length > 0) {
    console.log()
    console.log(`${colors.bold}By participant${colors.reset}`)
    for (const [name, usage] of participants) {
      console.log(`  ${name.padEnd(14)} ${formatTokens(usage.tokens).padEnd(8)} ${formatCost(usage.cost)}`)
    }
  }
}

export async function session(args: string[]) {
  const { values, positionals } = parseArgs({
    args,
    options: {
      help: { type: 'boolean', short: 'h' },
      json: { type: 'boolean' },
      'log-dir': { type: 'string' },
      status: { type: 'string' },
      limit: { type: 'string' },
    },
    allowPositionals: true,
  })

  if (values.help || positionals.length === 0) {
    console.log(HELP)
    return
  }

  const manager = new SessionManager(values['log-dir'])
  const subcommand = positionals[0]

  switch (subcommand) {
    case 'list': {
      const limit = values.limit ? parseInt(values.limit, 10) : 50
      if (isNaN(limit) || limit < 1) {
        console.error('Error: --limit must be a positive number')
        process.exit(1)
      }
      let status: SessionStatus | undefined
      if (values.status) {
        const parsed = sessionStatusSchema.safeParse(values.status)
        if (!parsed.success) {
          console.error(`Error: --status must be one of ${sessionStatusSchema.options.join(', ')}`)
          process.exit(1)
        }
        status = parsed.data
      }
      await listSessions(manager, !!values.json, limit, status)
      break
    }

    case 'show':
      if (!positionals[1]) {
        console.error('Error: Session name required')
        console.log('Usage: colloquy session show <name>')
        process.exit(1)
      }
      await showSession(manager, positionals[1], !!values.json)
      break

    case 'cost':
      await showCost(manager, !!values.json)
      break

    default:
      console.error(`Unknown subcommand: ${subcommand}`)
      console.log(HELP)
      process.exit(1)
  }
}
