/**
 * Example: three models discuss a topic until 5,000 tokens are spent.
 *
 * Usage: ANTHROPIC_API_KEY=... OPENAI_API_KEY=... GOOGLE_API_KEY=... npx tsx packages/core/examples/conversation.ts
 */

import { ClaudeProvider, ConversationEngine, GeminiProvider, OpenAIProvider } from '../src'

async function main() {
  const engine = new ConversationEngine({ tokenLimit: 5_000, interTurnDelayMs: 500 })
  const controller = new AbortController()
  process.once('SIGINT', () => controller.abort())

  for await (const event of engine.runStreaming({
    topic: 'What makes a city livable?',
    participants: [new ClaudeProvider(), new OpenAIProvider(), new GeminiProvider()],
    signal: controller.signal,
  })) {
    switch (event.type) {
      case 'session_start':
        console.log(`Session ${event.sessionName} with ${event.participants.join(', ')}`)
        break
      case 'turn_end':
        console.log(`\n[${event.utterance.speaker}] ${event.utterance.content}`)
        console.log(`  ${event.budget.totalTokens}/${event.budget.tokenLimit} tokens`)
        break
      case 'turn_failed':
        console.log(`\n${event.speaker} failed: ${event.error.message}`)
        break
      case 'session_end':
        console.log(`\nEnded (${event.reason}), transcript at ${event.artifacts.textLog}`)
        break
    }
  }
}

main().catch(console.error)
