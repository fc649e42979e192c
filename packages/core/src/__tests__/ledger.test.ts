/**
 * BudgetLedger Tests
 */

import { describe, expect, test } from 'vitest'
import { BudgetLedger, cl100kTokenizer, DEFAULT_RATES, estimateCost, findRate, wordTokenizer } from '../budget'
import { TokenizationError } from '../errors'
import { fixedTokenizer } from './mocks'

describe('BudgetLedger', () => {
  describe('record', () => {
    test('charges input and output tokens to the participant', () => {
      const ledger = new BudgetLedger({ tokenLimit: 100, tokenizer: fixedTokenizer(20) })

      const usage = ledger.record('claude', 'topic', 'response')

      expect(usage.tokens).toBe(40)
      expect(usage.cost).toBeCloseTo(20 * 3e-6 + 20 * 15e-6, 12)
      expect(ledger.tokens).toBe(40)
      expect(ledger.summary().participants.claude).toEqual({
        inputTokens: 20,
        outputTokens: 20,
        totalTokens: 40,
        cost: usage.cost,
      })
    })

    test('accumulates across participants', () => {
      const ledger = new BudgetLedger({ tokenLimit: 1000, tokenizer: fixedTokenizer(10) })

      ledger.record('claude', 'a', 'b')
      ledger.record('gemini', 'a', 'b')
      ledger.record('claude', 'a', 'b')

      const summary = ledger.summary()
      expect(summary.totalTokens).toBe(60)
      expect(summary.participants.claude?.totalTokens).toBe(40)
      expect(summary.participants.gemini?.totalTokens).toBe(20)
      expect(summary.participants.gemini?.cost).toBe(0)
    })

    test('charges nothing for participants without a rate', () => {
      const ledger = new BudgetLedger({ tokenLimit: 100, tokenizer: fixedTokenizer(5) })

      const usage = ledger.record('mistral', 'a', 'b')

      expect(usage).toEqual({ tokens: 10, cost: 0 })
    })

    test('leaves the ledger untouched when counting fails', () => {
      let calls = 0
      const ledger = new BudgetLedger({
        tokenLimit: 100,
        tokenizer: {
          count: () => {
            calls++
            if (calls === 2) throw new Error('bad input')
            return 7
          },
        },
      })

      expect(() => ledger.record('claude', 'topic', 'response')).toThrow(TokenizationError)
      expect(ledger.tokens).toBe(0)
      expect(ledger.cost).toBe(0)
      expect(ledger.summary().participants).toEqual({})
    })
  })

  describe('limits', () => {
    test('is exceeded once total tokens reach the limit', () => {
      const ledger = new BudgetLedger({ tokenLimit: 100, tokenizer: fixedTokenizer(20) })

      ledger.record('claude', 'a', 'b')
      ledger.record('openai', 'a', 'b')
      expect(ledger.isExceeded()).toBe(false)
      expect(ledger.remaining()).toBe(20)

      ledger.record('gemini', 'a', 'b')
      expect(ledger.isExceeded()).toBe(true)
      expect(ledger.remaining()).toBe(0)
      expect(ledger.usagePercentage()).toBe(120)
    })

    test('warns at the threshold', () => {
      const ledger = new BudgetLedger({ tokenLimit: 100, tokenizer: fixedTokenizer(40) })

      ledger.record('claude', 'a', 'b')
      expect(ledger.isWarning()).toBe(false)

      const exact = new BudgetLedger({ tokenLimit: 100, tokenizer: fixedTokenizer(45) })
      exact.record('claude', 'a', 'b')
      expect(exact.isWarning()).toBe(true)
    })

    test('honors a custom warning threshold', () => {
      const ledger = new BudgetLedger({ tokenLimit: 100, warningThreshold: 0.5, tokenizer: fixedTokenizer(25) })

      ledger.record('claude', 'a', 'b')

      expect(ledger.isWarning()).toBe(true)
    })

    test('a zero limit is exceeded before any turn and never warns', () => {
      const ledger = new BudgetLedger({ tokenLimit: 0, tokenizer: fixedTokenizer(1) })

      expect(ledger.isExceeded()).toBe(true)
      expect(ledger.isWarning()).toBe(false)
      expect(ledger.usagePercentage()).toBe(0)
    })
  })

  describe('summary', () => {
    test('returns a detached copy', () => {
      const ledger = new BudgetLedger({ tokenLimit: 100, tokenizer: fixedTokenizer(10) })
      ledger.record('claude', 'a', 'b')

      const summary = ledger.summary()
      summary.totalTokens = 999
      delete summary.participants.claude

      expect(ledger.summary().totalTokens).toBe(20)
      expect(ledger.summary().participants.claude?.totalTokens).toBe(20)
    })

    test('reports the limit and derived flags', () => {
      const ledger = new BudgetLedger({ tokenLimit: 50, tokenizer: fixedTokenizer(10) })
      ledger.record('openai', 'a', 'b')

      const summary = ledger.summary()
      expect(summary.tokenLimit).toBe(50)
      expect(summary.usagePercentage).toBe(40)
      expect(summary.remaining).toBe(30)
      expect(summary.isWarning).toBe(false)
      expect(summary.isExceeded).toBe(false)
    })
  })
})

describe('pricing', () => {
  test('findRate matches names case-insensitively', () => {
    expect(findRate('Claude')).toBe(DEFAULT_RATES.claude)
  })

  test('findRate falls back to free', () => {
    expect(findRate('unknown')).toEqual({ input: 0, output: 0 })
  })

  test('estimateCost uses custom rates', () => {
    const rates = { local: { input: 0.5, output: 1 } }
    expect(estimateCost('local', 4, 2, rates)).toBe(4)
  })
})

describe('tokenizers', () => {
  test('cl100k counts BPE tokens', () => {
    expect(cl100kTokenizer.count('hello world')).toBe(2)
    expect(cl100kTokenizer.count('')).toBe(0)
  })

  test('wordTokenizer counts whitespace-separated words', () => {
    expect(wordTokenizer.count('  one two\tthree\n')).toBe(3)
    expect(wordTokenizer.count('   ')).toBe(0)
  })
})
