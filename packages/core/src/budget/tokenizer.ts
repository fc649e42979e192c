import { get_encoding, type Tiktoken } from '@dqbd/tiktoken'

/**
 * Deterministic token counter used for budget accounting.
 */
export interface Tokenizer {
  count(text: string): number
}

let encoder: Tiktoken | null = null

function getEncoder(): Tiktoken {
  if (!encoder) {
    encoder = get_encoding('cl100k_base')
  }
  return encoder
}

/**
 * `cl100k_base` tokenizer. The encoder is created lazily and shared.
 */
export const cl100kTokenizer: Tokenizer = {
  count(text: string): number {
    return getEncoder().encode(text).length
  },
}

/**
 * Counts whitespace-separated words. Handy where exact BPE counts don't matter.
 */
export const wordTokenizer: Tokenizer = {
  count(text: string): number {
    const trimmed = text.trim()
    return trimmed ? trimmed.split(/\s+/).length : 0
  },
}
