import { encode } from 'gpt-tokenizer';

/**
 * Count tokens with the GPT tokenizer.
 * Falls back to a character-based estimate if tokenization fails.
 */
export function countTokens(text: string): number {
  if (!text) return 0;

  try {
    return encode(text).length;
  } catch {
    // ~4 characters per token
    return Math.max(1, Math.round(text.length / 4));
  }
}
