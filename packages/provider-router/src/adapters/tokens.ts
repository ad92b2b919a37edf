/** Approximate tokens per whitespace-separated word */
const TOKENS_PER_WORD = 1.3;

/**
 * Deterministic token estimate for backends that omit usage.
 */
export function estimateTokens(text: string): number {
  const words = text.split(/\s+/).filter((w) => w !== "").length;
  return Math.floor(words * TOKENS_PER_WORD);
}
