/**
 * Estimate token count from text.
 * Uses the ~4 chars/token heuristic; only used when a provider reports no usage.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
