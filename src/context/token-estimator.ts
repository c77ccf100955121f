/**
 * Token estimator — approximate token counts for chat messages.
 *
 * Uses a simple heuristic: characters / 4 ≈ tokens, plus a fixed overhead
 * per message for role framing and a flat charge per attached image. Precision isn't critical; the context
 * window only needs a consistent estimate to budget against.
 */
import type { ChatMessage } from "../shared/types.js";

const CHARS_PER_TOKEN = 4;

/** Tokens the backend spends on role markers and turn separators. */
export const MESSAGE_OVERHEAD_TOKENS = 4;

/** Flat charge per image; roughly what the backend bills a ~1.15 megapixel image. */
export const IMAGE_TOKENS = 1600;

export type TokenEstimator = (message: ChatMessage) => number;

/**
 * Estimate token count for a string.
 * Simple heuristic: chars / 4.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/** Estimate the tokens one message occupies in the backend's context. */
export const estimateMessageTokens: TokenEstimator = (message) =>
  estimateTokens(message.content) +
  MESSAGE_OVERHEAD_TOKENS +
  (message.images?.length ?? 0) * IMAGE_TOKENS;
