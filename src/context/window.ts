/**
 * Context window manager — fits a message history into a token budget.
 *
 * Retention is most-recent-first: a leading system message is pinned, then
 * turns are taken newest to oldest while the running total stays within the
 * preferred budget. The newest turn is always kept, so the result is never
 * empty; when it alone overflows, or the window has to reach back to a user
 * turn, `estimatedTokens` exceeds `preferred` (and possibly `maximum`) and
 * callers treat the result as degraded.
 */
import { invalidRequest } from "../errors/index.js";
import type { ChatMessage, TokenBudget, TrimmedContext } from "../shared/types.js";
import { estimateMessageTokens, type TokenEstimator } from "./token-estimator.js";

export function validateBudget(budget: TokenBudget): void {
  if (!Number.isInteger(budget.preferred) || budget.preferred <= 0) {
    throw new RangeError(`Preferred budget must be a positive integer, got ${budget.preferred}`);
  }
  if (!Number.isInteger(budget.maximum) || budget.maximum <= 0) {
    throw new RangeError(`Maximum budget must be a positive integer, got ${budget.maximum}`);
  }
  if (budget.preferred > budget.maximum) {
    throw new RangeError(
      `Preferred budget (${budget.preferred}) exceeds maximum budget (${budget.maximum})`,
    );
  }
}

function sumCosts(costs: readonly number[], from: number, to = costs.length): number {
  let total = 0;
  for (let i = from; i < to; i++) total += costs[i] ?? 0;
  return total;
}

/**
 * Move `keepFrom` back to the newest user turn when the kept suffix has none.
 *
 * The backend only accepts histories that open with a user turn, so a window
 * holding nothing but an assistant prefill is widened, over budget if need be.
 */
function reachUserTurn(messages: readonly ChatMessage[], keepFrom: number, start: number): number {
  if (messages.slice(keepFrom).some((message) => message.role === "user")) return keepFrom;
  for (let i = keepFrom - 1; i >= start; i--) {
    if (messages[i]?.role === "user") return i;
  }
  return keepFrom;
}

/**
 * Trim `messages` to fit `budget`.
 *
 * The input array is never mutated; the returned `messages` is a new array
 * holding the leading system message (if any) followed by a chronological
 * suffix of the remaining turns. The suffix always contains a user turn when
 * the input does.
 */
export function trim(
  messages: readonly ChatMessage[],
  budget: TokenBudget,
  estimate: TokenEstimator = estimateMessageTokens,
): TrimmedContext {
  validateBudget(budget);

  const first = messages[0];
  if (first === undefined) {
    throw invalidRequest("messages must not be empty", "messages");
  }

  const costs = messages.map((message) => estimate(message));
  const total = sumCosts(costs, 0);

  if (total <= budget.preferred) {
    return { messages: [...messages], estimatedTokens: total, truncated: false, dropped: 0 };
  }

  const hasSystem = first.role === "system";
  const start = hasSystem ? 1 : 0;
  const systemCost = hasSystem ? (costs[0] ?? 0) : 0;

  // System message alone: nothing to drop.
  if (messages.length === start) {
    return { messages: [...messages], estimatedTokens: total, truncated: false, dropped: 0 };
  }

  const newestIndex = messages.length - 1;
  const newestCost = costs[newestIndex] ?? 0;

  if (systemCost + newestCost > budget.maximum) {
    // Even system + newest overflows the hard ceiling: drop the system message too.
    const from = reachUserTurn(messages, newestIndex, start);
    return {
      messages: messages.slice(from),
      estimatedTokens: sumCosts(costs, from),
      truncated: from > 0,
      dropped: from,
    };
  }

  let keepFrom = newestIndex;
  let running = systemCost + newestCost;
  for (let i = newestIndex - 1; i >= start; i--) {
    const cost = costs[i] ?? 0;
    if (running + cost > budget.preferred) break;
    running += cost;
    keepFrom = i;
  }
  keepFrom = reachUserTurn(messages, keepFrom, start);

  const kept = hasSystem
    ? [first, ...messages.slice(keepFrom)]
    : messages.slice(keepFrom);

  return {
    messages: kept,
    estimatedTokens: systemCost + sumCosts(costs, keepFrom),
    truncated: kept.length < messages.length,
    dropped: messages.length - kept.length,
  };
}

/**
 * Format a truncation log message.
 */
export function formatTrimMessage(context: TrimmedContext, budget: TokenBudget): string {
  const degraded = context.estimatedTokens > budget.preferred ? " (over preferred budget)" : "";
  return `Context trimmed: dropped ${context.dropped} message(s), ~${context.estimatedTokens} tokens kept of ${budget.preferred} preferred / ${budget.maximum} maximum${degraded}`;
}
