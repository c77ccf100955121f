/**
 * Request translator — trimmed chat context → backend request.
 *
 * Pure mapping. The backend takes the system prompt as a separate field and
 * needs strictly alternating user/assistant turns starting with a user turn.
 */
import { invalidModel, invalidRequest } from "../errors/index.js";
import type { BackendRequest, BackendTurn } from "../backend/types.js";
import type { TrimmedContext } from "../shared/types.js";

export interface ModelRoute {
  /** Identifier callers send in `model`. */
  id: string;
  /** Identifier sent to the backend. */
  backend: string;
}

export interface TranslationParams {
  model: string;
  temperature?: number;
  topP?: number;
  maxOutputTokens?: number;
  stop?: readonly string[];
}

export interface TranslationDefaults {
  /** Used when the caller does not set max_tokens. */
  maxOutputTokens: number;
}

/** Backend temperature range is [0, 1]; callers may send up to 2. */
const BACKEND_MAX_TEMPERATURE = 1;

const TURN_SEPARATOR = "\n\n";

export function resolveModel(model: string, routes: readonly ModelRoute[]): ModelRoute {
  const route = routes.find((r) => r.id === model);
  if (!route) throw invalidModel(model);
  return route;
}

function joinText(left: string, right: string): string {
  if (left === "") return right;
  if (right === "") return left;
  return `${left}${TURN_SEPARATOR}${right}`;
}

/** Merge consecutive same-role turns and drop leading assistant turns. */
export function toBackendTurns(context: TrimmedContext): BackendTurn[] {
  const turns: BackendTurn[] = [];
  for (const message of context.messages) {
    if (message.role === "system") continue;
    const images = message.images ?? [];
    const last = turns.at(-1);
    if (last && last.role === message.role) {
      last.content = joinText(last.content, message.content);
      if (images.length > 0) last.images = [...(last.images ?? []), ...images];
    } else if (turns.length > 0 || message.role === "user") {
      const turn: BackendTurn = { role: message.role, content: message.content };
      if (images.length > 0) turn.images = [...images];
      turns.push(turn);
    }
  }
  return turns;
}

export function translateRequest(
  context: TrimmedContext,
  params: TranslationParams,
  routes: readonly ModelRoute[],
  defaults: TranslationDefaults,
): BackendRequest {
  const route = resolveModel(params.model, routes);

  const systemParts = context.messages
    .filter((message) => message.role === "system")
    .map((message) => message.content);

  const messages = toBackendTurns(context);
  if (messages.length === 0) {
    throw invalidRequest("messages must contain at least one user message", "messages");
  }

  const request: BackendRequest = {
    model: route.backend,
    messages,
    maxTokens: params.maxOutputTokens ?? defaults.maxOutputTokens,
  };
  if (systemParts.length > 0) request.system = systemParts.join(TURN_SEPARATOR);
  if (params.temperature !== undefined) {
    request.temperature = Math.min(params.temperature, BACKEND_MAX_TEMPERATURE);
  }
  if (params.topP !== undefined) request.topP = params.topP;
  if (params.stop !== undefined && params.stop.length > 0) request.stopSequences = [...params.stop];

  return request;
}
