/**
 * Chat-completion request validation.
 *
 * Turns an untrusted JSON body into a frozen ChatRequest, or throws an
 * InvalidRequest GatewayError naming the offending field.
 */
import { invalidRequest } from "../errors/index.js";
import {
  CHAT_ROLES,
  IMAGE_MEDIA_TYPES,
  type ChatImage,
  type ChatMessage,
  type ChatRequest,
  type ChatRole,
  type ImageMediaType,
} from "../shared/types.js";

const VALID_ROLES = new Set<string>(CHAT_ROLES);
const VALID_MEDIA_TYPES = new Set<string>(IMAGE_MEDIA_TYPES);
const DATA_URL_PATTERN = /^data:([^;,]+);base64,([A-Za-z0-9+/=\s]+)$/;
const HTTP_URL_PATTERN = /^https?:\/\/\S+$/;
const MAX_STOP_SEQUENCES = 4;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isChatRole(value: unknown): value is ChatRole {
  return typeof value === "string" && VALID_ROLES.has(value);
}

function isImageMediaType(value: string): value is ImageMediaType {
  return VALID_MEDIA_TYPES.has(value);
}

interface ParsedContent {
  text: string;
  images: ChatImage[];
}

/** `image_url.url` as either a base64 data URL or an http(s) URL. */
function parseImageUrl(part: Record<string, unknown>, param: string): ChatImage {
  const imageUrl = part.image_url;
  const url = isRecord(imageUrl) ? imageUrl.url : imageUrl;
  if (typeof url !== "string") {
    throw invalidRequest("image_url must carry a url string", param);
  }

  const data = DATA_URL_PATTERN.exec(url);
  if (data) {
    const mediaType = data[1] ?? "";
    if (!isImageMediaType(mediaType)) {
      throw invalidRequest(
        `Unsupported image type ${mediaType}; expected one of ${IMAGE_MEDIA_TYPES.join(", ")}`,
        param,
      );
    }
    return { kind: "base64", mediaType, data: (data[2] ?? "").replace(/\s/g, "") };
  }
  if (HTTP_URL_PATTERN.test(url)) return { kind: "url", url };

  throw invalidRequest("image_url must be an http(s) URL or a base64 data URL", param);
}

/** Split OpenAI content (string or parts) into text and images. */
function parseContent(raw: unknown, param: string): ParsedContent {
  if (typeof raw === "string") return { text: raw, images: [] };

  if (Array.isArray(raw)) {
    const texts: string[] = [];
    const images: ChatImage[] = [];
    raw.forEach((part, i) => {
      if (typeof part === "string") {
        texts.push(part);
        return;
      }
      if (isRecord(part) && part.type === "text" && typeof part.text === "string") {
        texts.push(part.text);
        return;
      }
      if (isRecord(part) && part.type === "image_url") {
        images.push(parseImageUrl(part, `${param}[${i}]`));
        return;
      }
      throw invalidRequest(
        `Only text and image_url content parts are supported`,
        `${param}[${i}]`,
      );
    });
    return { text: texts.join("\n"), images };
  }

  throw invalidRequest(`Message content must be a string or an array of content parts`, param);
}

function parseMessage(raw: unknown, index: number): ChatMessage {
  const param = `messages[${index}]`;
  if (!isRecord(raw)) {
    throw invalidRequest(`Message must be an object`, param);
  }
  if (!isChatRole(raw.role)) {
    throw invalidRequest(
      `Message role must be one of ${CHAT_ROLES.join(", ")}`,
      `${param}.role`,
    );
  }
  const { text, images } = parseContent(raw.content, `${param}.content`);
  if (images.length === 0) return Object.freeze({ role: raw.role, content: text });

  if (raw.role !== "user") {
    throw invalidRequest(`Only user messages may contain images`, `${param}.content`);
  }
  return Object.freeze({ role: raw.role, content: text, images: Object.freeze(images) });
}

function optionalNumber(
  body: Record<string, unknown>,
  key: string,
  min: number,
  max: number,
): number | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value) || value < min || value > max) {
    throw invalidRequest(`${key} must be a number between ${min} and ${max}`, key);
  }
  return value;
}

function optionalPositiveInt(body: Record<string, unknown>, key: string): number | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw invalidRequest(`${key} must be a positive integer`, key);
  }
  return value;
}

function parseStop(raw: unknown): readonly string[] | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (typeof raw === "string") return Object.freeze([raw]);
  if (
    Array.isArray(raw) &&
    raw.length <= MAX_STOP_SEQUENCES &&
    raw.every((entry): entry is string => typeof entry === "string")
  ) {
    return raw.length > 0 ? Object.freeze([...raw]) : undefined;
  }
  throw invalidRequest(
    `stop must be a string or an array of at most ${MAX_STOP_SEQUENCES} strings`,
    "stop",
  );
}

/**
 * Validate and normalize a chat-completion request body.
 *
 * `max_completion_tokens` wins over `max_tokens` when both are present.
 */
export function parseChatRequest(body: unknown): ChatRequest {
  if (!isRecord(body)) {
    throw invalidRequest("Request body must be a JSON object");
  }

  if (typeof body.model !== "string" || body.model.trim() === "") {
    throw invalidRequest("model must be a non-empty string", "model");
  }

  if (!Array.isArray(body.messages) || body.messages.length === 0) {
    throw invalidRequest("messages must be a non-empty array", "messages");
  }
  const messages = Object.freeze(body.messages.map((raw, i) => parseMessage(raw, i)));

  if (body.stream !== undefined && body.stream !== null && typeof body.stream !== "boolean") {
    throw invalidRequest("stream must be a boolean", "stream");
  }

  const temperature = optionalNumber(body, "temperature", 0, 2);
  const topP = optionalNumber(body, "top_p", 0, 1);
  const maxOutputTokens =
    optionalPositiveInt(body, "max_completion_tokens") ?? optionalPositiveInt(body, "max_tokens");
  const stop = parseStop(body.stop);

  const request: ChatRequest = {
    model: body.model.trim(),
    messages,
    stream: body.stream === true,
    ...(temperature !== undefined ? { temperature } : {}),
    ...(topP !== undefined ? { topP } : {}),
    ...(maxOutputTokens !== undefined ? { maxOutputTokens } : {}),
    ...(stop !== undefined ? { stop } : {}),
  };
  return Object.freeze(request);
}
