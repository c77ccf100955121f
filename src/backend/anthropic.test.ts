import { describe, expect, it } from "vitest";
import Anthropic from "@anthropic-ai/sdk";

import { toGatewayError } from "../errors/index.js";
import {
  AnthropicBackend,
  normalizeStopReason,
  toCreateParams,
} from "./anthropic.js";
import type { BackendChunk, BackendRequest } from "./types.js";

// ---------------------------------------------------------------------------
// In-process stand-in for the Messages API
// ---------------------------------------------------------------------------

interface RecordedCall {
  url: string;
  body: Record<string, unknown>;
}

function sse(events: Array<Record<string, unknown>>): string {
  return events
    .map((event) => `event: ${String(event.type)}\ndata: ${JSON.stringify(event)}\n\n`)
    .join("");
}

function makeBackend(respond: () => Response): { backend: AnthropicBackend; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const client = new Anthropic({
    apiKey: "test-key",
    baseURL: "http://backend.test",
    maxRetries: 0,
    fetch: async (input: string | URL | Request, init?: RequestInit) => {
      const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
      const body: Record<string, unknown> = JSON.parse(String(init?.body));
      calls.push({ url, body });
      return respond();
    },
  });
  return { backend: new AnthropicBackend(client), calls };
}

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function streamResponse(events: Array<Record<string, unknown>>): Response {
  return new Response(sse(events), {
    status: 200,
    headers: { "content-type": "text/event-stream" },
  });
}

const REQUEST: BackendRequest = {
  model: "claude-test",
  system: "You are helpful",
  messages: [{ role: "user", content: "Hi" }],
  maxTokens: 256,
  temperature: 0.5,
};

const MESSAGE_BODY = {
  id: "msg_1",
  type: "message",
  role: "assistant",
  model: "claude-test",
  content: [
    { type: "text", text: "Hello, " },
    { type: "text", text: "world" },
  ],
  stop_reason: "end_turn",
  stop_sequence: null,
  usage: { input_tokens: 12, output_tokens: 3 },
};

function streamEvents(chunks: string[], stopReason: string): Array<Record<string, unknown>> {
  return [
    {
      type: "message_start",
      message: {
        id: "msg_1",
        type: "message",
        role: "assistant",
        model: "claude-test",
        content: [],
        stop_reason: null,
        stop_sequence: null,
        usage: { input_tokens: 12, output_tokens: 1 },
      },
    },
    { type: "content_block_start", index: 0, content_block: { type: "text", text: "" } },
    ...chunks.map((text) => ({
      type: "content_block_delta",
      index: 0,
      delta: { type: "text_delta", text },
    })),
    { type: "content_block_stop", index: 0 },
    {
      type: "message_delta",
      delta: { stop_reason: stopReason, stop_sequence: null },
      usage: { output_tokens: 3 },
    },
    { type: "message_stop" },
  ];
}

async function collect(stream: AsyncIterable<BackendChunk>): Promise<BackendChunk[]> {
  const chunks: BackendChunk[] = [];
  for await (const chunk of stream) chunks.push(chunk);
  return chunks;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("toCreateParams", () => {
  it("maps the backend request onto Messages API fields", () => {
    expect(
      toCreateParams({ ...REQUEST, topP: 0.9, stopSequences: ["END"] }),
    ).toEqual({
      model: "claude-test",
      max_tokens: 256,
      messages: [{ role: "user", content: "Hi" }],
      system: "You are helpful",
      temperature: 0.5,
      top_p: 0.9,
      stop_sequences: ["END"],
    });
  });

  it("omits optional fields that are not set", () => {
    expect(
      toCreateParams({ model: "m", messages: [{ role: "user", content: "x" }], maxTokens: 1 }),
    ).toEqual({ model: "m", max_tokens: 1, messages: [{ role: "user", content: "x" }] });
  });

  it("sends a data URL image as a base64 block ahead of the text", () => {
    const params = toCreateParams({
      model: "m",
      maxTokens: 1,
      messages: [
        {
          role: "user",
          content: "Describe this.",
          images: [{ kind: "base64", mediaType: "image/png", data: "iVBORw0KGgo=" }],
        },
      ],
    });
    expect(params.messages).toEqual([
      {
        role: "user",
        content: [
          {
            type: "image",
            source: { type: "base64", media_type: "image/png", data: "iVBORw0KGgo=" },
          },
          { type: "text", text: "Describe this." },
        ],
      },
    ]);
  });

  it("sends a plain URL image as a url block and omits empty text", () => {
    const params = toCreateParams({
      model: "m",
      maxTokens: 1,
      messages: [
        {
          role: "user",
          content: "",
          images: [{ kind: "url", url: "https://images.test/cat.jpg" }],
        },
      ],
    });
    expect(params.messages).toEqual([
      {
        role: "user",
        content: [
          { type: "image", source: { type: "url", url: "https://images.test/cat.jpg" } },
        ],
      },
    ]);
  });
});

describe("normalizeStopReason", () => {
  it("passes known reasons through", () => {
    expect(normalizeStopReason("max_tokens")).toBe("max_tokens");
    expect(normalizeStopReason("refusal")).toBe("refusal");
  });

  it("treats null and unknown reasons as end_turn", () => {
    expect(normalizeStopReason(null)).toBe("end_turn");
    expect(normalizeStopReason("something_new")).toBe("end_turn");
  });
});

describe("AnthropicBackend.generate", () => {
  it("returns a tagged message response with exact usage", async () => {
    const { backend, calls } = makeBackend(() => jsonResponse(200, MESSAGE_BODY));

    const response = await backend.generate(REQUEST);

    expect(response).toEqual({
      kind: "message",
      id: "msg_1",
      model: "claude-test",
      text: "Hello, world",
      stopReason: "end_turn",
      usage: { inputTokens: 12, outputTokens: 3 },
    });
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe("http://backend.test/v1/messages");
    expect(calls[0]?.body.system).toBe("You are helpful");
    expect(calls[0]?.body.max_tokens).toBe(256);
  });

  it("returns a refusal variant for a refusal stop reason", async () => {
    const { backend } = makeBackend(() =>
      jsonResponse(200, { ...MESSAGE_BODY, content: [], stop_reason: "refusal" }),
    );

    const response = await backend.generate(REQUEST);
    expect(response.kind).toBe("refusal");
    expect(response.text).toBe("");
  });

  it("surfaces authentication failures as upstream auth errors", async () => {
    const { backend } = makeBackend(() =>
      jsonResponse(401, {
        type: "error",
        error: { type: "authentication_error", message: "invalid x-api-key" },
      }),
    );

    const error: unknown = await backend.generate(REQUEST).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(Anthropic.AuthenticationError);
    expect(toGatewayError(error).kind).toBe("UpstreamAuth");
  });

  it("surfaces overload as upstream unavailable", async () => {
    const { backend } = makeBackend(() =>
      jsonResponse(529, { type: "error", error: { type: "overloaded_error", message: "busy" } }),
    );

    const error: unknown = await backend.generate(REQUEST).catch((e: unknown) => e);
    expect(toGatewayError(error).kind).toBe("UpstreamUnavailable");
  });
});

describe("AnthropicBackend.stream", () => {
  it("yields one delta per text chunk and a finish chunk", async () => {
    const { backend, calls } = makeBackend(() =>
      streamResponse(streamEvents(["Hel", "lo, ", "world"], "end_turn")),
    );

    const chunks = await collect(backend.stream(REQUEST));

    expect(chunks).toEqual([
      { type: "delta", text: "Hel" },
      { type: "delta", text: "lo, " },
      { type: "delta", text: "world" },
      { type: "finish", stopReason: "end_turn", usage: { inputTokens: 12, outputTokens: 3 } },
    ]);
    expect(calls[0]?.body.stream).toBe(true);
  });

  it("reports max_tokens on the finish chunk", async () => {
    const { backend } = makeBackend(() => streamResponse(streamEvents(["cut"], "max_tokens")));

    const chunks = await collect(backend.stream(REQUEST));
    expect(chunks.at(-1)).toEqual({
      type: "finish",
      stopReason: "max_tokens",
      usage: { inputTokens: 12, outputTokens: 3 },
    });
  });

  it("yields no finish chunk when the stream ends early", async () => {
    const events = streamEvents(["partial"], "end_turn").slice(0, 3);
    const { backend } = makeBackend(() => streamResponse(events));

    const chunks = await collect(backend.stream(REQUEST));
    expect(chunks).toEqual([{ type: "delta", text: "partial" }]);
  });

  it("stops cleanly when the consumer breaks out early", async () => {
    const { backend } = makeBackend(() =>
      streamResponse(streamEvents(["one", "two", "three"], "end_turn")),
    );

    const seen: string[] = [];
    for await (const chunk of backend.stream(REQUEST)) {
      if (chunk.type === "delta") seen.push(chunk.text);
      if (seen.length === 2) break;
    }
    expect(seen).toEqual(["one", "two"]);
  });
});

describe("AnthropicBackend.estimateTokens", () => {
  it("uses the character heuristic", () => {
    const { backend } = makeBackend(() => jsonResponse(200, MESSAGE_BODY));
    // ceil(8 / 4) + 4 overhead
    expect(backend.estimateTokens({ role: "user", content: "abcdefgh" })).toBe(6);
  });
});
