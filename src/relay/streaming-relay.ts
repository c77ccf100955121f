/**
 * Streaming relay — drives one backend stream to the caller.
 *
 * Chunks are pulled one at a time, translated and written before the next
 * one is requested, so the caller sees them in arrival order. A client
 * disconnect cancels the backend stream and ends the relay quietly; a
 * backend failure produces exactly one error event.
 */
import type { BackendChunk } from "../backend/types.js";
import { GatewayError, toGatewayError } from "../errors/index.js";
import { mapError, type MappedError } from "../errors/mapper.js";
import type { Logger } from "../shared/logger.js";
import type { ChatCompletionChunk, FinishReason } from "../shared/types.js";
import { mapFinishReason, translateChunk, type ResponseContext } from "../translate/response.js";
import { StreamSession, type TerminalRelayState } from "./session.js";

export interface StreamSink {
  /** Write one caller stream event. */
  send(event: ChatCompletionChunk): void;
  /** Write the single error event of a failed stream. */
  fail(error: MappedError): void;
  /** Close the transport once the relay reached a terminal state. */
  close(state: TerminalRelayState): void;
}

export interface RelayOptions {
  /** Open the backend stream; the signal fires when the relay cancels it. */
  open: (signal: AbortSignal) => AsyncIterable<BackendChunk>;
  sink: StreamSink;
  ctx: ResponseContext;
  /** Fires when the caller disconnects. */
  signal?: AbortSignal;
  logger?: Logger;
}

export interface RelayOutcome {
  state: TerminalRelayState;
  /** Concatenated delta text written to the caller. */
  text: string;
  /** Events written, terminal event included. */
  events: number;
  finishReason?: FinishReason;
  error?: GatewayError;
}

const ABORTED = Symbol("aborted");

/**
 * Await the iterator's next chunk, or ABORTED if `signal` fires first.
 *
 * A next() that settles after the abort is still observed, so its rejection
 * never goes unhandled.
 */
function nextOrAbort<T>(
  iterator: AsyncIterator<T>,
  signal: AbortSignal,
): Promise<IteratorResult<T> | typeof ABORTED> {
  if (signal.aborted) return Promise.resolve(ABORTED);

  const next = iterator.next();
  return new Promise((resolve, reject) => {
    const onAbort = (): void => resolve(ABORTED);
    signal.addEventListener("abort", onAbort, { once: true });
    next.then(
      (result) => {
        signal.removeEventListener("abort", onAbort);
        resolve(result);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

export async function relayStream(options: RelayOptions): Promise<RelayOutcome> {
  const { open, sink, ctx, signal, logger } = options;
  const session = new StreamSession(ctx.id);
  const backendAbort = new AbortController();
  const onClientAbort = (): void => backendAbort.abort();
  signal?.addEventListener("abort", onClientAbort, { once: true });
  if (signal?.aborted) backendAbort.abort();

  let iterator: AsyncIterator<BackendChunk> | undefined;
  let pending = false;

  const finish = (state: TerminalRelayState, extra: Partial<RelayOutcome> = {}): RelayOutcome => {
    session.transition(state);
    sink.close(state);
    return { state, text: session.text, events: session.emitted, ...extra };
  };

  const abort = (): RelayOutcome => {
    logger?.info("Client disconnected; backend stream cancelled", { events: session.emitted });
    return finish("aborted");
  };

  try {
    session.transition("connecting");
    logger?.debug("Opening backend stream");
    iterator = open(backendAbort.signal)[Symbol.asyncIterator]();

    for (;;) {
      if (backendAbort.signal.aborted) return abort();

      pending = true;
      const result = await nextOrAbort(iterator, backendAbort.signal);
      // ABORTED leaves the backend's next() unsettled.
      pending = result === ABORTED;

      if (result === ABORTED || signal?.aborted) return abort();
      if (result.done) {
        throw new GatewayError("UpstreamError", "Backend stream ended without a finish signal");
      }

      const chunk = result.value;
      if (session.state === "connecting") session.transition("streaming");

      sink.send(translateChunk(chunk, session.emitted, ctx));

      if (chunk.type === "delta") {
        session.recordEmitted(chunk.text);
        continue;
      }

      session.recordEmitted();
      const finishReason = mapFinishReason(chunk.stopReason);
      logger?.debug("Stream completed", { finishReason });
      return finish("completed", { finishReason });
    }
  } catch (error: unknown) {
    if (signal?.aborted) return abort();

    const gatewayError = toGatewayError(error);
    logger?.error(gatewayError.message, { phase: session.state, kind: gatewayError.kind });
    sink.fail(mapError(gatewayError));
    return finish("failed", { error: gatewayError });
  } finally {
    signal?.removeEventListener("abort", onClientAbort);
    if (session.state !== "completed") backendAbort.abort();
    // A pending next() is cancelled through the abort signal instead.
    if (iterator?.return && !pending && session.state !== "completed") {
      await iterator.return();
    }
  }
}
