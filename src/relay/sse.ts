/**
 * Server-sent event framing for caller streams.
 *
 * Headers go out lazily with the first event, so a stream that fails before
 * producing anything is answered with a plain JSON error and its real status.
 */
import type { ServerResponse } from "node:http";
import type { MappedError } from "../errors/mapper.js";
import type { ChatCompletionChunk } from "../shared/types.js";
import type { TerminalRelayState } from "./session.js";
import type { StreamSink } from "./streaming-relay.js";

export const SSE_DONE = "data: [DONE]\n\n";

export function formatSseData(payload: unknown): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

export interface SseSinkOptions {
  /** Called right before the response headers are written. */
  beforeHeaders?: () => void;
}

export class SseSink implements StreamSink {
  private readonly res: ServerResponse;
  private readonly beforeHeaders: (() => void) | undefined;

  constructor(res: ServerResponse, options: SseSinkOptions = {}) {
    this.res = res;
    this.beforeHeaders = options.beforeHeaders;
  }

  send(event: ChatCompletionChunk): void {
    this.openStream();
    this.res.write(formatSseData(event));
  }

  fail(error: MappedError): void {
    if (this.res.writableEnded) return;
    if (!this.res.headersSent) {
      this.beforeHeaders?.();
      this.res.writeHead(error.status, { "Content-Type": "application/json; charset=utf-8" });
      this.res.end(JSON.stringify(error.body));
      return;
    }
    this.res.write(formatSseData(error.body));
  }

  close(state: TerminalRelayState): void {
    if (this.res.writableEnded) return;
    if (state === "completed") {
      this.openStream();
      this.res.write(SSE_DONE);
    }
    this.res.end();
  }

  private openStream(): void {
    if (this.res.headersSent) return;
    this.beforeHeaders?.();
    this.res.writeHead(200, {
      "Content-Type": "text/event-stream; charset=utf-8",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
      "X-Accel-Buffering": "no",
    });
  }
}
