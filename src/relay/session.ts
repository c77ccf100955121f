/**
 * Stream session — per-request relay state.
 *
 * States: idle → connecting → streaming → {completed, aborted, failed}.
 * Only the transitions below are legal; anything else is a programming error.
 */

export const RELAY_STATES = [
  "idle",
  "connecting",
  "streaming",
  "completed",
  "aborted",
  "failed",
] as const;

export type RelayState = (typeof RELAY_STATES)[number];

export type TerminalRelayState = Extract<RelayState, "completed" | "aborted" | "failed">;

const TRANSITIONS: Record<RelayState, readonly RelayState[]> = {
  idle: ["connecting"],
  connecting: ["streaming", "completed", "aborted", "failed"],
  streaming: ["completed", "aborted", "failed"],
  completed: [],
  aborted: [],
  failed: [],
};

export class IllegalTransitionError extends Error {
  readonly from: RelayState;
  readonly to: RelayState;

  constructor(from: RelayState, to: RelayState) {
    super(`Illegal relay transition ${from} → ${to}`);
    this.name = "IllegalTransitionError";
    this.from = from;
    this.to = to;
  }
}

export function isTerminal(state: RelayState): state is TerminalRelayState {
  return TRANSITIONS[state].length === 0;
}

export class StreamSession {
  readonly id: string;
  private current: RelayState = "idle";
  private readonly deltas: string[] = [];
  private emittedCount = 0;

  constructor(id: string) {
    this.id = id;
  }

  get state(): RelayState {
    return this.current;
  }

  /** Number of events written to the caller. */
  get emitted(): number {
    return this.emittedCount;
  }

  /** Concatenation of every delta written so far. */
  get text(): string {
    return this.deltas.join("");
  }

  transition(next: RelayState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new IllegalTransitionError(this.current, next);
    }
    this.current = next;
  }

  recordEmitted(deltaText?: string): void {
    if (isTerminal(this.current)) {
      throw new Error(`Cannot record output on a ${this.current} stream`);
    }
    this.emittedCount++;
    if (deltaText !== undefined) this.deltas.push(deltaText);
  }
}
