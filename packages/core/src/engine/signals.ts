import { EventEmitter } from "node:events";

export type SuspensionRequest = "cancel" | "pause" | null;

/**
 * Pause and cancel requests for one run, set by control operations and read
 * by the worker that owns the run at turn boundaries.
 *
 * Cancel wins over pause. Cancelling also aborts `signal`, which interrupts
 * retry backoff waits but not a model or tool call already in flight.
 */
export class RunSignals {
  private readonly controller = new AbortController();
  private readonly events = new EventEmitter();
  private pause = false;
  private cancel = false;

  constructor(
    readonly runId: string,
    readonly agentId: string,
  ) {}

  get pauseRequested(): boolean {
    return this.pause;
  }

  get cancelRequested(): boolean {
    return this.cancel;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  requestPause(): void {
    if (this.pause || this.cancel) return;
    this.pause = true;
    this.events.emit("change");
  }

  /** @returns true when a pause request was withdrawn */
  clearPause(): boolean {
    if (!this.pause) return false;
    this.pause = false;
    this.events.emit("change");
    return true;
  }

  requestCancel(): void {
    if (this.cancel) return;
    this.cancel = true;
    this.pause = false;
    this.controller.abort();
    this.events.emit("change");
  }

  /**
   * The request the owner should act on at its next boundary.
   */
  pending(): SuspensionRequest {
    if (this.cancel) return "cancel";
    if (this.pause) return "pause";
    return null;
  }

  onChange(handler: () => void): () => void {
    this.events.on("change", handler);
    return () => {
      this.events.off("change", handler);
    };
  }
}
