import { EventEmitter } from "node:events";
import { AbortError } from "agentry-shared";
import { Logger } from "./logger";

export type ChannelHandler<TEvent> = (event: TEvent) => void;

/**
 * Core pub/sub primitive.
 *
 * Publishing never throws; a failing subscriber is logged and skipped.
 */
export class Channel<TEvent> {
  private emitter = new EventEmitter();

  constructor(public readonly name: string) {
    this.emitter.setMaxListeners(0);
  }

  publish(event: TEvent): void {
    for (const listener of this.emitter.listeners("event")) {
      try {
        listener(event);
      } catch (error) {
        Logger.for("Channel").warn({ err: error, channel: this.name }, "Channel subscriber threw");
      }
    }
  }

  /**
   * Subscribe to events on this channel.
   * @returns Unsubscribe function
   */
  subscribe(handler: ChannelHandler<TEvent>): () => void {
    this.emitter.on("event", handler);

    return () => {
      this.emitter.off("event", handler);
    };
  }

  /**
   * Resolve with the first published event matching the predicate.
   *
   * @param timeoutMs Reject with an AbortError after this long (default: no timeout)
   */
  next(predicate: (event: TEvent) => boolean, timeoutMs?: number): Promise<TEvent> {
    return new Promise((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const unsubscribe = this.subscribe((event) => {
        if (predicate(event)) {
          unsubscribe();
          if (timer) clearTimeout(timer);
          resolve(event);
        }
      });

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          unsubscribe();
          reject(
            new AbortError(
              `Channel "${this.name}": no matching event after ${timeoutMs}ms`,
              "ABORT_TIMEOUT",
              { timeoutMs },
            ),
          );
        }, timeoutMs);
      }
    });
  }

  getSubscriberCount(): number {
    return this.emitter.listenerCount("event");
  }

  /**
   * Cleanup: remove all subscribers.
   */
  destroy(): void {
    this.emitter.removeAllListeners();
  }
}

/**
 * Keyed collection of channels with a wildcard channel that sees every event.
 *
 * @example
 * ```typescript
 * const hub = new ChannelHub<RunEvent>('runs');
 * hub.subscribe(runId, (event) => send(event));
 * hub.subscribeAll((event) => audit(event));
 * hub.publish(runId, { type: 'status', ... });
 * ```
 */
export class ChannelHub<TEvent> {
  private readonly channels = new Map<string, Channel<TEvent>>();
  private readonly wildcard: Channel<TEvent>;

  constructor(public readonly name: string) {
    this.wildcard = new Channel<TEvent>(`${name}:*`);
  }

  getChannel(key: string): Channel<TEvent> {
    let channel = this.channels.get(key);
    if (!channel) {
      channel = new Channel<TEvent>(`${this.name}:${key}`);
      this.channels.set(key, channel);
    }
    return channel;
  }

  publish(key: string, event: TEvent): void {
    this.channels.get(key)?.publish(event);
    this.wildcard.publish(event);
  }

  /**
   * Subscribe to one key. The channel is dropped once its last subscriber leaves.
   */
  subscribe(key: string, handler: ChannelHandler<TEvent>): () => void {
    const channel = this.getChannel(key);
    const unsubscribe = channel.subscribe(handler);
    return () => {
      unsubscribe();
      if (channel.getSubscriberCount() === 0 && this.channels.get(key) === channel) {
        this.channels.delete(key);
      }
    };
  }

  subscribeAll(handler: ChannelHandler<TEvent>): () => void {
    return this.wildcard.subscribe(handler);
  }

  has(key: string): boolean {
    return this.channels.has(key);
  }

  removeChannel(key: string): void {
    const channel = this.channels.get(key);
    if (channel) {
      channel.destroy();
      this.channels.delete(key);
    }
  }

  destroy(): void {
    for (const channel of this.channels.values()) {
      channel.destroy();
    }
    this.channels.clear();
    this.wildcard.destroy();
  }
}
