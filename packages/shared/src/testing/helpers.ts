/**
 * Async and SSE helpers for engine and control API tests.
 */

/**
 * Poll `condition` until it holds.
 *
 * @throws Error naming `description` once `timeout` ms have passed
 */
export async function waitFor(
  condition: () => boolean | Promise<boolean>,
  { timeout = 5000, interval = 5, description = "condition" }: { timeout?: number; interval?: number; description?: string } = {},
): Promise<void> {
  const deadline = Date.now() + timeout;
  while (!(await condition())) {
    if (Date.now() >= deadline) {
      throw new Error(`Timed out after ${timeout}ms waiting for ${description}`);
    }
    await sleep(interval);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
  readonly settled: boolean;
}

/**
 * A promise settled from the outside; used to hold a scripted model call or
 * tool invocation open while a test acts on the run.
 */
export function createDeferred<T = void>(): Deferred<T> {
  const deferred: { settled: boolean; resolve: (value: T) => void; reject: (error: Error) => void } = {
    settled: false,
    resolve: () => undefined,
    reject: () => undefined,
  };
  const promise = new Promise<T>((resolve, reject) => {
    deferred.resolve = (value) => {
      deferred.settled = true;
      resolve(value);
    };
    deferred.reject = (error) => {
      deferred.settled = true;
      reject(error);
    };
  });
  return {
    promise,
    resolve: (value) => deferred.resolve(value),
    reject: (error) => deferred.reject(error),
    get settled() {
      return deferred.settled;
    },
  };
}

export interface SSEFrame {
  event?: string;
  /** JSON-decoded when the payload is JSON, the raw text otherwise */
  data: unknown;
}

/**
 * Split a stream body into frames. Comment frames (heartbeats) are dropped and
 * multi-line `data:` fields are joined with newlines.
 */
export function parseSSEFrames(body: string): SSEFrame[] {
  const frames: SSEFrame[] = [];
  for (const block of body.split("\n\n")) {
    let event: string | undefined;
    const data: string[] = [];
    for (const line of block.split("\n")) {
      if (line.startsWith("event:")) {
        event = line.slice(6).trim();
      } else if (line.startsWith("data:")) {
        data.push(line.slice(5).trimStart());
      }
    }
    if (event === undefined && data.length === 0) {
      continue;
    }
    frames.push({ ...(event !== undefined ? { event } : {}), data: decode(data.join("\n")) });
  }
  return frames;
}

function decode(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return text;
  }
}
