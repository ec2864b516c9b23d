import { AbortError, TransientModelError } from "agentry-shared";
import { sleep, withTimeout } from "./timeout";

describe("withTimeout", () => {
  it("should resolve with the function's result", async () => {
    await expect(withTimeout(async () => 42, { timeoutMs: 100 })).resolves.toBe(42);
  });

  it("should reject with the function's error", async () => {
    await expect(
      withTimeout(async () => {
        throw new Error("inner");
      }),
    ).rejects.toThrow("inner");
  });

  it("should reject with the timeout error and abort the inner signal", async () => {
    let innerSignal: AbortSignal | undefined;

    const result = withTimeout(
      (signal) => {
        innerSignal = signal;
        return new Promise<never>(() => undefined);
      },
      { timeoutMs: 20, onTimeout: (ms) => TransientModelError.timeout(ms) },
    );

    await expect(result).rejects.toThrow("Model call timed out after 20ms");
    expect(innerSignal?.aborted).toBe(true);
  });

  it("should default to an AbortError on timeout", async () => {
    await expect(withTimeout(() => new Promise<never>(() => undefined), { timeoutMs: 10 })).rejects.toMatchObject({
      code: "ABORT_TIMEOUT",
    });
  });

  it("should reject when the parent signal aborts", async () => {
    const controller = new AbortController();
    const result = withTimeout(() => new Promise<never>(() => undefined), { signal: controller.signal });

    controller.abort(new Error("stop"));

    await expect(result).rejects.toBeInstanceOf(AbortError);
  });

  it("should reject immediately when the parent signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn(async () => 1);

    await expect(withTimeout(fn, { signal: controller.signal })).rejects.toBeInstanceOf(AbortError);
    expect(fn).not.toHaveBeenCalled();
  });
});

describe("sleep", () => {
  it("should resolve after the delay", async () => {
    await expect(sleep(5)).resolves.toBeUndefined();
  });

  it("should reject when aborted", async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);

    controller.abort(new Error("halt"));

    await expect(pending).rejects.toThrow("halt");
  });
});
