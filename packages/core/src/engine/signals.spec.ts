import { RunSignals } from "./signals";

describe("RunSignals", () => {
  it("starts with no request", () => {
    const signals = new RunSignals("run-1", "agent-1");
    expect(signals.pending()).toBeNull();
    expect(signals.signal.aborted).toBe(false);
  });

  it("reports pause until it is cleared", () => {
    const signals = new RunSignals("run-1", "agent-1");
    signals.requestPause();

    expect(signals.pending()).toBe("pause");
    expect(signals.clearPause()).toBe(true);
    expect(signals.clearPause()).toBe(false);
    expect(signals.pending()).toBeNull();
  });

  it("lets cancel win over pause and aborts the signal", () => {
    const signals = new RunSignals("run-1", "agent-1");
    signals.requestPause();
    signals.requestCancel();
    signals.requestPause();

    expect(signals.pending()).toBe("cancel");
    expect(signals.pauseRequested).toBe(false);
    expect(signals.signal.aborted).toBe(true);
  });

  it("notifies on each change", () => {
    const signals = new RunSignals("run-1", "agent-1");
    const handler = vi.fn();
    const off = signals.onChange(handler);

    signals.requestPause();
    signals.requestPause();
    signals.requestCancel();
    off();
    signals.clearPause();

    expect(handler).toHaveBeenCalledTimes(2);
  });
});
