import { RUN_STATUSES, RUN_TRANSITIONS, canTransition, isTerminalStatus } from "../runs";
import { formatToolResult, isToolDeclared, toCallResult } from "../tools";
import { createToolDescriptor } from "../testing";

describe("run status table", () => {
  it("should have no outgoing edges from terminal statuses", () => {
    for (const status of RUN_STATUSES) {
      if (isTerminalStatus(status)) {
        expect(RUN_TRANSITIONS[status]).toEqual([]);
      }
    }
  });

  it("should allow the lifecycle edges", () => {
    expect(canTransition("pending", "running")).toBe(true);
    expect(canTransition("running", "paused")).toBe(true);
    expect(canTransition("paused", "running")).toBe(true);
    expect(canTransition("running", "cancelling")).toBe(true);
    expect(canTransition("cancelling", "cancelled")).toBe(true);
    expect(canTransition("paused", "cancelling")).toBe(true);
  });

  it("should reject shortcuts", () => {
    expect(canTransition("pending", "completed")).toBe(false);
    expect(canTransition("paused", "completed")).toBe(false);
    expect(canTransition("cancelling", "running")).toBe(false);
    expect(canTransition("completed", "running")).toBe(false);
  });

  it("should recognise exactly three terminal statuses", () => {
    expect(RUN_STATUSES.filter(isTerminalStatus)).toEqual(["completed", "failed", "cancelled"]);
  });
});

describe("tool helpers", () => {
  it("should match declared tools by name", () => {
    expect(isToolDeclared(["lookup"], createToolDescriptor("lookup"))).toBe(true);
    expect(isToolDeclared(["other"], createToolDescriptor("lookup"))).toBe(false);
  });

  it("should match declared groups case-insensitively", () => {
    const tool = createToolDescriptor("get_balance", { group: "LedgerAPI" });

    expect(isToolDeclared(["ledgerapi"], tool)).toBe(true);
    expect(isToolDeclared(["Ledger"], tool)).toBe(false);
  });

  it("should convert outcomes into stored results", () => {
    expect(toCallResult({ ok: true, value: 3 })).toEqual({ ok: true, value: 3 });
    expect(toCallResult({ ok: false, kind: "not_found", message: "missing" })).toEqual({
      ok: false,
      error: { kind: "not_found", message: "missing" },
    });
  });

  it("should format results as text", () => {
    expect(formatToolResult({ ok: true, value: "plain" })).toBe("plain");
    expect(formatToolResult({ ok: true, value: { total: 4 } })).toBe('{"total":4}');
    expect(formatToolResult({ ok: true, value: undefined })).toBe("Done");
    expect(
      formatToolResult({ ok: false, error: { kind: "not_declared", message: "Tool 'x' is not declared" } }),
    ).toBe("Error (not_declared): Tool 'x' is not declared");
  });
});
