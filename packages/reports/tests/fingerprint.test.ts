import { describe, it, expect } from "vitest";
import { ReportError } from "@ledgerview/ledger";
import { throwIfCancelled } from "../src/cancellation.js";
import { reportFingerprint } from "../src/fingerprint.js";

describe("reportFingerprint", () => {
  it("is a SHA-256 hex digest", () => {
    expect(reportFingerprint({ a: 1 })).toMatch(/^[0-9a-f]{64}$/);
  });

  it("ignores key order", () => {
    expect(reportFingerprint({ a: "1.00", b: [1, 2] })).toBe(reportFingerprint({ b: [1, 2], a: "1.00" }));
  });

  it("changes when a value changes", () => {
    expect(reportFingerprint({ balance: "1.00" })).not.toBe(reportFingerprint({ balance: "1.01" }));
  });
});

describe("throwIfCancelled", () => {
  it("does nothing without a signal or before abort", () => {
    expect(() => throwIfCancelled(undefined, "load")).not.toThrow();
    expect(() => throwIfCancelled(new AbortController().signal, "load")).not.toThrow();
  });

  it("throws CANCELLED naming the phase", () => {
    const controller = new AbortController();
    controller.abort();

    let caught: unknown;
    try {
      throwIfCancelled(controller.signal, "allocate");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ReportError);
    expect(caught).toMatchObject({
      code: "CANCELLED",
      message: "Report cancelled before allocate",
      details: { phase: "allocate" },
    });
  });
});
