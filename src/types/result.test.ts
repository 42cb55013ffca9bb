import { describe, it, expect } from "vitest";
import { ok, err } from "./result.js";
import type { Result } from "./result.js";

describe("Result type", () => {
  it("ok() creates a successful result", () => {
    const result = ok(20);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toBe(20);
    }
  });

  it("err() carries a structured error", () => {
    const result: Result<number, { kind: string }> = err({ kind: "missing" });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("missing");
    }
  });
});
