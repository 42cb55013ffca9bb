/**
 * Tests for the complexity analyzer.
 *
 * Expected scores are counted by hand: 1 + one per decision point in
 * the unit's own body.
 */

import { describe, it, expect } from "vitest";
import { analyzeComplexity, collectUnits, parseSource, scriptKindFor } from "./complexity.js";
import ts from "typescript";

function unitsOf(text: string, path = "sample.ts") {
  return collectUnits(parseSource(path, text));
}

describe("collectUnits", () => {
  it("scores a straight-line function as 1", () => {
    const units = unitsOf("function add(a: number, b: number): number {\n  return a + b;\n}\n");
    expect(units).toEqual([{ name: "add", startLine: 1, endLine: 3, complexity: 1 }]);
  });

  it("reports 1-based start and end lines", () => {
    const units = unitsOf("\nfunction a() {\n  return 1;\n}\n");
    expect(units[0]?.startLine).toBe(2);
    expect(units[0]?.endLine).toBe(4);
  });

  it("counts if, else-if, loops, && and the conditional operator", () => {
    const text = [
      "export function classify(n: number): string {",
      "  if (n < 0) {",
      '    return "negative";',
      "  } else if (n === 0) {",
      '    return "zero";',
      "  }",
      "  for (let i = 0; i < n; i++) {",
      "    if (i % 2 === 0 && i > 2) {",
      "      continue;",
      "    }",
      "  }",
      '  return n > 100 ? "large" : "small";',
      "}",
      "",
    ].join("\n");
    const units = unitsOf(text);
    expect(units).toHaveLength(1);
    expect(units[0]?.complexity).toBe(7);
  });

  it("counts each non-default case, catch and ??", () => {
    const text = [
      "function route(code: number, fallback?: string): string {",
      "  try {",
      "    switch (code) {",
      "      case 1:",
      "      case 2:",
      '        return "low";',
      "      case 3:",
      '        return "mid";',
      "      default:",
      '        return "other";',
      "    }",
      "  } catch {",
      '    return fallback ?? "error";',
      "  }",
      "}",
      "",
    ].join("\n");
    expect(unitsOf(text)[0]?.complexity).toBe(6);
  });

  it("counts while, do-while, for-in and for-of", () => {
    const text = [
      "function loops(obj: Record<string, number>, xs: number[]): number {",
      "  let n = 0;",
      "  while (n < 3) n++;",
      "  do { n--; } while (n > 0);",
      "  for (const k in obj) n += obj[k] ?? 0;",
      "  for (const x of xs) n += x;",
      "  return n;",
      "}",
      "",
    ].join("\n");
    // while, do, for-in, ??, for-of
    expect(unitsOf(text)[0]?.complexity).toBe(6);
  });

  it("measures nested functions as separate units", () => {
    const text = [
      "function outer(xs: number[]): number {",
      "  const pick = (x: number) => (x > 0 ? x : 0);",
      "  if (xs.length === 0) {",
      "    return 0;",
      "  }",
      "  return xs.map(pick).reduce((a, b) => a + b, 0);",
      "}",
      "",
    ].join("\n");
    const units = unitsOf(text);
    expect(units.map((u) => [u.name, u.complexity])).toEqual([
      ["outer", 2],
      ["pick", 2],
      ["<anonymous>", 1],
    ]);
  });

  it("names class members after their class", () => {
    const text = [
      "class Cart {",
      "  private items: number[] = [];",
      "  constructor(private readonly limit: number) {}",
      "  get size(): number {",
      "    return this.items.length;",
      "  }",
      "  add(item: number): void {",
      "    if (this.items.length >= this.limit || item < 0) {",
      '      throw new Error("full");',
      "    }",
      "    this.items.push(item);",
      "  }",
      "  total = (): number => this.items.reduce((s, i) => s + i, 0);",
      "}",
      "",
    ].join("\n");
    const units = unitsOf(text);
    expect(units.map((u) => [u.name, u.complexity])).toEqual([
      ["Cart.constructor", 1],
      ["Cart.size", 1],
      ["Cart.add", 3],
      ["Cart.total", 1],
      ["<anonymous>", 1],
    ]);
  });

  it("skips overload signatures", () => {
    const text = [
      "function f(x: string): string;",
      "function f(x: number): number;",
      "function f(x: unknown): unknown {",
      "  return x;",
      "}",
      "",
    ].join("\n");
    expect(unitsOf(text)).toHaveLength(1);
  });

  it("names functions assigned to object properties", () => {
    const text = "exports.handler = function () {\n  return 1;\n};\nconst api = { load: () => 2 };\n";
    const units = unitsOf(text, "api.js");
    expect(units.map((u) => u.name)).toEqual(["exports.handler", "load"]);
  });
});

describe("analyzeComplexity", () => {
  it("reports max and mean across units", () => {
    const text = [
      "export function a(x: number) {",
      "  return x > 0 ? 1 : 0;",
      "}",
      "export function b(x: number) {",
      "  if (x) { return 1; }",
      "  if (x > 1) { return 2; }",
      "  if (x > 2) { return 3; }",
      "  return 0;",
      "}",
      "",
    ].join("\n");
    const result = analyzeComplexity("sample.ts", text);
    expect(result.parsed).toBe(true);
    if (result.parsed) {
      expect(result.maxCc).toBe(4);
      expect(result.meanCc).toBe(3);
    }
  });

  it("scores a single function with 25 branches as 26", () => {
    const branches = Array.from(
      { length: 25 },
      (_, i) => `  if (x === ${i}) {\n    y += ${i};\n  }`,
    ).join("\n");
    const text = `export function spike(x: number): number {\n  let y = 0;\n${branches}\n  return y;\n}\n`;

    const result = analyzeComplexity("spike.ts", text);
    expect(result.parsed).toBe(true);
    if (result.parsed) {
      expect(result.maxCc).toBe(26);
      expect(result.units).toHaveLength(1);
    }
  });

  it("reports zero for a file without functions", () => {
    const result = analyzeComplexity("constants.ts", "export const LIMIT = 3;\n");
    expect(result.parsed).toBe(true);
    if (result.parsed) {
      expect(result.maxCc).toBe(0);
      expect(result.meanCc).toBe(0);
      expect(result.units).toEqual([]);
    }
  });

  it("does not score branching at module scope", () => {
    const text = [
      "let level = 0;",
      "if (level > 0) {",
      "  level = 1;",
      "}",
      "if (level > 1) {",
      "  level = 2;",
      "}",
      "if (level > 2) {",
      "  level = 3;",
      "}",
      "",
    ].join("\n");
    const result = analyzeComplexity("setup.ts", text);
    expect(result.parsed).toBe(true);
    if (result.parsed) {
      expect(result.units).toEqual([]);
      expect(result.maxCc).toBe(0);
    }
  });

  it("parses JSX in .tsx files", () => {
    const text = 'export const Badge = (props: { ok: boolean }) => <span>{props.ok ? "yes" : "no"}</span>;\n';
    const result = analyzeComplexity("Badge.tsx", text);
    expect(result.parsed).toBe(true);
    if (result.parsed) {
      expect(result.units.map((u) => [u.name, u.complexity])).toEqual([["Badge", 2]]);
    }
  });

  it("returns an unparsed result for invalid syntax", () => {
    const result = analyzeComplexity("broken.ts", "function broken( {\n  return 1;\n");
    expect(result.parsed).toBe(false);
    if (!result.parsed) {
      expect(result.error).toMatch(/^line \d+: /);
    }
  });

  it("is deterministic", () => {
    const text = "export function f(a: boolean, b: boolean) {\n  return a && b ? 1 : 2;\n}\n";
    expect(analyzeComplexity("f.ts", text)).toEqual(analyzeComplexity("f.ts", text));
  });
});

describe("scriptKindFor", () => {
  it("maps extensions to script kinds", () => {
    expect(scriptKindFor("a.ts")).toBe(ts.ScriptKind.TS);
    expect(scriptKindFor("a.tsx")).toBe(ts.ScriptKind.TSX);
    expect(scriptKindFor("a.mjs")).toBe(ts.ScriptKind.JS);
    expect(scriptKindFor("a.jsx")).toBe(ts.ScriptKind.JSX);
  });
});
