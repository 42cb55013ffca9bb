/**
 * Tests for the CLI runner.
 *
 * The runner wires together parsing, orchestration and formatting. It
 * uses injected dependencies (stdout, stderr, writeFn, history) so tests
 * stay deterministic without touching real I/O beyond a temp directory.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import * as node_fs from "node:fs/promises";
import * as node_os from "node:os";
import * as node_path from "node:path";
import { isWithin, run, type CliDeps } from "./run.js";
import type { HistoryLog } from "../adapter/adapter.js";

const CLEAN = "export function add(a: number, b: number): number {\n  return a + b;\n}\n";
const NOISY = "export function shout(): void {\n  console.log(\"hi\");\n}\n";

const history: HistoryLog = {
  id: "fake",
  async fetchRecentTouches() {
    return { available: true, touches: 1 };
  },
};

interface TestDeps extends CliDeps {
  readonly stdoutLines: string[];
  readonly stderrLines: string[];
  readonly written: Map<string, string>;
}

function createTestDeps(overrides?: Partial<CliDeps>): TestDeps {
  const stdoutLines: string[] = [];
  const stderrLines: string[] = [];
  const written = new Map<string, string>();
  return {
    stdoutLines,
    stderrLines,
    written,
    stdout: (text: string) => { stdoutLines.push(text); },
    stderr: (text: string) => { stderrLines.push(text); },
    writeFn: async (path: string, content: string) => { written.set(path, content); },
    history,
    timestampFn: () => "2025-01-15T10:00:00.000Z",
    ...overrides,
  };
}

const tmpDirs: string[] = [];

async function makeRepo(files: Record<string, string>): Promise<string> {
  const dir = await node_fs.mkdtemp(node_path.join(node_os.tmpdir(), "archaudit-cli-"));
  tmpDirs.push(dir);
  await node_fs.mkdir(node_path.join(dir, ".git"));
  for (const [name, content] of Object.entries(files)) {
    await node_fs.writeFile(node_path.join(dir, name), content, "utf-8");
  }
  return dir;
}

afterEach(async () => {
  for (const dir of tmpDirs) {
    await node_fs.rm(dir, { recursive: true, force: true });
  }
  tmpDirs.length = 0;
});

describe("isWithin", () => {
  it("detects the root and its descendants", () => {
    expect(isWithin("/repo", "/repo")).toBe(true);
    expect(isWithin("/repo", "/repo/out/report.json")).toBe(true);
  });

  it("treats a name that starts with two dots as a descendant", () => {
    expect(isWithin("/repo", "/repo/..report.json")).toBe(true);
    expect(isWithin("/repo", "/repo/..cache/report.json")).toBe(true);
  });

  it("rejects siblings and parents", () => {
    expect(isWithin("/repo", "/repo-reports/report.json")).toBe(false);
    expect(isWithin("/repo/src", "/repo/report.json")).toBe(false);
  });
});

describe("run", () => {
  it("prints the terminal report and exits 0 on a pass", async () => {
    const dir = await makeRepo({ "add.ts": CLEAN });
    const deps = createTestDeps();

    const code = await run([dir, "--no-color"], deps);

    expect(code).toBe(0);
    expect(deps.stdoutLines).toHaveLength(1);
    const lines = (deps.stdoutLines[0] ?? "").split("\n");
    expect(lines[0]).toBe(`Architecture Audit: ${node_path.resolve(dir)}`);
    expect(lines[lines.length - 1]).toBe("Project Verdict: PASS");
    expect(deps.stderrLines).toEqual(["Using built-in default policy"]);
  });

  it("exits 1 when the project fails", async () => {
    const dir = await makeRepo({ "shout.ts": NOISY });
    const deps = createTestDeps();

    const code = await run([dir, "--no-color"], deps);

    expect(code).toBe(1);
    const lines = (deps.stdoutLines[0] ?? "").split("\n");
    expect(lines[lines.length - 1]).toBe("Project Verdict: FAIL");
  });

  it("prints JSON when asked", async () => {
    const dir = await makeRepo({ "add.ts": CLEAN });
    const deps = createTestDeps();

    const code = await run(["--format", "json", dir], deps);

    expect(code).toBe(0);
    const parsed: unknown = JSON.parse(deps.stdoutLines[0] ?? "");
    expect(parsed).toMatchObject({ mode: "directory", exit_code: 0 });
  });

  it("honors NO_COLOR from the environment", async () => {
    const dir = await makeRepo({ "add.ts": CLEAN });
    const deps = createTestDeps({ noColorEnv: true });

    await run([dir], deps);

    expect(deps.stdoutLines[0]).not.toContain("\x1b[");
  });

  it("colours verdict labels by default", async () => {
    const dir = await makeRepo({ "add.ts": CLEAN });
    const deps = createTestDeps();

    await run([dir], deps);

    const lines = (deps.stdoutLines[0] ?? "").split("\n");
    expect(lines[lines.length - 1]).toBe("Project Verdict: \x1b[32mPASS\x1b[0m");
  });

  it("writes the JSON report to --output outside the tree", async () => {
    const dir = await makeRepo({ "add.ts": CLEAN });
    const outside = node_path.join(node_os.tmpdir(), "archaudit-reports", "report.json");
    const deps = createTestDeps();

    const code = await run([dir, "-o", outside], deps);

    expect(code).toBe(0);
    const content = deps.written.get(outside);
    expect(content).toBeDefined();
    expect(JSON.parse(content ?? "")).toMatchObject({ target: node_path.resolve(dir) });
    expect(deps.stderrLines).toContain(`Report written to ${outside}`);
  });

  it("refuses an --output path inside the audited tree", async () => {
    const dir = await makeRepo({ "add.ts": CLEAN });
    const inside = node_path.join(dir, "reports", "report.json");
    const deps = createTestDeps();

    const code = await run([dir, "--output", inside], deps);

    expect(code).toBe(2);
    expect(deps.written.size).toBe(0);
    expect(deps.stdoutLines).toEqual([]);
    expect(deps.stderrLines).toEqual([
      `Refusing to write report inside the audited path: ${inside}`,
    ]);
  });

  it("refuses to overwrite the audited file", async () => {
    const dir = await makeRepo({ "add.ts": CLEAN });
    const file = node_path.join(dir, "add.ts");
    const deps = createTestDeps();

    expect(await run([file, "-o", file], deps)).toBe(2);
  });

  it("exits 2 when the report cannot be written", async () => {
    const dir = await makeRepo({ "add.ts": CLEAN });
    const deps = createTestDeps({
      writeFn: async () => {
        throw new Error("disk full");
      },
    });

    const code = await run([dir, "-o", node_path.join(node_os.tmpdir(), "r.json")], deps);

    expect(code).toBe(2);
    expect(deps.stderrLines).toContain("Failed to write report: disk full");
  });

  it("exits 2 on a malformed policy without printing a report", async () => {
    const dir = await makeRepo({ ".archaudit.yml": "max_cc: [1\n", "add.ts": CLEAN });
    const deps = createTestDeps();

    const code = await run([dir], deps);

    expect(code).toBe(2);
    expect(deps.stdoutLines).toEqual([]);
    expect(deps.stderrLines[0]).toMatch(/^Invalid policy .*: invalid YAML: /);
  });

  it("prints policy warnings to stderr", async () => {
    const dir = await makeRepo({ ".archaudit.yml": "colour: blue\n", "add.ts": CLEAN });
    const deps = createTestDeps();

    const code = await run([dir, "--no-color"], deps);

    const policyPath = node_path.join(node_path.resolve(dir), ".archaudit.yml");
    expect(code).toBe(0);
    expect(deps.stderrLines).toEqual([
      `Warning: ${policyPath}: unknown key "colour" ignored`,
      `Using policy ${policyPath}`,
    ]);
  });

  it("exits 2 for a missing target", async () => {
    const dir = await makeRepo({});
    const deps = createTestDeps();

    expect(await run([node_path.join(dir, "absent")], deps)).toBe(2);
    expect(deps.stderrLines[0]).toMatch(/^Target not found: /);
  });

  it("exits 2 for a directory without source files", async () => {
    const dir = await makeRepo({ "notes.md": "# notes\n" });
    const deps = createTestDeps();

    expect(await run([dir], deps)).toBe(2);
  });

  it("exits 130 when cancelled", async () => {
    const dir = await makeRepo({ "add.ts": CLEAN });
    const controller = new AbortController();
    controller.abort();
    const deps = createTestDeps({ signal: controller.signal });

    const code = await run([dir], deps);

    expect(code).toBe(130);
    expect(deps.stdoutLines).toEqual([]);
    expect(deps.stderrLines).toEqual(["Audit cancelled"]);
  });

  it("exits 2 on a usage error", async () => {
    const deps = createTestDeps();

    expect(await run(["--bogus"], deps)).toBe(2);
    expect(deps.stderrLines).toEqual(['Unknown flag "--bogus"']);
  });

  it("prints help and version to stdout", async () => {
    const deps = createTestDeps();

    expect(await run(["--help"], deps)).toBe(0);
    expect(await run(["--version"], deps)).toBe(0);
    expect(deps.stdoutLines[1]).toMatch(/^archaudit /);
  });

  it("starts the MCP server when requested", async () => {
    const startMcpServer = vi.fn(async () => {});
    const deps = createTestDeps({ startMcpServer });

    expect(await run(["--mcp"], deps)).toBe(0);
    expect(startMcpServer).toHaveBeenCalledTimes(1);
  });

  it("reports an unavailable MCP server", async () => {
    const deps = createTestDeps();

    expect(await run(["--mcp"], deps)).toBe(2);
    expect(deps.stderrLines).toEqual(["MCP server is not available"]);
  });
});
