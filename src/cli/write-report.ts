import * as node_fs from "node:fs/promises";
import * as node_path from "node:path";

/**
 * Production writeFn: writes the report, creating parent directories so
 * `--output deep/nested/report.json` works without preparation.
 */
export async function writeReportFile(path: string, content: string): Promise<void> {
  await node_fs.mkdir(node_path.dirname(node_path.resolve(path)), { recursive: true });
  await node_fs.writeFile(path, content + "\n", "utf-8");
}
