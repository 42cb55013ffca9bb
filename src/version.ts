/**
 * Package version, read from package.json so the CLI, the MCP server and
 * the JSON report all agree on one value.
 */

import { createRequire } from "node:module";
import { z } from "zod";

const require = createRequire(import.meta.url);
const PackageSchema = z.object({ version: z.string() });

export const VERSION: string = PackageSchema.parse(require("../package.json")).version;
