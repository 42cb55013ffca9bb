export { type Formatter, type FormatterOptions } from "./formatter.js";
export { formatJson, toJsonReport, round4 } from "./json.js";
export { formatTerminal, verdictLabel } from "./terminal.js";
