/**
 * Signal wiring for the bin entry.
 *
 * An audit run turns SIGINT/SIGTERM into an aborted AbortController so
 * in-flight git calls are killed and the run exits 130 without a report.
 * MCP mode installs nothing and keeps Node's default termination.
 */

export type ShutdownSignal = "SIGINT" | "SIGTERM";

export const SHUTDOWN_SIGNALS: readonly ShutdownSignal[] = ["SIGINT", "SIGTERM"];

/**
 * The slice of `process` the wiring needs. Any EventEmitter fits.
 */
export interface SignalSource {
  on(signal: ShutdownSignal, listener: () => void): unknown;
  off(signal: ShutdownSignal, listener: () => void): unknown;
}

/**
 * Whether the given argv describes an audit run that should own the
 * shutdown signals.
 */
export function handlesShutdownSignals(argv: readonly string[]): boolean {
  return !argv.includes("--mcp");
}

/**
 * Abort `controller` on the first shutdown signal. Returns a function that
 * removes the listeners again.
 */
export function abortOnShutdown(source: SignalSource, controller: AbortController): () => void {
  const listener = (): void => controller.abort();
  for (const signal of SHUTDOWN_SIGNALS) {
    source.on(signal, listener);
  }
  return () => {
    for (const signal of SHUTDOWN_SIGNALS) {
      source.off(signal, listener);
    }
  };
}
