/**
 * Churn analyzer.
 *
 * Normalization is fixed: ccr = min(touches / churnBaseline, 1), where
 * touches counts distinct commits in the last churnWindowDays days. With
 * the defaults (10 commits per 14 days) three commits give ccr = 0.3.
 *
 * When history cannot be read the ratio is null, never 0. Callers must
 * treat null as "unknown" and leave it out of the verdict.
 */

import type { HistoryLog } from "../adapter/adapter.js";
import type { PolicyConfig } from "../types/policy.js";

export interface ChurnResult {
  readonly ccr: number | null;
  readonly touches: number | null;
  readonly unavailableReason: string | null;
}

export function churnRatio(touches: number, baseline: number): number {
  return Math.min(touches / baseline, 1);
}

export async function measureChurn(
  filePath: string,
  policy: PolicyConfig,
  history: HistoryLog,
  signal?: AbortSignal,
): Promise<ChurnResult> {
  const count = await history.fetchRecentTouches(filePath, policy.churnWindowDays, {
    timeoutMs: policy.gitTimeoutMs,
    signal,
  });

  if (!count.available) {
    return { ccr: null, touches: null, unavailableReason: count.reason };
  }

  return {
    ccr: churnRatio(count.touches, policy.churnBaseline),
    touches: count.touches,
    unavailableReason: null,
  };
}
