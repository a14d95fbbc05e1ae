export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
}

// 第 attempt 次失败后的等待时间：min(max, base * 2^(attempt-1))，随 attempt 单调不减
export function backoffDelay(policy: BackoffPolicy, attempt: number): number {
  const base = Math.max(0, policy.baseDelayMs);
  const cap = Math.max(base, policy.maxDelayMs);
  const n = Math.max(1, Math.floor(attempt));
  return Math.min(cap, base * Math.pow(2, n - 1));
}
