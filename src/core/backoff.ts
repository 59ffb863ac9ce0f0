export type BackoffPolicy = {
  initialMs: number;
  maxMs: number;
  factor?: number;
};

/** Delay before the (attempt+1)-th wait: initial · factor^attempt, capped at maxMs. */
export function backoffDelay(policy: BackoffPolicy, attempt: number): number {
  const factor = policy.factor ?? 2;
  const raw = policy.initialMs * Math.pow(factor, Math.max(0, attempt));
  return Math.min(raw, policy.maxMs);
}

/**
 * Fixed schedule lookup (e.g. 30s, 60s for submission retries).
 * Attempts past the end of the schedule reuse its last entry.
 */
export function scheduledDelay(scheduleMs: readonly number[], attempt: number): number {
  if (scheduleMs.length === 0) return 0;
  return scheduleMs[Math.min(attempt, scheduleMs.length - 1)] ?? 0;
}
