export type ThresholdInput = {
  attempted: number;
  succeeded: number;
};

export type ThresholdViolation = {
  metric: string;
  threshold: number;
  actual: number;
};

export type ThresholdResult = {
  pass: boolean;
  ratio: number;
  violations: ThresholdViolation[];
};

/**
 * Compare a batch's success ratio against the configured minimum.
 * An empty batch passes with ratio 1: there was nothing to fail.
 */
export function checkSuccessRatio(input: ThresholdInput, minRatio: number): ThresholdResult {
  const ratio = input.attempted > 0 ? input.succeeded / input.attempted : 1;
  const violations: ThresholdViolation[] = [];

  if (ratio < minRatio) {
    violations.push({
      metric: "success_ratio",
      threshold: minRatio,
      actual: Math.round(ratio * 10000) / 10000,
    });
  }

  return { pass: violations.length === 0, ratio, violations };
}
