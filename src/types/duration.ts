/** Duration category for external tool timeouts. */
export type DurationCategory = "instant" | "quick" | "normal" | "slow";

/** Timeout in ms per duration category. */
export const DURATION_TIMEOUTS: Record<DurationCategory, number> = {
  instant: 5_000,
  quick: 15_000,
  normal: 30_000,
  slow: 60_000,
};

/** Cap a category timeout by the configured ceiling (seconds, 0 = no ceiling). */
export function resolveTimeout(duration: DurationCategory, ceilingSeconds: number): number {
  return ceilingSeconds > 0
    ? Math.min(DURATION_TIMEOUTS[duration], ceilingSeconds * 1000)
    : DURATION_TIMEOUTS[duration];
}
