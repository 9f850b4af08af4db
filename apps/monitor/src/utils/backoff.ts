/**
 * Delay before retry number `attempt` (1-based): exponential growth capped
 * at maxDelayMs, with equal jitter (between half and all of the step).
 */
export function computeBackoffDelay(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random
): number {
  const step = Math.min(initialDelayMs * 2 ** (attempt - 1), maxDelayMs)
  return Math.round(step / 2 + random() * (step / 2))
}
