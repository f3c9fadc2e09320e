/**
 * Synthetic progress for work that reports none.
 *
 * The zip writer gives no usable progress signal, so archive creation shows an
 * evenly spaced ramp paced by the input size. The values estimate elapsed
 * progress; they are not measured.
 */

export const RAMP_CAP = 95;

// Rough zlib level-6 throughput on a laptop disk
export const ASSUMED_BYTES_PER_SECOND = 20 * 1024 * 1024;

/**
 * Yields step, 2*step, ... and finally `cap`, then ends.
 */
export function* linearRamp(step: number, cap: number = RAMP_CAP): Generator<number, void, undefined> {
  if (step <= 0) return;

  for (let value = step; value < cap; value += step) {
    yield value;
  }
  yield cap;
}

/**
 * Integer ramp step such that the ramp reaches its cap roughly when an input
 * of `totalBytes` should be done, given one tick every `intervalMs`.
 */
export function rampStepForSize(totalBytes: number, intervalMs: number): number {
  const expectedSeconds = totalBytes / ASSUMED_BYTES_PER_SECOND;
  const expectedTicks = Math.max(1, (expectedSeconds * 1000) / intervalMs);
  return Math.min(RAMP_CAP, Math.max(1, Math.floor(RAMP_CAP / expectedTicks)));
}
