/**
 * Progress polling for a task running in the background
 */

export interface BackgroundProgressOptions {
  intervalMs: number;
  /** Source of synthetic percentages, see linearRamp */
  ramp: Iterator<number>;
  onProgress: (percent: number) => void;
}

/**
 * Await `task` while emitting ramp values every `intervalMs`.
 *
 * Emitted values strictly increase; a final 100 is emitted once the task
 * resolves. Nothing more is emitted when it rejects.
 */
export async function trackBackgroundTask<T>(
  task: Promise<T>,
  options: BackgroundProgressOptions,
): Promise<T> {
  let last = 0;

  const timer = setInterval(() => {
    const next = options.ramp.next();
    if (next.done || next.value <= last) return;

    last = Math.min(next.value, 99);
    options.onProgress(last);
  }, options.intervalMs);

  try {
    const result = await task;
    options.onProgress(100);
    return result;
  } finally {
    clearInterval(timer);
  }
}
