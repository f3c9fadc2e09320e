/**
 * Spinner-backed progress reporting
 */

import type { Notifier } from "../../types/index.js";
import type { Spinner } from "./output.js";

export function formatProgress(message: string, percent?: number): string {
  return percent === undefined ? message : `${message} ${percent}%`;
}

/**
 * Notifier that rewrites the spinner's message.
 */
export function createSpinnerNotifier(spinner: Spinner): Notifier {
  return {
    notify(message, percent) {
      spinner.message(formatProgress(message, percent));
    },
  };
}

/**
 * Run `task` under a started spinner, stopping it with the outcome.
 */
export async function runWithSpinner<T>(
  spinner: Spinner,
  task: () => Promise<T>,
  messages: { done: string; failed: string },
): Promise<T> {
  try {
    const result = await task();
    spinner.stop(messages.done);
    return result;
  } catch (error) {
    spinner.stop(messages.failed, 1);
    throw error;
  }
}
