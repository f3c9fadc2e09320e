/**
 * Progress / status notification sink.
 *
 * `percent` is present for progress updates (0-100) and absent for plain
 * status messages.
 */
export interface Notifier {
  notify(message: string, percent?: number): void;
}
