import type { Notifier } from "../../src/types/index.js";

export interface Notification {
  message: string;
  percent?: number;
}

/**
 * Notifier stub that keeps every call for assertions
 */
export class RecordingNotifier implements Notifier {
  readonly notifications: Notification[] = [];

  notify(message: string, percent?: number): void {
    this.notifications.push(percent === undefined ? { message } : { message, percent });
  }

  get messages(): string[] {
    return this.notifications.map((n) => n.message);
  }

  get percents(): number[] {
    return this.notifications.flatMap((n) => (n.percent === undefined ? [] : [n.percent]));
  }
}
