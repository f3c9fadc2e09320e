/**
 * Notification sinks
 */

import type { Notifier } from "../types/index.js";
import { DesktopNotifier } from "./desktop.js";

export { type CommandRunner, type DesktopCommand, DesktopNotifier, desktopCommand } from "./desktop.js";

export class CompositeNotifier implements Notifier {
  constructor(private readonly sinks: readonly Notifier[]) {}

  notify(message: string, percent?: number): void {
    for (const sink of this.sinks) {
      sink.notify(message, percent);
    }
  }
}

/**
 * Wrap the console sink with desktop notifications unless disabled.
 */
export function withDesktopNotifications(
  sink: Notifier,
  enabled: boolean,
  desktop: Notifier = new DesktopNotifier(),
): Notifier {
  return enabled ? new CompositeNotifier([sink, desktop]) : sink;
}
