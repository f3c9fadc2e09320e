/**
 * Desktop notification sink (notify-send on Linux, osascript on macOS)
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { Notifier } from "../types/index.js";
import { errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

const execFileAsync = promisify(execFile);

const APP_NAME = "backup";
const TITLE = "Backup";

export type CommandRunner = (command: string, args: string[]) => Promise<void>;

export interface DesktopCommand {
  command: string;
  args: string[];
}

async function runCommand(command: string, args: string[]): Promise<void> {
  await execFileAsync(command, args, { timeout: 5000 });
}

function escapeAppleScript(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

/**
 * Command line for a notification on the given platform, or null when the
 * platform has no supported notifier.
 */
export function desktopCommand(
  platform: NodeJS.Platform,
  message: string,
  percent?: number,
): DesktopCommand | null {
  switch (platform) {
    case "linux": {
      const args = ["-a", APP_NAME];
      if (percent !== undefined) {
        // Replaces the previous progress bubble instead of stacking a new one
        args.push("-h", `int:value:${percent}`);
        args.push("-h", "string:x-canonical-private-synchronous:backup-progress");
      }
      args.push(TITLE, message);
      return { command: "notify-send", args };
    }
    case "darwin": {
      const text = percent !== undefined ? `${message} (${percent}%)` : message;
      return {
        command: "osascript",
        args: ["-e", `display notification "${escapeAppleScript(text)}" with title "${TITLE}"`],
      };
    }
    default:
      return null;
  }
}

export class DesktopNotifier implements Notifier {
  private enabled = true;

  constructor(
    private readonly platform: NodeJS.Platform = process.platform,
    private readonly run: CommandRunner = runCommand,
  ) {}

  get isEnabled(): boolean {
    return this.enabled;
  }

  notify(message: string, percent?: number): void {
    if (!this.enabled) return;

    const command = desktopCommand(this.platform, message, percent);
    if (!command) {
      this.enabled = false;
      logger.debug(`Desktop notifications unsupported on ${this.platform}`);
      return;
    }

    this.run(command.command, command.args).catch((error: unknown) => {
      // First failure (usually a missing binary) turns the sink off
      this.enabled = false;
      logger.debug(`Desktop notifications disabled: ${errorMessage(error)}`);
    });
  }
}
