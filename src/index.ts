#!/usr/bin/env node

import * as p from "@clack/prompts";
import color from "picocolors";
import { createCommand } from "./cli/commands/create.js";
import { downloadCommand } from "./cli/commands/download.js";
import { listCommand } from "./cli/commands/list.js";
import { restoreCommand } from "./cli/commands/restore.js";
import { shareCommand } from "./cli/commands/share.js";
import { verifyCommand } from "./cli/commands/verify.js";
import { APP_NAME, VERSION } from "./cli/ui/output.js";

function printHelp(): void {
  p.intro(`${color.cyan(APP_NAME)} ${color.dim(`v${VERSION}`)} - Back up, share and restore your files`);

  p.note(
    `${color.cyan("create")}      Create an archive of the configured directories
${color.cyan("share")}       Serve the latest archive over HTTP
${color.cyan("download")}    Fetch an archive from a peer and restore it
${color.cyan("restore")}     Restore an archive without overwriting anything
${color.cyan("list")}        List existing archives
${color.cyan("verify")}      Check archive integrity`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `backup create                              ${color.dim("# Back up the default directories")}
backup share                               ${color.dim("# Offer the latest archive on port 8000")}
backup download --ip 192.168.1.20          ${color.dim("# Pull and restore a peer's latest archive")}
backup restore --file backup-20240101120000.zip
backup list                                ${color.dim("# List archives in ~/backups")}
backup verify --all                        ${color.dim("# Verify every archive")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("backup <command> --help")} for command details`);
}

function printVersion(): void {
  console.log(`${APP_NAME} v${VERSION}`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "create":
      return createCommand(commandArgs);

    case "share":
      return shareCommand(commandArgs);

    case "download":
      return downloadCommand(commandArgs);

    case "restore":
      return restoreCommand(commandArgs);

    case "list":
      return listCommand(commandArgs);

    case "verify":
      return verifyCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      console.error(`${color.red("✖ Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("backup --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
