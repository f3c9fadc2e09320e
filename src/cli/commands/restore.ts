import { extractInlineOptions, INLINE_CONFIG_OPTIONS, resolveConfig } from "../../config/index.js";
import { restoreArchive } from "../../core/restore/index.js";
import { withDesktopNotifications } from "../../notify/index.js";
import { UsageError } from "../../utils/errors.js";
import { setLogLevel } from "../../utils/logger.js";
import { formatDuration } from "../../utils/naming.js";
import { COMMON_OPTIONS, parseCommandArgs, reportFailure } from "../args.js";
import { color, createSpinnerNotifier, formatSummary, runWithSpinner, ui } from "../ui/index.js";

export async function restoreCommand(args: string[]): Promise<number> {
  let verbose = false;

  try {
    const { values } = parseCommandArgs({
      args,
      options: {
        file: { type: "string", short: "f" },
        dest: INLINE_CONFIG_OPTIONS.dest,
        tmp: INLINE_CONFIG_OPTIONS.tmp,
        "no-notify": INLINE_CONFIG_OPTIONS["no-notify"],
        ...COMMON_OPTIONS,
      },
      allowPositionals: false,
    });

    if (values.help) {
      printHelp();
      return 0;
    }

    verbose = values.verbose === true;
    if (verbose) {
      setLogLevel("debug");
    }

    if (!values.file) {
      throw new UsageError("--file is required");
    }
    const archivePath = values.file;

    const config = resolveConfig(extractInlineOptions(values));

    ui.intro("backup restore");

    const s = ui.spinner();
    s.start("Extracting archive...");
    const notifier = withDesktopNotifications(createSpinnerNotifier(s), config.notify);

    const result = await runWithSpinner(s, () => restoreArchive(archivePath, config, notifier), {
      done: "Restore finished",
      failed: "Restore failed",
    });

    ui.note(
      formatSummary([
        { label: "Archive", value: result.archivePath },
        { label: "Destination", value: result.destination },
        { label: "Files in archive", value: result.total.toString() },
        { label: "Restored", value: result.copied.toString() },
        { label: "Already present", value: result.skipped.toString() },
        { label: "Duration", value: formatDuration(result.durationMs) },
      ]),
      "Summary",
    );

    ui.outro("Restore complete");
    return 0;
  } catch (error) {
    return reportFailure(error, { verbose, usage: printHelp });
  }
}

function printHelp(): void {
  console.log(`
${color.bold("backup restore")} - Restore an archive without overwriting existing files

${color.dim("USAGE:")}
  backup restore --file <path> [OPTIONS]

${color.dim("OPTIONS:")}
  -f, --file <path>    Archive to restore (required)
      --dest <dir>     Destination root (default: ~)
      --tmp <dir>      Staging directory parent (default: system temp)
      --no-notify      Disable desktop notifications
  -v, --verbose        Show every file as it is merged
  -h, --help           Show this help message

${color.dim("NOTES:")}
  Files that already exist at the destination are never overwritten.
  Restoring the same archive twice changes nothing the second time.

${color.dim("EXAMPLES:")}
  backup restore --file ~/backups/backup-20240101120000.zip
  backup restore -f laptop.zip --dest /mnt/restore
`);
}
