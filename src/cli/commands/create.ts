import { extractInlineOptions, INLINE_CONFIG_OPTIONS, resolveConfig } from "../../config/index.js";
import { createArchive } from "../../core/backup/index.js";
import { withDesktopNotifications } from "../../notify/index.js";
import { setLogLevel } from "../../utils/logger.js";
import { formatBytes, formatDuration } from "../../utils/naming.js";
import { COMMON_OPTIONS, parseCommandArgs, reportFailure } from "../args.js";
import { color, createSpinnerNotifier, formatSummary, runWithSpinner, ui } from "../ui/index.js";

export async function createCommand(args: string[]): Promise<number> {
  let verbose = false;

  try {
    const { values } = parseCommandArgs({
      args,
      options: {
        root: INLINE_CONFIG_OPTIONS.root,
        dir: INLINE_CONFIG_OPTIONS.dir,
        dest: INLINE_CONFIG_OPTIONS.dest,
        tmp: INLINE_CONFIG_OPTIONS.tmp,
        port: INLINE_CONFIG_OPTIONS.port,
        output: INLINE_CONFIG_OPTIONS.output,
        dirs: INLINE_CONFIG_OPTIONS.dirs,
        exclude: INLINE_CONFIG_OPTIONS.exclude,
        compress: INLINE_CONFIG_OPTIONS.compress,
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

    const config = resolveConfig(extractInlineOptions(values));

    ui.intro("backup create");

    const s = ui.spinner();
    s.start("Collecting files...");
    const notifier = withDesktopNotifications(createSpinnerNotifier(s), config.notify);

    const result = await runWithSpinner(s, () => createArchive(config, notifier), {
      done: "Archive created",
      failed: "Backup failed",
    });

    if (result.skippedPaths.length > 0) {
      ui.warn(`Skipped missing sources:\n${result.skippedPaths.join("\n")}`);
    }

    ui.note(
      formatSummary([
        { label: "Archive", value: result.archivePath },
        { label: "Size", value: formatBytes(result.sizeBytes) },
        { label: "Files", value: result.filesCount.toString() },
        { label: "Duration", value: formatDuration(result.durationMs) },
        { label: "SHA-256", value: verbose ? result.checksum : null },
      ]),
      "Summary",
    );

    ui.outro("Backup complete");
    return 0;
  } catch (error) {
    return reportFailure(error, { verbose, usage: printHelp });
  }
}

function printHelp(): void {
  console.log(`
${color.bold("backup create")} - Create a backup archive

${color.dim("USAGE:")}
  backup create [OPTIONS]

${color.dim("OPTIONS:")}
      --root <dir>          Root that archive paths are relative to (default: ~)
      --dirs <d1,d2,...>    Directories to back up, relative to the root
                            (default: Documents,Desktop,Pictures,.ssh,.config)
      --exclude <p1,p2,...> Glob patterns to leave out
                            (default: *.tmp,*.swp,node_modules,.cache)
      --compress <0-9>      Compression level, 0 fastest, 9 smallest (default: 6)
      --dir <dir>           Archive directory (default: ~/backups)
      --output <name>       Archive file name (default: backup-YYYYMMDDHHMMSS.zip)
      --dest <dir>          Restore destination (default: ~)
      --tmp <dir>           Temporary directory (default: system temp)
      --port <n>            Share port (default: 8000)
      --no-notify           Disable desktop notifications
  -v, --verbose             Show debug output
  -h, --help                Show this help message

${color.dim("EXAMPLES:")}
  backup create                                  # Back up the default directories
  backup create --dirs projects,notes            # Back up ~/projects and ~/notes
  backup create --exclude "*.log,dist" --compress 9
  backup create --output laptop.zip --no-notify
`);
}
