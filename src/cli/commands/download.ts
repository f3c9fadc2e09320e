import { extractInlineOptions, INLINE_CONFIG_OPTIONS, resolveConfig } from "../../config/index.js";
import { restoreArchive } from "../../core/restore/index.js";
import { downloadArchive } from "../../core/transfer/index.js";
import { withDesktopNotifications } from "../../notify/index.js";
import { UsageError } from "../../utils/errors.js";
import { setLogLevel } from "../../utils/logger.js";
import { formatBytes, formatDuration } from "../../utils/naming.js";
import { COMMON_OPTIONS, parseCommandArgs, reportFailure } from "../args.js";
import { color, createSpinnerNotifier, formatSummary, runWithSpinner, ui } from "../ui/index.js";

export async function downloadCommand(args: string[]): Promise<number> {
  let verbose = false;

  try {
    const { values } = parseCommandArgs({
      args,
      options: {
        ip: { type: "string" },
        "zip-name": { type: "string" },
        port: INLINE_CONFIG_OPTIONS.port,
        tmp: INLINE_CONFIG_OPTIONS.tmp,
        dest: INLINE_CONFIG_OPTIONS.dest,
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

    if (!values.ip) {
      throw new UsageError("--ip is required");
    }
    const ip = values.ip;

    const config = resolveConfig(extractInlineOptions(values));

    ui.intro("backup download");

    const fetchSpinner = ui.spinner();
    fetchSpinner.start(`Downloading from ${ip}:${config.port}...`);
    const download = await runWithSpinner(
      fetchSpinner,
      () =>
        downloadArchive({
          ip,
          port: config.port,
          tmpDir: config.tmpDir,
          archiveName: values["zip-name"] ?? null,
        }),
      { done: "Archive downloaded", failed: "Download failed" },
    );
    ui.info(`${download.archiveName} (${formatBytes(download.sizeBytes)}) saved to ${download.archivePath}`);

    const restoreSpinner = ui.spinner();
    restoreSpinner.start("Extracting archive...");
    const notifier = withDesktopNotifications(createSpinnerNotifier(restoreSpinner), config.notify);
    const result = await runWithSpinner(
      restoreSpinner,
      () => restoreArchive(download.archivePath, config, notifier),
      { done: "Restore finished", failed: "Restore failed" },
    );

    ui.note(
      formatSummary([
        { label: "Source", value: download.url },
        { label: "Archive", value: download.archivePath },
        { label: "Destination", value: result.destination },
        { label: "Restored", value: result.copied.toString() },
        { label: "Already present", value: result.skipped.toString() },
        { label: "Duration", value: formatDuration(result.durationMs) },
      ]),
      "Summary",
    );

    ui.outro("Download and restore complete");
    return 0;
  } catch (error) {
    return reportFailure(error, { verbose, usage: printHelp });
  }
}

function printHelp(): void {
  console.log(`
${color.bold("backup download")} - Fetch a shared archive from a peer and restore it

${color.dim("USAGE:")}
  backup download --ip <address> [OPTIONS]

${color.dim("OPTIONS:")}
      --ip <address>     Address of the machine running "backup share" (required)
      --port <n>         Share port (default: 8000)
      --zip-name <name>  Archive to fetch (default: the peer's latest)
      --tmp <dir>        Where the archive is saved (default: system temp)
      --dest <dir>       Destination root (default: ~)
      --no-notify        Disable desktop notifications
  -v, --verbose          Show debug output
  -h, --help             Show this help message

${color.dim("EXAMPLES:")}
  backup download --ip 192.168.1.20
  backup download --ip 192.168.1.20 --port 9000 --zip-name backup-20240101120000.zip
`);
}
