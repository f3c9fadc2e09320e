import { extractInlineOptions, INLINE_CONFIG_OPTIONS, resolveConfig } from "../../config/index.js";
import { listArchives } from "../../storage/index.js";
import type { ArchiveInfo } from "../../types/index.js";
import { UsageError } from "../../utils/errors.js";
import { setLogLevel } from "../../utils/logger.js";
import { formatBytes } from "../../utils/naming.js";
import { COMMON_OPTIONS, parseCommandArgs, reportFailure } from "../args.js";
import {
  color,
  formatDateTime,
  formatTableRow,
  formatTableSeparator,
  TABLE_WIDTHS,
  ui,
} from "../ui/index.js";

const LIST_FORMATS = ["table", "json"] as const;
type ListFormat = (typeof LIST_FORMATS)[number];

function isListFormat(value: string): value is ListFormat {
  return LIST_FORMATS.some((format) => format === value);
}

export async function listCommand(args: string[]): Promise<number> {
  let verbose = false;

  try {
    const { values } = parseCommandArgs({
      args,
      options: {
        dir: INLINE_CONFIG_OPTIONS.dir,
        format: { type: "string", default: "table" },
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

    const format = values.format ?? "table";
    if (!isListFormat(format)) {
      throw new UsageError(`--format must be one of ${LIST_FORMATS.join(", ")} (got "${format}")`);
    }

    const config = resolveConfig(extractInlineOptions(values));
    const archives = await listArchives(config.archiveDir);

    // No intro for scripting formats
    if (format === "json") {
      console.log(JSON.stringify(archives, null, 2));
      return 0;
    }

    ui.intro("backup list");

    if (archives.length === 0) {
      ui.info("No backups found");
      ui.outro("Done");
      return 0;
    }

    printTable(archives);

    ui.outro(`${archives.length} backup(s) in ${config.archiveDir}`);
    return 0;
  } catch (error) {
    return reportFailure(error, { verbose, usage: printHelp });
  }
}

function printTable(archives: ArchiveInfo[]): void {
  const widths = [TABLE_WIDTHS.archiveName, TABLE_WIDTHS.size, TABLE_WIDTHS.modified];

  ui.step("Backups:");
  console.log(formatTableRow(["Archive", "Size", "Modified"], widths));
  console.log(formatTableSeparator(widths));

  for (const archive of archives) {
    console.log(
      formatTableRow(
        [archive.name, formatBytes(archive.sizeBytes), formatDateTime(archive.modifiedAt)],
        widths,
      ),
    );
  }

  console.log(formatTableSeparator(widths));
}

function printHelp(): void {
  console.log(`
${color.bold("backup list")} - List archives in the archive directory

${color.dim("USAGE:")}
  backup list [OPTIONS]

${color.dim("OPTIONS:")}
      --dir <dir>         Archive directory (default: ~/backups)
      --format <format>   Output format: table, json (default: table)
  -v, --verbose           Show debug output
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  backup list                        # Oldest first, newest last
  backup list --dir /mnt/backups
  backup list --format json          # Output as JSON (for scripting)
`);
}
