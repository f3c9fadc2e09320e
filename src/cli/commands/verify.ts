import * as path from "node:path";
import { extractInlineOptions, INLINE_CONFIG_OPTIONS, resolveConfig } from "../../config/index.js";
import { verifyArchive } from "../../core/verify/index.js";
import { listArchives } from "../../storage/index.js";
import type { VerifyResult } from "../../types/index.js";
import { UsageError } from "../../utils/errors.js";
import { setLogLevel } from "../../utils/logger.js";
import { formatBytes } from "../../utils/naming.js";
import { COMMON_OPTIONS, parseCommandArgs, reportFailure } from "../args.js";
import { color, formatSummary, runWithSpinner, ui } from "../ui/index.js";

export async function verifyCommand(args: string[]): Promise<number> {
  let verbose = false;

  try {
    const { values } = parseCommandArgs({
      args,
      options: {
        file: { type: "string", short: "f" },
        all: { type: "boolean", default: false },
        dir: INLINE_CONFIG_OPTIONS.dir,
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

    if (values.file && values.all) {
      throw new UsageError("Use either --file or --all, not both");
    }

    let targets: string[];
    if (values.file) {
      targets = [values.file];
    } else if (values.all) {
      const config = resolveConfig(extractInlineOptions(values));
      targets = (await listArchives(config.archiveDir)).map((archive) => archive.path);
    } else {
      throw new UsageError("Specify --file <path> or --all");
    }

    ui.intro("backup verify");

    if (targets.length === 0) {
      ui.success("No backups to verify");
      ui.outro("Done");
      return 0;
    }

    const s = ui.spinner();
    s.start(`Verifying ${targets.length} archive(s)...`);

    const results = await runWithSpinner(
      s,
      async () => {
        const verified: VerifyResult[] = [];
        for (const target of targets) {
          s.message(`Verifying ${path.basename(target)}`);
          verified.push(await verifyArchive(target));
        }
        return verified;
      },
      { done: "Verification complete", failed: "Verification failed" },
    );

    for (const result of results) {
      const label = `${path.basename(result.archivePath)} ${color.dim(
        `(${result.entries} entries, ${formatBytes(result.sizeBytes)})`,
      )}`;
      if (result.ok) {
        ui.success(label);
        if (verbose) ui.message(`  ${color.dim("sha256")} ${result.checksum}`);
      } else {
        ui.error(label);
        for (const issue of result.issues) {
          ui.message(`  ${color.dim("•")} ${issue}`);
        }
      }
    }

    const failed = results.filter((result) => !result.ok).length;

    ui.note(
      formatSummary([
        { label: "Verified", value: results.length.toString() },
        { label: "Healthy", value: (results.length - failed).toString() },
        { label: "With issues", value: failed.toString() },
      ]),
      "Verification Summary",
    );

    if (failed > 0) {
      ui.outro("Verification found issues");
      return 1;
    }

    ui.outro("All archives verified!");
    return 0;
  } catch (error) {
    return reportFailure(error, { verbose, usage: printHelp });
  }
}

function printHelp(): void {
  console.log(`
${color.bold("backup verify")} - Check that archives can be read back

${color.dim("USAGE:")}
  backup verify --file <path>
  backup verify --all [--dir <dir>]

${color.dim("OPTIONS:")}
  -f, --file <path>   Archive to verify
      --all           Verify every archive in the archive directory
      --dir <dir>     Archive directory (default: ~/backups)
  -v, --verbose       Also print each archive's SHA-256
  -h, --help          Show this help message

${color.dim("DESCRIPTION:")}
  Reads every entry to the end, checking its declared size, and flags entry
  paths that a restore would refuse. Exits 1 when any archive has issues.

${color.dim("EXAMPLES:")}
  backup verify --file ~/backups/backup-20240101120000.zip
  backup verify --all
`);
}
