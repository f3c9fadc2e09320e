import { extractInlineOptions, INLINE_CONFIG_OPTIONS, resolveConfig } from "../../config/index.js";
import { localAddresses, startShareServer } from "../../core/transfer/index.js";
import { setLogLevel } from "../../utils/logger.js";
import { formatBytes } from "../../utils/naming.js";
import { COMMON_OPTIONS, parseCommandArgs, reportFailure } from "../args.js";
import { waitForShutdown } from "../signals.js";
import { color, formatSummary, ui } from "../ui/index.js";

export async function shareCommand(args: string[]): Promise<number> {
  let verbose = false;

  try {
    const { values } = parseCommandArgs({
      args,
      options: {
        dir: INLINE_CONFIG_OPTIONS.dir,
        port: INLINE_CONFIG_OPTIONS.port,
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

    ui.intro("backup share");

    const session = await startShareServer(config);
    const addresses = localAddresses();
    const firstAddress = addresses[0] ?? "<this-machine-ip>";

    ui.note(
      formatSummary([
        { label: "Directory", value: config.archiveDir },
        { label: "Latest", value: `${session.latest.name} (${formatBytes(session.latest.sizeBytes)})` },
        {
          label: "URLs",
          value:
            addresses.length > 0
              ? addresses.map((address) => `http://${address}:${session.port}/`).join(", ")
              : `http://localhost:${session.port}/`,
        },
      ]),
      "Sharing",
    );
    ui.info(`On the other machine run: ${color.cyan(`backup download --ip ${firstAddress} --port ${session.port}`)}`);
    ui.step("Press Ctrl+C to stop");

    const signal = await waitForShutdown();
    ui.info(`Received ${signal}, stopping`);
    await session.close();

    ui.outro("Share stopped");
    return 0;
  } catch (error) {
    return reportFailure(error, { verbose, usage: printHelp });
  }
}

function printHelp(): void {
  console.log(`
${color.bold("backup share")} - Serve the latest archive over HTTP

${color.dim("USAGE:")}
  backup share [OPTIONS]

${color.dim("OPTIONS:")}
      --dir <dir>    Archive directory (default: ~/backups)
      --port <n>     Port to listen on (default: 8000)
  -v, --verbose      Log every request
  -h, --help         Show this help message

${color.dim("ROUTES:")}
  /          Redirects to the latest archive
  /latest    The latest archive
  /<name>    A named archive from the directory

${color.dim("EXAMPLES:")}
  backup share
  backup share --dir /mnt/backups --port 9000
`);
}
