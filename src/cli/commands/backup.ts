import { parseArgs } from "node:util";
import { RunConfigError, resolveRunConfig, type RunConfigInput } from "../../config";
import { runBackup } from "../../core";
import { createDockerRuntime, getDockerVersion, isDockerAvailable } from "../../docker/client";
import { errorMessage } from "../../errors";
import type { RunReport } from "../../types";
import { formatBytes, formatDuration } from "../../utils/format";
import { logger, setLogFile, setLogLevel } from "../../utils/logger";
import {
  color,
  exitCodeFor,
  formatArtifactTable,
  formatFailure,
  formatResumeFailure,
  formatSummary,
  ui,
} from "../ui";

export interface BackupArgs {
  help: boolean;
  verbose: boolean;
  logFile?: string;
  config?: RunConfigInput;
}

function parseIntegerOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) {
    throw new RunConfigError(`--${name} must be a non-negative integer (got "${value}")`);
  }
  return parseInt(value, 10);
}

/**
 * Parse `backup` arguments. Throws on unknown options or bad values.
 */
export function parseBackupArgs(args: string[]): BackupArgs {
  const { values, positionals } = parseArgs({
    args,
    options: {
      root: { type: "string", short: "r" },
      compose: { type: "string", short: "f" },
      "max-versions": { type: "string", short: "n" },
      "helper-image": { type: "string" },
      "stop-timeout": { type: "string" },
      "log-file": { type: "string" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  const help = values.help === true;
  const verbose = values.verbose === true;
  const logFile = values["log-file"];

  if (help) {
    return { help, verbose, logFile };
  }

  const [destination, schemePath, ...extra] = positionals;
  if (!destination || !schemePath) {
    throw new RunConfigError("Expected <destination> and <scheme> arguments");
  }
  if (extra.length > 0) {
    throw new RunConfigError(`Unexpected argument(s): ${extra.join(" ")}`);
  }

  return {
    help,
    verbose,
    logFile,
    config: {
      destination,
      schemePath,
      root: values.root,
      composePath: values.compose,
      maxVersions: parseIntegerOption("max-versions", values["max-versions"]),
      helperImage: values["helper-image"],
      stopTimeout: parseIntegerOption("stop-timeout", values["stop-timeout"]),
    },
  };
}

export async function backupCommand(args: string[]): Promise<number> {
  let parsed: BackupArgs;
  try {
    parsed = parseBackupArgs(args);
  } catch (error) {
    ui.error(errorMessage(error));
    ui.info(`Run ${color.cyan("stowaway backup --help")} for usage`);
    return 1;
  }

  if (parsed.help || !parsed.config) {
    printHelp();
    return 0;
  }

  if (parsed.verbose) {
    setLogLevel("debug");
  }

  try {
    if (parsed.logFile) {
      setLogFile(parsed.logFile);
    }

    const config = resolveRunConfig(parsed.config);
    ui.banner("backup");

    if (!(await isDockerAvailable())) {
      ui.error("Docker is not available. Is the daemon running and the docker CLI installed?");
      return 1;
    }
    logger.debug(`Docker server version: ${(await getDockerVersion()) ?? "unknown"}`);

    const controller = new AbortController();
    let interrupted = false;
    const onSignal = (signal: NodeJS.Signals) => {
      if (interrupted) {
        ui.error(`Received ${signal} again, exiting. Check for stopped services.`);
        process.exit(130);
      }
      interrupted = true;
      ui.warn(`Received ${signal}, restarting paused services before exit (repeat to force)`);
      controller.abort();
    };

    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);

    let report: RunReport;
    try {
      report = await runBackup(config, {
        runtime: createDockerRuntime(),
        signal: controller.signal,
        onStateChange: (state) => {
          if (state === "running") ui.step("Running backup tasks");
        },
      });
    } finally {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    }

    printReport(report, config.destination);
    return exitCodeFor(report);
  } catch (error) {
    ui.error(`Backup failed: ${errorMessage(error)}`);
    if (parsed.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printReport(report: RunReport, destination: string): void {
  const totalBytes = report.artifacts.reduce((sum, a) => sum + a.sizeBytes, 0);

  ui.note(
    formatSummary([
      { label: "Status", value: report.status === "done" ? color.green("done") : color.red("failed") },
      { label: "Destination", value: destination },
      { label: "Artifacts", value: report.artifacts.length },
      { label: "Total size", value: formatBytes(totalBytes) },
      { label: "Failures", value: report.failures.length },
      { label: "Duration", value: formatDuration(report.durationMs) },
    ]),
    "Backup Summary",
  );

  if (report.artifacts.length > 0) {
    ui.message(formatArtifactTable(report.artifacts));
  }

  for (const failure of report.failures) {
    ui.error(formatFailure(failure));
  }

  for (const failure of report.resumeFailures) {
    ui.error(color.bold(formatResumeFailure(failure)));
  }

  if (report.resumeFailures.length > 0) {
    ui.cancel("Some services could not be restarted. Start them manually.");
  } else if (report.status === "done") {
    ui.outro("Backup complete!");
  } else {
    ui.cancel("Backup finished with failures");
  }
}

function printHelp(): void {
  console.log(`
${color.bold("stowaway backup")} - Back up the services of a compose project

${color.dim("USAGE:")}
  stowaway backup <destination> <scheme> [OPTIONS]

${color.dim("ARGUMENTS:")}
  <destination>                 Backup workspace directory
  <scheme>                      Backup scheme file (.yaml, .yml or .json)

${color.dim("OPTIONS:")}
  -r, --root <dir>              Directory holding the compose file (default: .)
  -f, --compose <file>          Compose file to use instead of searching --root
  -n, --max-versions <n>        Artifacts kept per target (default: 10)
      --helper-image <image>    Image used to read volumes (default: alpine:latest)
      --stop-timeout <seconds>  Graceful stop timeout (default: 30)
      --log-file <path>         Also write the log to a file
  -v, --verbose                 Verbose output
  -h, --help                    Show this help message

${color.dim("EXIT CODES:")}
  0  every target backed up
  1  one or more targets failed, or the scheme could not be used
  2  a service could not be restarted and may still be stopped

${color.dim("IMPORTANT:")} Containers with restart policy "always" or "unless-stopped"
may be restarted by Docker while their backup runs.

${color.dim("EXAMPLES:")}
  stowaway backup ./backup backup_scheme.yaml
  stowaway backup /srv/backup scheme.json --root /srv/app --max-versions 5
`);
}
