import { parseArgs } from "node:util";
import { createAlertSink } from "../../alerts";
import { ConfigError, findAndLoadConfig } from "../../config";
import {
  acquireRunLock,
  cleanupScratch,
  cleanupScratchSync,
  ensureRunDirectories,
  errorMessage,
  PreconditionError,
  type RunLock,
  runBackups,
} from "../../core";
import { RunStateStore } from "../../state";
import { createRemoteStore } from "../../storage";
import type { AlertSink, CloudConfig, RemoteStore, ShelfConfig } from "../../types";
import { formatDuration, initLogLevelFromEnv, logger, setLogLevel } from "../../utils";
import { color, formatReport, formatSummary, ui } from "../ui";

/**
 * Collaborators the command builds from config; replaced in tests
 */
export interface BackupCommandDeps {
  createRemoteStore?: (cloud: CloudConfig) => RemoteStore;
  createAlertSink?: (cloud: CloudConfig) => AlertSink;
  /** Directory searched for a config file when --config is absent */
  cwd?: string;
  now?: () => Date;
}

const SIGINT_EXIT_CODE = 130;
const SIGTERM_EXIT_CODE = 143;

async function checkPreconditions(store: RemoteStore): Promise<void> {
  if (!(await store.isToolAvailable())) {
    throw new PreconditionError("rclone not installed");
  }
  if (!(await store.isReachable())) {
    throw new PreconditionError(`rclone remote '${store.label}' is not accessible`);
  }
}

export async function backupCommand(args: string[], deps: BackupCommandDeps = {}): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      "dry-run": { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  initLogLevelFromEnv();
  if (values.verbose) {
    setLogLevel("debug");
  }

  const dryRun = values["dry-run"];
  ui.intro("dbshelf backup");
  if (dryRun) {
    ui.warn("Dry-run mode enabled: no actions will be executed");
  }

  let config: ShelfConfig;
  try {
    config = await findAndLoadConfig(values.config, deps.cwd);
  } catch (error) {
    if (error instanceof ConfigError) {
      ui.error(error.message);
      return 1;
    }
    throw error;
  }

  const store = (deps.createRemoteStore ?? createRemoteStore)(config.cloud);
  const alerts = (deps.createAlertSink ?? createAlertSink)(config.cloud);
  const { scratchDir, stateDir } = config.paths;

  let lock: RunLock | null = null;

  // Scratch is only ours to clean once we hold the lock
  const onSignal = (signal: NodeJS.Signals) => {
    if (lock) {
      cleanupScratchSync(scratchDir);
      lock.releaseSync();
    }
    process.exit(signal === "SIGINT" ? SIGINT_EXIT_CODE : SIGTERM_EXIT_CODE);
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    await ensureRunDirectories(config.paths);
    lock = await acquireRunLock(stateDir);
    await checkPreconditions(store);

    const report = await runBackups(
      config,
      { store, alerts, state: new RunStateStore(stateDir) },
      { now: deps.now?.() ?? new Date(), dryRun },
    );

    ui.note(formatReport(report), "Objects");
    ui.note(
      formatSummary([
        { label: "Remote", value: store.label },
        { label: "Backed up", value: report.done },
        { label: "Skipped", value: report.skipped },
        { label: "Failed", value: report.failed },
        { label: "Duration", value: formatDuration(report.durationMs) },
      ]),
      "Backup Summary",
    );

    if (dryRun) {
      ui.warn("[DRY RUN] No changes were made.");
    } else if (report.done > 0) {
      ui.success(`${report.done} object(s) uploaded to ${store.label}`);
    }
    if (report.failed > 0) {
      ui.warn(`${report.failed} object(s) failed; alerts were sent where configured.`);
    }

    ui.outro("Backup run complete!");
    return 0;
  } catch (error) {
    const message = errorMessage(error);
    ui.error(`Backup run aborted: ${message}`);
    if (!(error instanceof PreconditionError)) {
      logger.debug("Unexpected failure", error);
    }
    await alerts.notify(`❗${message}`);
    return 1;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    if (lock) {
      const held = lock;
      try {
        await cleanupScratch(scratchDir);
      } catch (error) {
        logger.warn(`Could not clean scratch directory ${scratchDir}:`, error);
      } finally {
        await held.release();
      }
    }
  }
}

export function printHelp(): void {
  console.log(`
${color.bold("dbshelf")} - Back up database files to an rclone remote

${color.dim("USAGE:")}
  dbshelf [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./backups.ini)
      --dry-run           Show what would be done without doing it
  -v, --verbose           Verbose output
  -h, --help              Show this help message
      --version           Show version

${color.dim("ENVIRONMENT:")}
  LOG_LEVEL               debug, info, warn or error (default: info)

${color.dim("EXAMPLES:")}
  dbshelf                           # Back up every due object
  dbshelf --dry-run                 # Preview without side effects
  dbshelf -c /etc/dbshelf/backups.ini
`);
}
