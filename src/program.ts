import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { Command, Option } from "commander";
import { z } from "zod";
import { getConfig, loadProjectConfig } from "./config.js";
import { errorMessage, LifecycleError, OrchestratorError, ValidationError } from "./errors.js";
import { cancelActiveRun, readActiveRun, startBackgroundRun } from "./lifecycle/background.js";
import { releaseMarker, writeMarker } from "./lifecycle/marker.js";
import { isVerifyMode, runVerification, VERIFY_MODES } from "./lifecycle/verify.js";
import { Orchestrator } from "./orchestrator.js";
import { RunStore } from "./persistence/store.js";
import { defaultReportPath, initProject, isInitialized, resolveLayout } from "./project/layout.js";
import { parseOrThrow } from "./schemas.js";
import { log, setLogLevel } from "./utils/logger.js";

/** Where commands print and how they report their exit status. */
export type ProgramIO = {
  out: (line: string) => void;
  err: (line: string) => void;
  setExitCode: (code: number) => void;
  /** Project root (default: process.cwd() at invocation). */
  cwd?: string;
};

type GlobalOptions = { debug?: boolean; quiet?: boolean };
type RunCommandOptions = { report?: string; quiet?: boolean; background?: boolean };
type HistoryOptions = { limit: string };

const EXIT_FAILED = 1;
const EXIT_MISSION_ERROR = 2;

const PackageJsonSchema = z.object({ version: z.string() });

export function readVersion(): string {
  try {
    const raw = readFileSync(new URL("../package.json", import.meta.url), "utf-8");
    return parseOrThrow(PackageJsonSchema, JSON.parse(raw), "package.json").version;
  } catch (err) {
    log.debug("Could not read package version", { error: errorMessage(err) });
    return "0.0.0";
  }
}

const defaultIO: ProgramIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

export function buildProgram(io: ProgramIO = defaultIO): Command {
  const layout = () => resolveLayout(io.cwd ?? process.cwd());
  const version = readVersion();
  const program = new Command();

  program
    .name("missionctl")
    .description("Run dependency- and lock-aware shell task graphs")
    .version(version)
    .option("--debug", "Enable debug logging");

  program.hook("preAction", async (_cmd, actionCmd) => {
    const opts: GlobalOptions = actionCmd.optsWithGlobals();
    const config = await loadProjectConfig(layout().configPath);
    setLogLevel(opts.debug ? "debug" : opts.quiet ? "warn" : config.logLevel);
  });

  // --- version ---
  program
    .command("version")
    .description("Show version")
    .action(() => {
      io.out(version);
    });

  // --- init ---
  program
    .command("init")
    .description("Create the .missionctl state directory in the current project")
    .action(async () => {
      const paths = layout();
      const { configCreated } = await initProject(paths);
      io.out(`initialized: ${paths.home}`);
      if (!configCreated) log.debug("Kept existing config", { path: paths.configPath });
    });

  // --- run ---
  program
    .command("run")
    .description("Run a mission in the foreground")
    .argument("<mission>", "Mission definition (JSON)")
    .option("-r, --report <path>", "Report output path")
    .option("-q, --quiet", "Only print the final summary")
    .addOption(new Option("--background", "Running as the detached child of `start`").hideHelp())
    .action(async (missionPath: string, opts: RunCommandOptions) => {
      const paths = layout();
      const controller = new AbortController();
      const onSignal = (sig: NodeJS.Signals): void => {
        log.warn(`Received ${sig}, cancelling mission`);
        controller.abort();
      };
      process.once("SIGINT", onSignal);
      process.once("SIGTERM", onSignal);

      const missionFile = resolve(paths.root, missionPath);
      const reportPath = opts.report ? resolve(paths.root, opts.report) : defaultReportPath(paths, opts.background);
      const store = isInitialized(paths) ? new RunStore(paths.historyPath) : undefined;
      try {
        if (opts.background) {
          await writeMarker(paths.markerPath, {
            pid: process.pid,
            mission: missionFile,
            report: reportPath,
            log: paths.activeLogPath,
            started_at: new Date().toISOString(),
          });
        }
        const orch = new Orchestrator({ cwd: paths.root, store });
        const mission = await orch.load(missionFile);
        const run = await orch.run(mission, { reportPath, signal: controller.signal });

        io.out(`status: ${run.report.status}`);
        io.out(`duration_sec: ${run.report.duration_sec}`);
        io.out(`report: ${run.reportPath}`);
        if (run.report.cancelled) {
          io.setExitCode(getConfig().runner.cancelExitCode);
        } else {
          io.setExitCode(run.report.status === "succeeded" ? 0 : EXIT_FAILED);
        }
      } catch (err) {
        if (!(err instanceof OrchestratorError)) throw err;
        io.err(err instanceof ValidationError ? err.message : `mission error: ${err.message}`);
        io.setExitCode(EXIT_MISSION_ERROR);
      } finally {
        process.off("SIGINT", onSignal);
        process.off("SIGTERM", onSignal);
        store?.close();
        if (opts.background) await releaseMarker(paths.markerPath, process.pid);
      }
    });

  // --- start ---
  program
    .command("start")
    .description("Run a mission in the background")
    .argument("<mission>", "Mission definition (JSON)")
    .option("-r, --report <path>", "Report output path")
    .option("-q, --quiet", "Only log the final summary")
    .action(async (missionPath: string, opts: RunCommandOptions) => {
      try {
        const started = await startBackgroundRun({
          layout: layout(),
          missionPath,
          reportPath: opts.report,
          quiet: opts.quiet,
        });
        io.out(`started mission pid=${started.pid}`);
        io.out(`log=${started.log}`);
        io.out(`report=${started.report}`);
        if (started.exited) io.out("mission already finished; see log");
      } catch (err) {
        if (!(err instanceof LifecycleError)) throw err;
        io.err(err.message);
        io.setExitCode(EXIT_FAILED);
      }
    });

  // --- cancel ---
  program
    .command("cancel")
    .description("Stop the active background mission")
    .action(async () => {
      const outcome = await cancelActiveRun(layout());
      switch (outcome.status) {
        case "none":
          io.out("no active mission");
          break;
        case "stale":
          io.out(`process not running; cleaned stale marker (pid ${outcome.pid})`);
          break;
        case "stopped":
          io.out(`stopped mission pid=${outcome.pid}${outcome.forced ? " (killed)" : ""}`);
          break;
      }
    });

  // --- status ---
  program
    .command("status")
    .description("Show the active background mission")
    .action(async () => {
      const active = await readActiveRun(layout());
      if (!active) {
        io.out("no active mission");
        return;
      }
      const { marker } = active;
      io.out(active.alive ? `active mission pid=${marker.pid}` : `stale marker pid=${marker.pid} (not running)`);
      io.out(`mission=${marker.mission}`);
      io.out(`log=${marker.log}`);
      io.out(`report=${marker.report}`);
      io.out(`started_at=${marker.started_at}`);
    });

  // --- history ---
  program
    .command("history")
    .description("List recorded mission runs")
    .option("-n, --limit <n>", "Number of runs to show", "10")
    .action((opts: HistoryOptions) => {
      const paths = layout();
      if (!isInitialized(paths)) {
        io.out("no runs recorded (project not initialized)");
        return;
      }
      const limit = Number.parseInt(opts.limit, 10);
      const store = new RunStore(paths.historyPath);
      try {
        const runs = store.list(Number.isInteger(limit) && limit > 0 ? limit : 10);
        if (runs.length === 0) io.out("no runs recorded");
        for (const run of runs) {
          const status = run.cancelled ? `${run.status} (cancelled)` : run.status;
          const failed = run.failedOrBlocked.length > 0 ? `  [${run.failedOrBlocked.join(", ")}]` : "";
          io.out(`${run.startedAt}  ${status}  ${run.durationSec}s  ${run.missionPath}${failed}`);
        }
      } finally {
        store.close();
      }
    });

  // --- verify ---
  program
    .command("verify")
    .description("Run the bundled reference mission")
    .argument("[mode]", `Verification mode (${VERIFY_MODES.join(", ")})`, "parallel")
    .action(async (mode: string) => {
      if (!isVerifyMode(mode)) {
        io.out(`unsupported verify mode: ${mode}`);
        io.out(`supported: ${VERIFY_MODES.join(", ")}`);
        io.setExitCode(EXIT_MISSION_ERROR);
        return;
      }
      const { ok, run } = await runVerification(mode, layout());
      io.out(`status=${run.report.status}`);
      io.out(`duration_sec=${run.report.duration_sec}`);
      io.out(`failed_or_blocked=[${run.report.failed_or_blocked.join(", ")}]`);
      io.out(`report=${run.reportPath}`);
      io.setExitCode(ok ? 0 : EXIT_FAILED);
    });

  return program;
}
