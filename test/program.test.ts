import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { resetConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";
import { buildProgram } from "../src/program.js";
import { setLogLevel, setLogSink } from "../src/utils/logger.js";

type Captured = { out: string[]; err: string[]; exitCode: number | undefined };

describe("missionctl commands", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "missionctl-cli-"));
    setLogSink(() => undefined);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    resetConfig();
    setLogLevel("info");
    setLogSink();
  });

  async function cli(...args: string[]): Promise<Captured> {
    const captured: Captured = { out: [], err: [], exitCode: undefined };
    const program = buildProgram({
      cwd: dir,
      out: (line) => captured.out.push(line),
      err: (line) => captured.err.push(line),
      setExitCode: (code) => {
        captured.exitCode = code;
      },
    });
    program.exitOverride();
    await program.parseAsync(args, { from: "user" });
    return captured;
  }

  function writeMission(name: string, raw: Record<string, unknown>): void {
    writeFileSync(join(dir, name), JSON.stringify(raw));
  }

  it("prints the package version", async () => {
    expect((await cli("version")).out).toEqual(["0.1.0"]);
  });

  it("initializes the project without touching an existing config", async () => {
    const home = join(dir, ".missionctl");
    expect((await cli("init")).out).toEqual([`initialized: ${home}`]);
    for (const sub of ["state", "missions", "reports", "logs", "locks"]) {
      expect(existsSync(join(home, sub))).toBe(true);
    }
    expect(JSON.parse(readFileSync(join(home, "config.json"), "utf-8"))).toEqual({
      default_mode: "balanced",
      default_timeout_sec: 300,
    });

    writeFileSync(join(home, "config.json"), JSON.stringify({ default_mode: "fast" }));
    await cli("init");
    expect(JSON.parse(readFileSync(join(home, "config.json"), "utf-8"))).toEqual({ default_mode: "fast" });
  });

  it("runs a mission in the foreground", async () => {
    writeMission("ok.json", { tasks: [{ id: "a", command: "echo hi" }] });
    const result = await cli("run", "ok.json");

    expect(result.exitCode).toBe(0);
    expect(result.out[0]).toBe("status: succeeded");
    expect(result.out[1].startsWith("duration_sec: ")).toBe(true);
    expect(result.out[2]).toBe(`report: ${join(dir, "mission-report.json")}`);
    expect(existsSync(join(dir, "mission-report.json"))).toBe(true);
  });

  it("exits 1 when the mission fails", async () => {
    writeMission("bad.json", { default_retries: 0, tasks: [{ id: "a", command: "exit 5" }] });
    const result = await cli("run", "bad.json", "--report", "out/r.json");

    expect(result.exitCode).toBe(1);
    expect(result.out[0]).toBe("status: failed");
    expect(result.out[2]).toBe(`report: ${join(dir, "out", "r.json")}`);
  });

  it("exits 2 and lists every issue for an invalid mission", async () => {
    writeMission("invalid.json", {
      tasks: [
        { id: "a", command: "" },
        { id: "b", command: "true", depends_on: ["nope"] },
      ],
    });
    const result = await cli("run", "invalid.json");

    expect(result.exitCode).toBe(2);
    expect(result.err).toEqual([
      'Invalid mission (2 issues):\n  - tasks[0].command: must be a non-empty string\n  - task "b" depends on unknown task "nope"',
    ]);
    expect(existsSync(join(dir, "mission-report.json"))).toBe(false);
  });

  it("records runs of an initialized project in history", async () => {
    await cli("init");
    writeMission("ok.json", { tasks: [{ id: "a", command: "true" }] });
    const run = await cli("run", "ok.json");
    expect(run.out[2]).toBe(`report: ${join(dir, ".missionctl", "reports", "last-report.json")}`);

    const history = await cli("history");
    expect(history.out).toHaveLength(1);
    expect(history.out[0]).toContain("  succeeded  ");
    expect(history.out[0].endsWith(join(dir, "ok.json"))).toBe(true);
  });

  it("reports nothing to cancel or show without an active run", async () => {
    expect((await cli("cancel")).out).toEqual(["no active mission"]);
    expect((await cli("status")).out).toEqual(["no active mission"]);
    expect((await cli("history")).out).toEqual(["no runs recorded (project not initialized)"]);
  });

  it("rejects unknown verify modes", async () => {
    const result = await cli("verify", "serial");
    expect(result.out).toEqual(["unsupported verify mode: serial", "supported: parallel"]);
    expect(result.exitCode).toBe(2);
  });

  it("fails on an invalid project config", async () => {
    await cli("init");
    writeFileSync(join(dir, ".missionctl", "config.json"), JSON.stringify({ default_mode: "turbo" }));
    await expect(cli("status")).rejects.toBeInstanceOf(ConfigError);
  });
});
