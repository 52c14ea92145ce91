import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { backupCommand, parseBackupArgs } from "../../src/cli/commands/backup";
import { RunConfigError } from "../../src/config";
import { isDockerAvailable } from "../../src/docker/client";

vi.mock("../../src/docker/client", () => ({
  createDockerRuntime: vi.fn(),
  getDockerVersion: vi.fn(),
  isDockerAvailable: vi.fn(),
}));

describe("parseBackupArgs", () => {
  test("takes destination and scheme as positionals", () => {
    expect(parseBackupArgs(["./backup", "scheme.yaml"])).toEqual({
      help: false,
      verbose: false,
      logFile: undefined,
      config: {
        destination: "./backup",
        schemePath: "scheme.yaml",
        root: undefined,
        composePath: undefined,
        maxVersions: undefined,
        helperImage: undefined,
        stopTimeout: undefined,
      },
    });
  });

  test("parses every option", () => {
    const parsed = parseBackupArgs([
      "./backup",
      "scheme.yaml",
      "-r",
      "./app",
      "-f",
      "./app/compose.yml",
      "-n",
      "3",
      "--helper-image",
      "busybox:latest",
      "--stop-timeout",
      "5",
      "--log-file",
      "backup.log",
      "-v",
    ]);

    expect(parsed.verbose).toBe(true);
    expect(parsed.logFile).toBe("backup.log");
    expect(parsed.config).toEqual({
      destination: "./backup",
      schemePath: "scheme.yaml",
      root: "./app",
      composePath: "./app/compose.yml",
      maxVersions: 3,
      helperImage: "busybox:latest",
      stopTimeout: 5,
    });
  });

  test("help needs no positionals", () => {
    expect(parseBackupArgs(["--help"])).toEqual({ help: true, verbose: false, logFile: undefined });
  });

  test("rejects a missing scheme", () => {
    expect(() => parseBackupArgs(["./backup"])).toThrow(
      new RunConfigError("Expected <destination> and <scheme> arguments"),
    );
  });

  test("rejects extra positionals", () => {
    expect(() => parseBackupArgs(["./backup", "scheme.yaml", "more"])).toThrow(
      "Unexpected argument(s): more",
    );
  });

  test("rejects non-numeric versions", () => {
    expect(() => parseBackupArgs(["./backup", "scheme.yaml", "-n", "three"])).toThrow(
      '--max-versions must be a non-negative integer (got "three")',
    );
  });

  test("rejects unknown options", () => {
    expect(() => parseBackupArgs(["./backup", "scheme.yaml", "--dry-run"])).toThrow();
  });
});

describe("backupCommand", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(process.stdout, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("returns 0 for --help", async () => {
    expect(await backupCommand(["--help"])).toBe(0);
  });

  test("returns 1 for bad arguments", async () => {
    expect(await backupCommand(["./backup"])).toBe(1);
    expect(isDockerAvailable).not.toHaveBeenCalled();
  });

  test("returns 1 for an invalid max-versions value", async () => {
    expect(await backupCommand(["./backup", "scheme.yaml", "-n", "0"])).toBe(1);
    expect(isDockerAvailable).not.toHaveBeenCalled();
  });

  test("returns 1 when docker is unavailable", async () => {
    vi.mocked(isDockerAvailable).mockResolvedValue(false);

    const code = await backupCommand([
      path.join("tmp", "backup"),
      "scheme.yaml",
    ]);

    expect(code).toBe(1);
    expect(isDockerAvailable).toHaveBeenCalledTimes(1);
  });
});
