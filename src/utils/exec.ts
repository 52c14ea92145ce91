/**
 * Child process helper. Commands run without a shell; arguments are passed
 * as an array.
 */

import { execFile } from "node:child_process";

export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

const MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Run a command and resolve with its result, whatever the exit code.
 * Rejects only when the command could not be started at all.
 */
export function runCommand(
  command: string,
  args: string[],
  options: CommandOptions = {},
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      { cwd: options.cwd, env: options.env, maxBuffer: MAX_BUFFER, encoding: "utf8" },
      (err, stdout, stderr) => {
        if (err && typeof err.code !== "number") {
          // Spawn failure (ENOENT, EACCES, ...) or a signal; no exit code to report
          if (err.signal) {
            resolve({
              success: false,
              stdout: stdout.trim(),
              stderr: stderr.trim() || `${command} killed by ${err.signal}`,
              exitCode: 128,
            });
            return;
          }
          reject(err);
          return;
        }

        const exitCode = err && typeof err.code === "number" ? err.code : 0;
        resolve({
          success: exitCode === 0,
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          exitCode,
        });
      },
    );
  });
}
