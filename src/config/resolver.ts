/**
 * Run configuration resolution
 */

import * as path from "node:path";
import type { RunConfig } from "../types";
import { DEFAULT_CONFIG } from "./defaults";

export type RunConfigInput = Pick<RunConfig, "destination" | "schemePath"> &
  Partial<Omit<RunConfig, "destination" | "schemePath">>;

export class RunConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RunConfigError";
  }
}

/**
 * Fill in defaults and resolve relative paths against `cwd`
 */
export function resolveRunConfig(input: RunConfigInput, cwd: string = process.cwd()): RunConfig {
  const maxVersions = input.maxVersions ?? DEFAULT_CONFIG.maxVersions;
  if (!Number.isInteger(maxVersions) || maxVersions < 1) {
    throw new RunConfigError(`maxVersions must be a positive integer (got ${maxVersions})`);
  }

  const stopTimeout = input.stopTimeout ?? DEFAULT_CONFIG.stopTimeout;
  if (!Number.isInteger(stopTimeout) || stopTimeout < 0) {
    throw new RunConfigError(`stopTimeout must be a non-negative integer (got ${stopTimeout})`);
  }

  return {
    destination: path.resolve(cwd, input.destination),
    schemePath: path.resolve(cwd, input.schemePath),
    root: path.resolve(cwd, input.root ?? "."),
    composePath: input.composePath ? path.resolve(cwd, input.composePath) : undefined,
    maxVersions,
    helperImage: input.helperImage || DEFAULT_CONFIG.helperImage,
    stopTimeout,
    pause: { ...DEFAULT_CONFIG.pause, ...input.pause },
  };
}
