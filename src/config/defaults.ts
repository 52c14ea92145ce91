/**
 * Default configuration values
 */

import type { PauseSpec, RunConfig, TaskKind } from "../types";

/**
 * What each task kind stops by default. Volumes and bind mounts hold files
 * the owning process writes to; a database dump is consistent on its own.
 */
export const DEFAULT_PAUSE: Record<TaskKind, PauseSpec> = {
  bind_mount: "service",
  volume: "service",
  mysql: "none",
};

export const DEFAULT_CONFIG: Omit<RunConfig, "destination" | "schemePath" | "root"> = {
  maxVersions: 10,
  helperImage: "alpine:latest",
  stopTimeout: 30,
  pause: DEFAULT_PAUSE,
};

/** Directory per task kind inside a service's backup directory */
export const TASK_KIND_DIRS: Record<TaskKind, string> = {
  bind_mount: "bind_mounts",
  volume: "volumes",
  mysql: "mysql_databases",
};
