/**
 * Configuration type definitions for Stowaway
 */

import type { PauseSpec, TaskKind } from "./scheme";

export interface RunConfig {
  /** Root of the backup workspace */
  destination: string;
  /** Backup scheme file (.json, .yaml, .yml) */
  schemePath: string;
  /** Compose file; found under `root` when not set */
  composePath?: string;
  /** Directory searched for the compose file */
  root: string;
  /** Artifacts kept per backup target */
  maxVersions: number;
  /** Image of the transient container used for volume backups */
  helperImage: string;
  /** Seconds to wait for a graceful container stop */
  stopTimeout: number;
  /** Default pause behaviour per task kind, overridden by a task's own `pause` */
  pause: Record<TaskKind, PauseSpec>;
}
