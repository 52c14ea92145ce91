/**
 * Backup run type definitions
 */

import type { TaskKind } from "./scheme";

export interface Artifact {
  service: string;
  kind: TaskKind;
  target: string;
  /** Absolute path after rotation */
  path: string;
  fileName: string;
  sizeBytes: number;
  /** SHA256 of the file contents */
  checksum: string;
  createdAt: Date;
}

export type RunState =
  | "idle"
  | "loading"
  | "resolving"
  | "running"
  | "finalizing"
  | "done"
  | "failed";

export interface TaskFailure {
  code: string;
  service?: string;
  kind?: TaskKind;
  target?: string;
  message: string;
}

export interface ResumeFailureRecord {
  /** Services that could not be started again and may still be stopped */
  services: string[];
  message: string;
}

export interface RunReport {
  status: "done" | "failed";
  state: RunState;
  artifacts: Artifact[];
  failures: TaskFailure[];
  resumeFailures: ResumeFailureRecord[];
  durationMs: number;
}
