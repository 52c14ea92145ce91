/**
 * Resolved backup tasks, ready to execute
 */

import type { BindMount, ContainerRuntime, NamedVolume, Service, TaskKind } from "../../../types";
import type { ArchiveWriter } from "../archive-writer";

export interface BindMountTarget {
  kind: "bind_mount";
  /** Sanitised target name, used as directory and in file names */
  name: string;
  mount: BindMount;
}

export interface VolumeTarget {
  kind: "volume";
  name: string;
  volume: NamedVolume;
}

export interface DatabaseTarget {
  kind: "mysql";
  name: string;
  database: string;
  user: string;
  password: string;
}

export type BackupTarget = BindMountTarget | VolumeTarget | DatabaseTarget;

/**
 * One scheme task after pre-flight: targets and credentials resolved,
 * pause set computed
 */
export interface ResolvedTask {
  kind: TaskKind;
  service: Service;
  pauseSet: Service[];
  targets: BackupTarget[];
}

export interface TaskContext {
  service: Service;
  runtime: ContainerRuntime;
  writer: ArchiveWriter;
  destination: string;
  helperImage: string;
  signal?: AbortSignal;
}
