/**
 * Backup task dispatch
 */

import { SchemeInvalidError } from "../../../errors";
import type { Artifact, PauseSpec, Service, TaskSpec } from "../../../types";
import type { TopologyIndex } from "../../topology";
import { backupBindMount, resolveBindMountTargets } from "./bind-mount";
import { dumpDatabase, resolveDatabaseTarget } from "./mysql";
import type { BackupTarget, ResolvedTask, TaskContext } from "./types";
import { backupVolume, resolveVolumeTargets } from "./volume";

export type {
  BackupTarget,
  BindMountTarget,
  DatabaseTarget,
  ResolvedTask,
  TaskContext,
  VolumeTarget,
} from "./types";
export { buildDumpCommand } from "./mysql";
export { findBindMount } from "./bind-mount";
export { findVolume } from "./volume";

/**
 * Services a task stops while it runs
 */
export function resolvePauseSet(
  pause: PauseSpec,
  service: Service,
  index: TopologyIndex,
): Service[] {
  if (pause === "none") return [];
  if (pause === "service") return [service];
  return pause.map((name) => index.resolve(name));
}

function resolveTargets(
  spec: TaskSpec,
  service: Service,
  index: TopologyIndex,
  pauseSet: Service[],
): { targets: BackupTarget[]; problems: string[] } {
  switch (spec.kind) {
    case "bind_mount":
      return resolveBindMountTargets(spec, service);
    case "volume":
      return resolveVolumeTargets(spec, service);
    case "mysql": {
      // The dump runs inside the service, so it has to stay up
      const problems = pauseSet.some((s) => s.containerName === service.containerName)
        ? [`mysql task of "${service.name}" cannot pause its own service`]
        : [];
      return { targets: [resolveDatabaseTarget(spec, index)], problems };
    }
  }
}

/**
 * Resolve one scheme task against the topology. Throws SchemeInvalidError,
 * ServiceNotFoundError or KeyResolutionError; nothing is touched.
 */
export function resolveTask(
  spec: TaskSpec,
  service: Service,
  index: TopologyIndex,
  defaultPause: PauseSpec,
): ResolvedTask {
  const pauseSet = resolvePauseSet(spec.pause ?? defaultPause, service, index);
  const { targets, problems } = resolveTargets(spec, service, index, pauseSet);

  if (problems.length > 0) {
    throw new SchemeInvalidError(`Invalid ${spec.kind} task for "${service.name}"`, problems);
  }

  return { kind: spec.kind, service, pauseSet, targets };
}

/**
 * Produce the artifact of one target
 */
export function executeTarget(target: BackupTarget, context: TaskContext): Promise<Artifact> {
  switch (target.kind) {
    case "bind_mount":
      return backupBindMount(target, context);
    case "volume":
      return backupVolume(target, context);
    case "mysql":
      return dumpDatabase(target, context);
  }
}
