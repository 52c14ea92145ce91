/**
 * Backup orchestration
 *
 * idle -> loading -> resolving -> running -> finalizing -> done | failed
 *
 * Loading and resolving touch no container: any error there ends the run.
 * While running, each task gets its own pause window and each target fails
 * on its own.
 */

import * as path from "node:path";
import { loadScheme as loadSchemeFile } from "../../config/loader";
import { findComposeFile, loadTopology as loadComposeTopology } from "../../docker/compose";
import {
  CancelledError,
  errorCode,
  errorMessage,
  ResumeFailureError,
  RotationError,
  throwIfCancelled,
} from "../../errors";
import type {
  Artifact,
  BackupScheme,
  ContainerRuntime,
  RunConfig,
  RunReport,
  RunState,
  Service,
  TaskFailure,
  Topology,
} from "../../types";
import { formatBytes, formatDuration } from "../../utils/format";
import { logger } from "../../utils/logger";
import { LifecycleCoordinator } from "../lifecycle";
import { TopologyIndex } from "../topology";
import { rotate } from "../versioning";
import { ArchiveWriter } from "./archive-writer";
import { type BackupTarget, executeTarget, type ResolvedTask, resolveTask, type TaskContext } from "./tasks";
import { createServiceDirectories, targetDirectory } from "./workspace";

export interface BackupOptions {
  runtime: ContainerRuntime;
  /** Aborting skips the remaining tasks once paused services are running again */
  signal?: AbortSignal;
  onStateChange?: (state: RunState) => void;
  loadScheme?: (schemePath: string) => Promise<BackupScheme>;
  loadTopology?: (config: RunConfig) => Promise<Topology>;
  clock?: () => Date;
}

interface ServicePlan {
  service: Service;
  tasks: ResolvedTask[];
}

function defaultTopologyLoader(config: RunConfig): Promise<Topology> {
  return loadComposeTopology(config.composePath ?? findComposeFile(config.root));
}

function toFailure(error: unknown, task?: ResolvedTask, target?: BackupTarget): TaskFailure {
  return {
    code: errorCode(error),
    service: task?.service.name,
    kind: task?.kind,
    target: target?.name,
    message: errorMessage(error),
  };
}

export async function runBackup(config: RunConfig, options: BackupOptions): Promise<RunReport> {
  const startTime = Date.now();
  const { runtime, signal } = options;

  let state: RunState = "idle";
  const transition = (next: RunState) => {
    state = next;
    logger.debug(`Run state: ${next}`);
    options.onStateChange?.(next);
  };

  const artifacts: Artifact[] = [];
  const failures: TaskFailure[] = [];
  const resumeFailures: RunReport["resumeFailures"] = [];

  const finish = (): RunReport => {
    transition("finalizing");
    const failed = failures.length > 0 || resumeFailures.length > 0;
    transition(failed ? "failed" : "done");

    const durationMs = Date.now() - startTime;
    const totalBytes = artifacts.reduce((sum, a) => sum + a.sizeBytes, 0);
    logger.info(
      `Backup run ${failed ? "failed" : "completed"} in ${formatDuration(durationMs)}: ` +
        `${artifacts.length} artifact(s), ${formatBytes(totalBytes)}, ${failures.length} failure(s)`,
    );

    return {
      status: failed ? "failed" : "done",
      state,
      artifacts,
      failures,
      resumeFailures,
      durationMs,
    };
  };

  // Loading
  transition("loading");
  let scheme: BackupScheme;
  let topology: Topology;
  try {
    scheme = await (options.loadScheme ?? loadSchemeFile)(config.schemePath);
    topology = await (options.loadTopology ?? defaultTopologyLoader)(config);
  } catch (error) {
    logger.error(`Cannot load backup run: ${errorMessage(error)}`);
    failures.push(toFailure(error));
    return finish();
  }

  // Resolving
  transition("resolving");
  const plan: ServicePlan[] = [];
  try {
    const index = new TopologyIndex(topology);
    for (const entry of scheme) {
      const service = index.resolve(entry.service);
      const tasks = entry.tasks.map((spec) =>
        resolveTask(spec, service, index, config.pause[spec.kind]),
      );
      plan.push({ service, tasks });
    }

    for (const { service, tasks } of plan) {
      await createServiceDirectories(
        config.destination,
        service.name,
        tasks.map((task) => task.kind),
      );
    }
  } catch (error) {
    logger.error(`Cannot resolve backup scheme: ${errorMessage(error)}`);
    failures.push(toFailure(error));
    return finish();
  }

  // Running
  transition("running");
  const coordinator = new LifecycleCoordinator(runtime, { stopTimeout: config.stopTimeout });
  const writer = new ArchiveWriter(options.clock);

  const backupTarget = async (task: ResolvedTask, target: BackupTarget, context: TaskContext) => {
    let artifact = await executeTarget(target, context);

    try {
      const directory = targetDirectory(config.destination, task.service.name, task.kind, target.name);
      const rotation = await rotate(directory, config.maxVersions);
      const renamed = rotation.renamed.get(artifact.fileName);
      if (renamed) {
        artifact = { ...artifact, fileName: renamed, path: path.join(directory, renamed) };
      }
    } catch (error) {
      const rotationError =
        error instanceof RotationError
          ? error
          : new RotationError(errorMessage(error), { cause: error });
      logger.error(`Rotation failed for ${target.name}: ${rotationError.message}`);
      failures.push(toFailure(rotationError, task, target));
    }

    artifacts.push(artifact);
    logger.info(`Backed up ${task.service.name}/${target.name}: ${artifact.fileName}`);
  };

  const runTask = async (task: ResolvedTask, taskSignal: AbortSignal | undefined) => {
    const context: TaskContext = {
      service: task.service,
      runtime,
      writer,
      destination: config.destination,
      helperImage: config.helperImage,
      signal: taskSignal,
    };

    for (const target of task.targets) {
      throwIfCancelled(taskSignal);
      try {
        await backupTarget(task, target, context);
      } catch (error) {
        logger.error(
          `Backup of ${task.service.name}/${target.name} (${task.kind}) failed: ${errorMessage(error)}`,
        );
        failures.push(toFailure(error, task, target));
      }
    }
  };

  run: for (const { service, tasks } of plan) {
    logger.info(`Backing up service "${service.name}" (${tasks.length} task(s))`);

    for (const task of tasks) {
      try {
        throwIfCancelled(signal);
        await coordinator.withPaused(task.pauseSet, (taskSignal) => runTask(task, taskSignal), signal);
      } catch (error) {
        let cause = error;
        if (error instanceof ResumeFailureError) {
          resumeFailures.push({ services: error.services, message: error.message });
          if (error.cause === undefined) continue;
          cause = error.cause;
        }

        if (cause instanceof CancelledError) {
          logger.warn("Backup run cancelled, skipping remaining tasks");
          failures.push(toFailure(cause));
          break run;
        }
        failures.push(toFailure(cause, task));
      }
    }
  }

  return finish();
}
