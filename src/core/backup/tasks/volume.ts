/**
 * Named volume backup through a transient helper container
 */

import * as path from "node:path";
import {
  CleanupError,
  errorMessage,
  HelperContainerError,
  VolumeNotFoundError,
} from "../../../errors";
import type {
  Artifact,
  ExecResult,
  NamedVolume,
  Service,
  VolumeTaskSpec,
} from "../../../types";
import { logger } from "../../../utils/logger";
import { sanitizeTargetName } from "../../../utils/naming";
import { targetDirectory } from "../workspace";
import type { TaskContext, VolumeTarget } from "./types";

/** Where the helper sees the target directory */
const HELPER_OUTPUT_DIR = "/backup";

/** Keeps the helper alive until it is removed */
const HELPER_IDLE_COMMAND = ["tail", "-f", "/dev/null"];

/**
 * Find a declared volume by compose name, runtime name or mount point
 */
export function findVolume(service: Service, entry: string): NamedVolume | undefined {
  return service.volumes.find(
    (volume) =>
      volume.name === entry || volume.dockerName === entry || volume.mountPoint === entry,
  );
}

export function resolveVolumeTargets(
  spec: VolumeTaskSpec,
  service: Service,
): { targets: VolumeTarget[]; problems: string[] } {
  const targets: VolumeTarget[] = [];
  const problems: string[] = [];
  const byName = new Map<string, NamedVolume>();

  const add = (volume: NamedVolume) => {
    const name = sanitizeTargetName(volume.name);
    const existing = byName.get(name);
    if (existing) {
      if (existing.dockerName !== volume.dockerName) {
        problems.push(
          `Volumes "${existing.name}" and "${volume.name}" of "${service.name}" both map to target "${name}"`,
        );
      }
      return;
    }
    byName.set(name, volume);
    targets.push({ kind: "volume", name, volume });
  };

  for (const entry of spec.volumes) {
    if (entry === "all") {
      service.volumes.forEach(add);
      continue;
    }
    const volume = findVolume(service, entry);
    if (volume) {
      add(volume);
    } else {
      problems.push(`Service "${service.name}" declares no volume "${entry}"`);
    }
  }

  return { targets, problems };
}

/**
 * Mount the volume read-only at the path the service uses, archive it from
 * inside a helper container into the host target directory, then remove the
 * helper. A failed removal is logged; the artifact is kept.
 */
export async function backupVolume(target: VolumeTarget, context: TaskContext): Promise<Artifact> {
  const { runtime, service } = context;
  const { dockerName, mountPoint } = target.volume;

  if (!(await runtime.volumeExists(dockerName))) {
    throw new VolumeNotFoundError(dockerName);
  }

  logger.info(`Backing up volume ${target.volume.name} (${dockerName}) of "${service.name}"`);

  return context.writer.write(
    {
      service: service.name,
      kind: "volume",
      target: target.name,
      directory: targetDirectory(context.destination, service.name, "volume", target.name),
      extension: "tar.gz",
    },
    async (artifactPath) => {
      let helperId: string;
      try {
        await runtime.ensureImage(context.helperImage);
        helperId = await runtime.run({
          image: context.helperImage,
          command: HELPER_IDLE_COMMAND,
          mounts: [
            { source: dockerName, target: mountPoint, readonly: true },
            { source: path.dirname(artifactPath), target: HELPER_OUTPUT_DIR },
          ],
        });
      } catch (error) {
        throw new HelperContainerError(`Failed to start helper container: ${errorMessage(error)}`, {
          cause: error,
        });
      }

      try {
        const archivePath = path.posix.join(HELPER_OUTPUT_DIR, path.basename(artifactPath));
        let result: ExecResult;
        try {
          result = await runtime.exec(helperId, ["tar", "-czf", archivePath, "-C", mountPoint, "."]);
        } catch (error) {
          throw new HelperContainerError(`Archive command failed: ${errorMessage(error)}`, {
            cause: error,
          });
        }
        if (result.exitCode !== 0) {
          throw new HelperContainerError(
            `Archive command exited with code ${result.exitCode}: ${result.stderr || result.stdout}`,
          );
        }
      } finally {
        await removeHelper(context, helperId);
      }
    },
  );
}

async function removeHelper(context: TaskContext, helperId: string): Promise<void> {
  try {
    await context.runtime.remove(helperId);
  } catch (error) {
    const cleanupError = new CleanupError(
      `Failed to remove helper container ${helperId}: ${errorMessage(error)}`,
      { cause: error },
    );
    logger.warn(cleanupError.message);
  }
}
