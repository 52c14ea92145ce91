/**
 * Bind mount backup: archive a host directory
 */

import { stat } from "node:fs/promises";
import * as path from "node:path";
import { isErrnoException, PathNotFoundError } from "../../../errors";
import type { Artifact, BindMount, BindMountTaskSpec, Service } from "../../../types";
import { logger } from "../../../utils/logger";
import { sanitizeTargetName } from "../../../utils/naming";
import { createTarGzip } from "../archive-creator";
import { targetDirectory } from "../workspace";
import type { BindMountTarget, TaskContext } from "./types";

function stripDotSlash(value: string): string {
  return value.replace(/^\.\/+/, "").replace(/\/+$/, "");
}

/**
 * Find a declared bind mount by compose source ("./scripts" or "scripts"),
 * absolute host path or container mount point
 */
export function findBindMount(service: Service, entry: string): BindMount | undefined {
  const wanted = stripDotSlash(entry);
  return service.bindMounts.find(
    (mount) =>
      stripDotSlash(mount.source) === wanted ||
      (path.isAbsolute(entry) && mount.hostPath === path.normalize(entry)) ||
      mount.mountPoint === entry,
  );
}

/**
 * Target name of a bind mount: its sanitised compose source, or its sanitised
 * host path when another mount of the service sanitises to the same source
 * name ("../data" and "./data", "./data" and "/data")
 */
export function bindMountTargetName(service: Service, mount: BindMount): string {
  const name = sanitizeTargetName(mount.source);
  const shared = service.bindMounts.some(
    (other) => other.hostPath !== mount.hostPath && sanitizeTargetName(other.source) === name,
  );
  return shared ? sanitizeTargetName(mount.hostPath) : name;
}

/**
 * Resolve scheme entries to targets. Returns the entries that match no
 * declared bind mount, and distinct mounts that would share a target
 * directory, as problems.
 */
export function resolveBindMountTargets(
  spec: BindMountTaskSpec,
  service: Service,
): { targets: BindMountTarget[]; problems: string[] } {
  const targets: BindMountTarget[] = [];
  const problems: string[] = [];
  const byName = new Map<string, BindMount>();

  const add = (mount: BindMount) => {
    const name = bindMountTargetName(service, mount);
    const existing = byName.get(name);
    if (existing) {
      if (existing.hostPath !== mount.hostPath) {
        problems.push(
          `Bind mounts "${existing.source}" and "${mount.source}" of "${service.name}" both map to target "${name}"`,
        );
      }
      return;
    }
    byName.set(name, mount);
    targets.push({ kind: "bind_mount", name, mount });
  };

  for (const entry of spec.bindMounts) {
    if (entry === "all") {
      service.bindMounts.forEach(add);
      continue;
    }
    const mount = findBindMount(service, entry);
    if (mount) {
      add(mount);
    } else {
      problems.push(`Service "${service.name}" declares no bind mount "${entry}"`);
    }
  }

  return { targets, problems };
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await stat(dirPath)).isDirectory();
  } catch (error) {
    if (isErrnoException(error, "ENOENT") || isErrnoException(error, "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}

export async function backupBindMount(
  target: BindMountTarget,
  context: TaskContext,
): Promise<Artifact> {
  const { hostPath } = target.mount;
  if (!(await isDirectory(hostPath))) {
    throw new PathNotFoundError(hostPath);
  }

  logger.info(`Backing up bind mount ${target.mount.source} of "${context.service.name}"`);

  return context.writer.write(
    {
      service: context.service.name,
      kind: "bind_mount",
      target: target.name,
      directory: targetDirectory(context.destination, context.service.name, "bind_mount", target.name),
      extension: "tar.gz",
    },
    (artifactPath) => createTarGzip(hostPath, artifactPath),
  );
}
