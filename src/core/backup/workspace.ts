/**
 * Backup workspace layout: <destination>/<service>/<kind dir>/<target>
 */

import { mkdir } from "node:fs/promises";
import * as path from "node:path";
import { TASK_KIND_DIRS } from "../../config/defaults";
import { ArchiveError, errorMessage } from "../../errors";
import type { TaskKind } from "../../types";

export function serviceDirectory(destination: string, service: string): string {
  return path.join(destination, service);
}

export function targetDirectory(
  destination: string,
  service: string,
  kind: TaskKind,
  target: string,
): string {
  return path.join(destination, service, TASK_KIND_DIRS[kind], target);
}

/**
 * Create the kind directories a service's tasks write into
 */
export async function createServiceDirectories(
  destination: string,
  service: string,
  kinds: Iterable<TaskKind>,
): Promise<void> {
  for (const kind of new Set(kinds)) {
    const directory = path.join(serviceDirectory(destination, service), TASK_KIND_DIRS[kind]);
    try {
      await mkdir(directory, { recursive: true });
    } catch (error) {
      throw new ArchiveError(`Cannot create ${directory}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
