/**
 * Version rotation for one backup target directory
 */

import type { Dirent } from "node:fs";
import { readdir, rename, unlink } from "node:fs/promises";
import * as path from "node:path";
import { errorMessage, RotationError } from "../../errors";
import { logger } from "../../utils/logger";
import {
  compareArtifactAge,
  type ParsedArtifactName,
  parseArtifactName,
  versionedArtifactName,
} from "../../utils/naming";

export interface RotationResult {
  /** File names removed because they exceeded maxVersions, oldest first */
  evicted: string[];
  /** Old file name to new file name, for every artifact that was renamed */
  renamed: Map<string, string>;
  /** File names left in the directory, newest first */
  kept: string[];
}

interface ListedArtifact {
  fileName: string;
  parsed: ParsedArtifactName;
}

/**
 * Evict the oldest artifacts beyond maxVersions, then number the rest
 * `.v0` (newest) to `.v<n-1>` (oldest). Running it again without a new
 * artifact changes nothing.
 */
export async function rotate(directory: string, maxVersions: number): Promise<RotationResult> {
  if (!Number.isInteger(maxVersions) || maxVersions < 1) {
    throw new RotationError(`maxVersions must be a positive integer, got ${maxVersions}`);
  }

  const artifacts = await listArtifacts(directory);
  artifacts.sort((a, b) => compareArtifactAge(a.parsed, b.parsed));

  const excess = Math.max(0, artifacts.length - maxVersions);
  const evicted = artifacts.slice(0, excess);
  const remaining = artifacts.slice(excess);

  for (const artifact of evicted) {
    try {
      await unlink(path.join(directory, artifact.fileName));
      logger.info(`Evicted old version ${artifact.fileName}`);
    } catch (error) {
      throw new RotationError(`Cannot remove ${artifact.fileName}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  // Oldest first; every stem is distinct so no rename can land on another file
  const renamed = new Map<string, string>();
  for (const [index, artifact] of remaining.entries()) {
    const version = remaining.length - 1 - index;
    const target = versionedArtifactName(artifact.parsed, version);
    if (target === artifact.fileName) {
      continue;
    }

    try {
      await rename(path.join(directory, artifact.fileName), path.join(directory, target));
    } catch (error) {
      throw new RotationError(
        `Cannot rename ${artifact.fileName} to ${target}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
    renamed.set(artifact.fileName, target);
  }

  const kept = remaining
    .map((artifact) => renamed.get(artifact.fileName) ?? artifact.fileName)
    .reverse();

  logger.debug(`Rotated ${directory}: ${kept.length} kept, ${evicted.length} evicted`);

  return { evicted: evicted.map((a) => a.fileName), renamed, kept };
}

async function listArtifacts(directory: string): Promise<ListedArtifact[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(directory, { withFileTypes: true });
  } catch (error) {
    throw new RotationError(`Cannot list ${directory}: ${errorMessage(error)}`, { cause: error });
  }

  const artifacts: ListedArtifact[] = [];
  const seen = new Map<string, string>();

  for (const entry of entries) {
    if (!entry.isFile()) continue;

    const parsed = parseArtifactName(entry.name);
    if (!parsed) continue;

    const key = `${parsed.stem}.${parsed.extension}`;
    const duplicate = seen.get(key);
    if (duplicate) {
      throw new RotationError(
        `Two artifacts share the name ${key} in ${directory}: ${duplicate}, ${entry.name}`,
      );
    }
    seen.set(key, entry.name);
    artifacts.push({ fileName: entry.name, parsed });
  }

  return artifacts;
}
