/**
 * Places artifacts in a backup target directory under a collision-free name
 */

import { mkdir, open, readdir, stat, unlink } from "node:fs/promises";
import * as path from "node:path";
import { ArchiveError, errorMessage, isErrnoException } from "../../errors";
import type { Artifact, TaskKind } from "../../types";
import { computeFileChecksum } from "../../utils/crypto";
import { logger } from "../../utils/logger";
import { type ArtifactExtension, generateArtifactName, parseArtifactName } from "../../utils/naming";

export interface ArtifactRequest {
  service: string;
  kind: TaskKind;
  target: string;
  /** Backup target directory; created if missing */
  directory: string;
  extension: ArtifactExtension;
}

/**
 * Writes the artifact contents to the given absolute path. The file already
 * exists (empty) when the producer is called and may be overwritten.
 */
export type ArtifactProducer = (artifactPath: string) => Promise<void>;

const MAX_NAME_ATTEMPTS = 1000;

export class ArchiveWriter {
  constructor(private readonly clock: () => Date = () => new Date()) {}

  async write(request: ArtifactRequest, produce: ArtifactProducer): Promise<Artifact> {
    const createdAt = this.clock();
    const artifactPath = await this.reserve(request, createdAt);

    try {
      await produce(artifactPath);
    } catch (error) {
      await discard(artifactPath);
      throw error;
    }

    try {
      const { size } = await stat(artifactPath);
      const checksum = await computeFileChecksum(artifactPath);
      logger.debug(`Artifact written: ${artifactPath} (${size} bytes)`);

      return {
        service: request.service,
        kind: request.kind,
        target: request.target,
        path: artifactPath,
        fileName: path.basename(artifactPath),
        sizeBytes: size,
        checksum,
        createdAt,
      };
    } catch (error) {
      await discard(artifactPath);
      throw new ArchiveError(`Cannot read artifact ${artifactPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Claim the first free name by exclusive create. A name is also taken when a
   * rotated artifact with the same stem exists.
   */
  private async reserve(request: ArtifactRequest, createdAt: Date): Promise<string> {
    let entries: string[];
    try {
      await mkdir(request.directory, { recursive: true });
      entries = await readdir(request.directory);
    } catch (error) {
      throw new ArchiveError(
        `Cannot prepare directory ${request.directory}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    const stems = new Set<string>();
    for (const entry of entries) {
      const parsed = parseArtifactName(entry);
      if (parsed) stems.add(parsed.stem);
    }

    for (let sequence = 0; sequence < MAX_NAME_ATTEMPTS; sequence++) {
      const fileName = generateArtifactName(request.target, request.extension, createdAt, sequence);
      const parsed = parseArtifactName(fileName);
      if (parsed && stems.has(parsed.stem)) {
        continue;
      }

      const candidate = path.join(request.directory, fileName);
      try {
        const handle = await open(candidate, "wx");
        await handle.close();
        return candidate;
      } catch (error) {
        if (isErrnoException(error, "EEXIST")) {
          continue;
        }
        throw new ArchiveError(`Cannot create ${candidate}: ${errorMessage(error)}`, {
          cause: error,
        });
      }
    }

    throw new ArchiveError(`No free artifact name for "${request.target}" in ${request.directory}`);
  }
}

async function discard(artifactPath: string): Promise<void> {
  try {
    await unlink(artifactPath);
  } catch (error) {
    if (!isErrnoException(error, "ENOENT")) {
      logger.warn(`Failed to remove partial artifact ${artifactPath}: ${errorMessage(error)}`);
    }
  }
}
