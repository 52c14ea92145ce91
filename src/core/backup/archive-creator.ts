/**
 * tar.gz creation for host directories
 */

import { ArchiveError, errorMessage } from "../../errors";
import { type CommandResult, runCommand } from "../../utils/exec";
import { logger } from "../../utils/logger";

/**
 * Archive the contents of a directory into a gzip-compressed tarball.
 * Paths inside the archive are relative to the directory.
 */
export async function createTarGzip(sourceDir: string, archivePath: string): Promise<void> {
  logger.debug(`Creating tar.gz archive of ${sourceDir}`);

  let result: CommandResult;
  try {
    result = await runCommand("tar", ["-czf", archivePath, "-C", sourceDir, "."]);
  } catch (error) {
    throw new ArchiveError(`Failed to run tar: ${errorMessage(error)}`, { cause: error });
  }

  if (!result.success) {
    throw new ArchiveError(
      `Failed to create archive of ${sourceDir}: ${result.stderr || `exit code ${result.exitCode}`}`,
    );
  }
}
