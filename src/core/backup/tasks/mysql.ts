/**
 * MySQL backup: dump inside the running database container and copy it out
 */

import * as path from "node:path";
import { CleanupError, CopyError, DumpError, errorMessage } from "../../../errors";
import type { Artifact, ExecResult, MySQLTaskSpec } from "../../../types";
import { logger } from "../../../utils/logger";
import { sanitizeTargetName } from "../../../utils/naming";
import type { TopologyIndex } from "../../topology";
import { targetDirectory } from "../workspace";
import type { DatabaseTarget, TaskContext } from "./types";

/** Directory inside the database container the dump is written to */
const CONTAINER_DUMP_DIR = "/tmp";

/**
 * Resolve credentials given as key paths. Throws KeyResolutionError.
 */
export function resolveDatabaseTarget(spec: MySQLTaskSpec, index: TopologyIndex): DatabaseTarget {
  return {
    kind: "mysql",
    name: sanitizeTargetName(spec.database),
    database: spec.database,
    user: index.resolveValue(spec.user),
    password: index.resolveValue(spec.password),
  };
}

export function buildDumpCommand(target: DatabaseTarget, resultFile: string): string[] {
  return [
    "mysqldump",
    "--single-transaction",
    "--routines",
    "--triggers",
    "-u",
    target.user,
    target.database,
    `--result-file=${resultFile}`,
  ];
}

export async function dumpDatabase(target: DatabaseTarget, context: TaskContext): Promise<Artifact> {
  const { runtime, service } = context;
  const container = service.containerName;

  logger.info(`Dumping database ${target.database} of "${service.name}"`);

  return context.writer.write(
    {
      service: service.name,
      kind: "mysql",
      target: target.name,
      directory: targetDirectory(context.destination, service.name, "mysql", target.name),
      extension: "sql",
    },
    async (artifactPath) => {
      const containerPath = path.posix.join(CONTAINER_DUMP_DIR, path.basename(artifactPath));

      try {
        await runDump(context, target, containerPath);
        try {
          await runtime.copyFromContainer(container, containerPath, artifactPath);
        } catch (error) {
          throw new CopyError(`Failed to copy dump from ${container}: ${errorMessage(error)}`, {
            cause: error,
          });
        }
      } finally {
        // A failed dump may still have left a partial result file
        await removeDump(context, containerPath);
      }
    },
  );
}

async function runDump(
  context: TaskContext,
  target: DatabaseTarget,
  containerPath: string,
): Promise<void> {
  let result: ExecResult;
  try {
    // Password goes through the environment so it never shows in a process list
    result = await context.runtime.exec(
      context.service.containerName,
      buildDumpCommand(target, containerPath),
      { env: { MYSQL_PWD: target.password } },
    );
  } catch (error) {
    throw new DumpError(`Failed to run mysqldump: ${errorMessage(error)}`, { cause: error });
  }
  if (result.exitCode !== 0) {
    throw new DumpError(
      `mysqldump exited with code ${result.exitCode}: ${result.stderr || result.stdout}`,
    );
  }
}

async function removeDump(context: TaskContext, containerPath: string): Promise<void> {
  const container = context.service.containerName;
  let message: string | null = null;

  try {
    const result = await context.runtime.exec(container, ["rm", "-f", containerPath]);
    if (result.exitCode !== 0) {
      message = result.stderr || `exit code ${result.exitCode}`;
    }
  } catch (error) {
    message = errorMessage(error);
  }

  if (message !== null) {
    logger.warn(
      new CleanupError(`Failed to remove ${containerPath} from ${container}: ${message}`).message,
    );
  }
}
