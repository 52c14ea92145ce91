/**
 * Backup module exports
 */

export { createTarGzip } from "./archive-creator";
export { type ArtifactProducer, type ArtifactRequest, ArchiveWriter } from "./archive-writer";
export { type BackupOptions, runBackup } from "./orchestrator";
export {
  type BackupTarget,
  executeTarget,
  type ResolvedTask,
  resolvePauseSet,
  resolveTask,
  type TaskContext,
} from "./tasks";
export { createServiceDirectories, serviceDirectory, targetDirectory } from "./workspace";
