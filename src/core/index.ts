/**
 * Core module exports
 */

// Backup
export {
  ArchiveWriter,
  type BackupOptions,
  createTarGzip,
  executeTarget,
  resolveTask,
  runBackup,
  targetDirectory,
} from "./backup";

// Lifecycle
export { type CoordinatorOptions, LifecycleCoordinator } from "./lifecycle";

// Topology
export { TopologyIndex } from "./topology";

// Versioning
export { type RotationResult, rotate } from "./versioning";
