/**
 * Centralized type exports for Stowaway
 */

// Backup run types
export type {
  Artifact,
  ResumeFailureRecord,
  RunReport,
  RunState,
  TaskFailure,
} from "./backup";
// Config types
export type { RunConfig } from "./config";
// Runtime types
export type {
  ContainerRuntime,
  ExecOptions,
  ExecResult,
  MountSpec,
  RunContainerOptions,
} from "./runtime";
// Scheme types
export type {
  BackupScheme,
  BindMountTaskSpec,
  MySQLTaskSpec,
  PauseSpec,
  SchemeTaskType,
  ServiceScheme,
  TaskKind,
  TaskSpec,
  VolumeTaskSpec,
} from "./scheme";
// Topology types
export type { BindMount, NamedVolume, Service, Topology } from "./topology";
