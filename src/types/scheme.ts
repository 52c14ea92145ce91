/**
 * Backup scheme type definitions
 */

export type TaskKind = "bind_mount" | "volume" | "mysql";

/** Type names as written in scheme files */
export type SchemeTaskType = "bind_mount_backup" | "volume_backup" | "mysql_backup";

/**
 * Which services to stop while a task runs: nobody, the service owning the
 * task, or an explicit list of service names
 */
export type PauseSpec = "none" | "service" | string[];

export interface BindMountTaskSpec {
  kind: "bind_mount";
  bindMounts: string[];
  pause?: PauseSpec;
}

export interface VolumeTaskSpec {
  kind: "volume";
  volumes: string[];
  pause?: PauseSpec;
}

export interface MySQLTaskSpec {
  kind: "mysql";
  database: string;
  /** Literal value or key path such as "db.environment.MYSQL_USER" */
  user: string;
  /** Literal value or key path such as "db.environment.MYSQL_ROOT_PASSWORD" */
  password: string;
  pause?: PauseSpec;
}

export type TaskSpec = BindMountTaskSpec | VolumeTaskSpec | MySQLTaskSpec;

export interface ServiceScheme {
  service: string;
  tasks: TaskSpec[];
}

/** Services in scheme order, each with its tasks in declared order */
export type BackupScheme = ServiceScheme[];
