/**
 * Container runtime interface definitions
 */

export interface MountSpec {
  source: string;
  target: string;
  readonly?: boolean;
}

export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunContainerOptions {
  image: string;
  command: string[];
  mounts: MountSpec[];
  name?: string;
}

export interface ExecOptions {
  env?: Record<string, string>;
}

/**
 * Operations the backup core needs from the container runtime. Every call may
 * fail; none is retried.
 */
export interface ContainerRuntime {
  /** Whether the container is currently running */
  isRunning(containerId: string): Promise<boolean>;

  stop(containerId: string, timeoutSeconds: number): Promise<void>;

  start(containerId: string): Promise<void>;

  /** Restart policy name, or null if unknown */
  restartPolicy(containerId: string): Promise<string | null>;

  volumeExists(volumeName: string): Promise<boolean>;

  /** Make sure an image is present locally */
  ensureImage(image: string): Promise<void>;

  /** Start a detached container and return its id */
  run(options: RunContainerOptions): Promise<string>;

  exec(containerId: string, command: string[], options?: ExecOptions): Promise<ExecResult>;

  copyFromContainer(containerId: string, containerPath: string, hostPath: string): Promise<void>;

  remove(containerId: string): Promise<void>;
}
