/**
 * Docker CLI client wrapper
 */

import type { ContainerRuntime, ExecOptions, ExecResult, RunContainerOptions } from "../types";
import { type CommandResult, runCommand } from "../utils/exec";
import { logger } from "../utils/logger";

export type DockerRunResult = CommandResult;

/**
 * Run a Docker command and return the result
 */
export async function dockerRun(args: string[]): Promise<DockerRunResult> {
  return runCommand("docker", args);
}

/**
 * Check if Docker is available and running
 */
export async function isDockerAvailable(): Promise<boolean> {
  try {
    const result = await dockerRun(["info"]);
    return result.success;
  } catch {
    return false;
  }
}

/**
 * Get Docker version information
 */
export async function getDockerVersion(): Promise<string | null> {
  const result = await dockerRun(["version", "--format", "{{.Server.Version}}"]);
  if (result.success) {
    return result.stdout;
  }
  return null;
}

function failure(action: string, result: DockerRunResult): Error {
  return new Error(`docker ${action} failed (exit ${result.exitCode}): ${result.stderr || result.stdout}`);
}

/**
 * Build `docker run` arguments for a detached container
 */
export function buildRunArgs(options: RunContainerOptions): string[] {
  const args: string[] = ["run", "-d"];

  if (options.name) {
    args.push("--name", options.name);
  }

  for (const mount of options.mounts) {
    const mountSpec = mount.readonly
      ? `${mount.source}:${mount.target}:ro`
      : `${mount.source}:${mount.target}`;
    args.push("-v", mountSpec);
  }

  args.push(options.image);
  args.push(...options.command);
  return args;
}

/**
 * Build `docker exec` arguments; environment values are passed by name so
 * they stay out of the process list
 */
export function buildExecArgs(
  containerId: string,
  command: string[],
  options: ExecOptions = {},
): string[] {
  const args: string[] = ["exec"];
  for (const key of Object.keys(options.env ?? {})) {
    args.push("-e", key);
  }
  args.push(containerId, ...command);
  return args;
}

/**
 * Run a detached container with the specified options
 * @returns the new container's id
 */
export async function runContainer(options: RunContainerOptions): Promise<string> {
  const args = buildRunArgs(options);
  logger.debug(`Running Docker container: docker ${args.join(" ")}`);
  const result = await dockerRun(args);
  if (!result.success || !result.stdout) {
    throw failure("run", result);
  }
  return result.stdout.split("\n").pop() ?? result.stdout;
}

/**
 * Execute a command inside a running container
 */
export async function execInContainer(
  containerId: string,
  command: string[],
  options: ExecOptions = {},
): Promise<ExecResult> {
  const args = buildExecArgs(containerId, command, options);
  logger.debug(`Executing in ${containerId}: ${command[0] ?? ""}`);
  const result = await runCommand("docker", args, {
    env: options.env ? { ...process.env, ...options.env } : undefined,
  });
  return { exitCode: result.exitCode, stdout: result.stdout, stderr: result.stderr };
}

/**
 * Pull a Docker image if not present
 */
export async function ensureImage(image: string): Promise<void> {
  // Check if image exists locally
  const inspectResult = await dockerRun(["image", "inspect", image]);
  if (inspectResult.success) {
    return;
  }

  logger.info(`Pulling Docker image: ${image}`);
  const pullResult = await dockerRun(["pull", image]);
  if (!pullResult.success) {
    throw failure(`pull ${image}`, pullResult);
  }
}

/**
 * Stop a container with the specified timeout
 * @param timeout - Timeout in seconds for graceful stop
 */
export async function stopContainer(containerId: string, timeout: number = 30): Promise<void> {
  logger.debug(`Stopping container ${containerId} with timeout ${timeout}s`);
  const result = await dockerRun(["stop", "-t", timeout.toString(), containerId]);
  if (!result.success) {
    throw failure(`stop ${containerId}`, result);
  }
}

/**
 * Start a previously stopped container
 */
export async function startContainer(containerId: string): Promise<void> {
  logger.debug(`Starting container ${containerId}`);
  const result = await dockerRun(["start", containerId]);
  if (!result.success) {
    throw failure(`start ${containerId}`, result);
  }
}

export async function isContainerRunning(containerId: string): Promise<boolean> {
  const result = await dockerRun(["inspect", "--format", "{{.State.Running}}", containerId]);
  if (!result.success) {
    throw failure(`inspect ${containerId}`, result);
  }
  return result.stdout === "true";
}

/**
 * Get the restart policy of a container
 * @returns Restart policy name: "no", "always", "on-failure", "unless-stopped", or null if not found
 */
export async function getContainerRestartPolicy(containerId: string): Promise<string | null> {
  const result = await dockerRun([
    "inspect",
    "--format",
    "{{.HostConfig.RestartPolicy.Name}}",
    containerId,
  ]);

  if (!result.success) {
    logger.debug(`Failed to get restart policy for container ${containerId}: ${result.stderr}`);
    return null;
  }

  return result.stdout || null;
}

/**
 * Check if a restart policy may cause the container to auto-restart
 * (restart: always or restart: unless-stopped)
 */
export function hasAutoRestartPolicy(restartPolicy: string): boolean {
  return restartPolicy === "always" || restartPolicy === "unless-stopped";
}

/**
 * Check if a volume exists
 */
export async function volumeExists(name: string): Promise<boolean> {
  const result = await dockerRun(["volume", "inspect", name]);
  return result.success;
}

export async function copyFromContainer(
  containerId: string,
  containerPath: string,
  hostPath: string,
): Promise<void> {
  const result = await dockerRun(["cp", `${containerId}:${containerPath}`, hostPath]);
  if (!result.success) {
    throw failure(`cp ${containerId}:${containerPath}`, result);
  }
}

export async function removeContainer(containerId: string): Promise<void> {
  const result = await dockerRun(["rm", "-f", containerId]);
  if (!result.success) {
    throw failure(`rm ${containerId}`, result);
  }
}

/**
 * Container runtime backed by the docker CLI
 */
export function createDockerRuntime(): ContainerRuntime {
  return {
    isRunning: isContainerRunning,
    stop: stopContainer,
    start: startContainer,
    restartPolicy: getContainerRestartPolicy,
    volumeExists,
    ensureImage,
    run: runContainer,
    exec: execInContainer,
    copyFromContainer,
    remove: removeContainer,
  };
}
