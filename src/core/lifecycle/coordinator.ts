/**
 * Scoped pause/resume of containers around a unit of work
 */

import {
  CancelledError,
  errorMessage,
  PauseError,
  ResumeFailureError,
  throwIfCancelled,
} from "../../errors";
import type { ContainerRuntime, Service } from "../../types";
import { hasAutoRestartPolicy } from "../../docker/client";
import { logger } from "../../utils/logger";

export interface CoordinatorOptions {
  /** Seconds to wait for a graceful stop */
  stopTimeout: number;
}

export type PausedBody<T> = (signal: AbortSignal | undefined) => Promise<T>;

/**
 * Stops containers for the duration of a body and starts them again on every
 * exit path. Only containers that were running are stopped, and only those
 * are started again. Brackets on the same container never overlap.
 */
export class LifecycleCoordinator {
  private readonly locks = new Map<string, Promise<void>>();

  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly options: CoordinatorOptions = { stopTimeout: 30 },
  ) {}

  async withPaused<T>(
    pauseSet: readonly Service[],
    body: PausedBody<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const services = dedupe(pauseSet);
    const release = await this.acquire(services.map((s) => s.containerName));

    try {
      const stopped = await this.stopAll(services, signal);
      return await this.runAndResume(stopped, body, signal);
    } finally {
      release();
    }
  }

  private async stopAll(services: Service[], signal: AbortSignal | undefined): Promise<Service[]> {
    const stopped: Service[] = [];

    for (const service of services) {
      try {
        throwIfCancelled(signal);

        if (!(await this.runtime.isRunning(service.containerName))) {
          logger.debug(`Service "${service.name}" is not running, nothing to stop`);
          continue;
        }

        const restartPolicy = await this.runtime.restartPolicy(service.containerName);
        if (restartPolicy && hasAutoRestartPolicy(restartPolicy)) {
          logger.warn(
            `Container "${service.containerName}" has restart policy "${restartPolicy}". ` +
              "It may be restarted by the runtime while the backup runs.",
          );
        }

        logger.info(`Stopping service "${service.name}"...`);
        await this.runtime.stop(service.containerName, this.options.stopTimeout);
        stopped.push(service);
      } catch (error) {
        const pauseError =
          error instanceof CancelledError
            ? error
            : new PauseError(
                service.name,
                `Failed to stop service "${service.name}": ${errorMessage(error)}`,
                { cause: error },
              );

        const resumeErrors = await this.resumeAll(stopped);
        if (resumeErrors.failed.length > 0) {
          throw new ResumeFailureError(resumeErrors.failed, resumeErrors.errors, {
            cause: pauseError,
          });
        }
        throw pauseError;
      }
    }

    return stopped;
  }

  private async runAndResume<T>(
    stopped: Service[],
    body: PausedBody<T>,
    signal: AbortSignal | undefined,
  ): Promise<T> {
    let outcome: { ok: true; value: T } | { ok: false; error: unknown };

    try {
      outcome = { ok: true, value: await body(signal) };
    } catch (error) {
      outcome = { ok: false, error };
    }

    const { failed, errors } = await this.resumeAll(stopped);

    if (failed.length > 0) {
      throw new ResumeFailureError(failed, errors, outcome.ok ? undefined : { cause: outcome.error });
    }
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.value;
  }

  /**
   * Start services in reverse stop order, attempting every one
   */
  private async resumeAll(stopped: Service[]): Promise<{ failed: string[]; errors: unknown[] }> {
    const failed: string[] = [];
    const errors: unknown[] = [];

    for (const service of [...stopped].reverse()) {
      try {
        logger.info(`Restarting service "${service.name}"...`);
        await this.runtime.start(service.containerName);
      } catch (error) {
        failed.push(service.name);
        errors.push(error);
        logger.error(
          `Service "${service.name}" could not be restarted and may still be stopped. ` +
            `Start it manually (docker start ${service.containerName}).`,
          error,
        );
      }
    }

    return { failed, errors };
  }

  private async acquire(keys: string[]): Promise<() => void> {
    const releases: Array<() => void> = [];

    // Fixed order so two brackets sharing containers cannot wait on each other
    for (const key of [...keys].sort()) {
      const previous = this.locks.get(key) ?? Promise.resolve();
      let unlock: () => void = () => {};
      const current = new Promise<void>((resolve) => {
        unlock = resolve;
      });
      const tail = previous.then(() => current);
      this.locks.set(key, tail);
      await previous;
      releases.push(() => {
        unlock();
        if (this.locks.get(key) === tail) {
          this.locks.delete(key);
        }
      });
    }

    return () => {
      for (const release of releases.reverse()) {
        release();
      }
    };
  }
}

function dedupe(services: readonly Service[]): Service[] {
  const seen = new Set<string>();
  return services.filter((service) => {
    if (seen.has(service.containerName)) {
      return false;
    }
    seen.add(service.containerName);
    return true;
  });
}
