import { writeFile } from "node:fs/promises";
import * as path from "node:path";
import type {
  ContainerRuntime,
  ExecOptions,
  ExecResult,
  MountSpec,
  RunContainerOptions,
} from "../../src/types";

interface FakeContainer {
  running: boolean;
  restartPolicy: string | null;
  /** Files inside the container, by absolute path */
  files: Map<string, string>;
  mounts: MountSpec[];
  password?: string;
}

function resultFileOf(args: string[]): string | undefined {
  return args.find((a) => a.startsWith("--result-file="))?.slice("--result-file=".length);
}

type Operation = "isRunning" | "stop" | "start" | "run" | "exec" | "copy" | "remove" | "ensureImage";

/**
 * In-process container runtime. Records every call and writes artifacts to
 * the host where docker would.
 */
export class FakeRuntime implements ContainerRuntime {
  readonly calls: string[] = [];
  readonly containers = new Map<string, FakeContainer>();
  /** Volume name to file listing */
  readonly volumes = new Map<string, Record<string, string>>();
  private readonly failures = new Map<string, Error>();
  private readonly commandFailures = new Map<string, { result: ExecResult; partial?: string }>();
  private helperCount = 0;

  addContainer(
    id: string,
    options: { running?: boolean; restartPolicy?: string; mysqlPassword?: string } = {},
  ): this {
    this.containers.set(id, {
      running: options.running ?? true,
      restartPolicy: options.restartPolicy ?? "no",
      files: new Map(),
      mounts: [],
      password: options.mysqlPassword,
    });
    return this;
  }

  addVolume(name: string, files: Record<string, string> = {}): this {
    this.volumes.set(name, files);
    return this;
  }

  /** Make the next matching call throw */
  failOn(operation: Operation, target: string, message = `${operation} ${target} failed`): this {
    this.failures.set(`${operation} ${target}`, new Error(message));
    return this;
  }

  /**
   * Make the next exec of `program` return `result`. With `partial`, a
   * --result-file argument still gets that content written first.
   */
  failCommand(program: string, result: ExecResult, partial?: string): this {
    this.commandFailures.set(program, { result, partial });
    return this;
  }

  count(call: string): number {
    return this.calls.filter((c) => c === call).length;
  }

  get helpers(): string[] {
    return [...this.containers.keys()].filter((id) => id.startsWith("helper-"));
  }

  private record(operation: Operation, target: string): void {
    this.calls.push(`${operation} ${target}`);
    const failure = this.failures.get(`${operation} ${target}`);
    if (failure) {
      this.failures.delete(`${operation} ${target}`);
      throw failure;
    }
  }

  private container(id: string): FakeContainer {
    const container = this.containers.get(id);
    if (!container) {
      throw new Error(`No such container: ${id}`);
    }
    return container;
  }

  async isRunning(containerId: string): Promise<boolean> {
    this.record("isRunning", containerId);
    return this.container(containerId).running;
  }

  async stop(containerId: string): Promise<void> {
    this.record("stop", containerId);
    this.container(containerId).running = false;
  }

  async start(containerId: string): Promise<void> {
    this.record("start", containerId);
    this.container(containerId).running = true;
  }

  async restartPolicy(containerId: string): Promise<string | null> {
    return this.containers.get(containerId)?.restartPolicy ?? null;
  }

  async volumeExists(volumeName: string): Promise<boolean> {
    return this.volumes.has(volumeName);
  }

  async ensureImage(image: string): Promise<void> {
    this.record("ensureImage", image);
  }

  async run(options: RunContainerOptions): Promise<string> {
    this.record("run", options.image);
    this.helperCount += 1;
    const id = `helper-${this.helperCount}`;
    this.containers.set(id, {
      running: true,
      restartPolicy: "no",
      files: new Map(),
      mounts: options.mounts,
    });
    return id;
  }

  async exec(containerId: string, command: string[], options: ExecOptions = {}): Promise<ExecResult> {
    this.record("exec", containerId);
    const container = this.container(containerId);
    const [program, ...args] = command;

    const failure = program === undefined ? undefined : this.commandFailures.get(program);
    if (program !== undefined && failure) {
      this.commandFailures.delete(program);
      const resultFile = resultFileOf(args);
      if (failure.partial !== undefined && resultFile) {
        container.files.set(resultFile, failure.partial);
      }
      return failure.result;
    }

    switch (program) {
      case "tar":
        return this.tar(container, args);
      case "mysqldump":
        return this.mysqldump(container, args, options);
      case "rm": {
        const file = args[args.length - 1];
        if (file) container.files.delete(file);
        return { exitCode: 0, stdout: "", stderr: "" };
      }
      default:
        return { exitCode: 127, stdout: "", stderr: `${program ?? ""}: not found` };
    }
  }

  async copyFromContainer(containerId: string, containerPath: string, hostPath: string): Promise<void> {
    this.record("copy", containerId);
    const content = this.container(containerId).files.get(containerPath);
    if (content === undefined) {
      throw new Error(`Could not find ${containerPath} in ${containerId}`);
    }
    await writeFile(hostPath, content);
  }

  async remove(containerId: string): Promise<void> {
    this.record("remove", containerId);
    this.containers.delete(containerId);
  }

  /** tar -czf <archive> -C <dir> . with the output directory mounted at /backup */
  private async tar(container: FakeContainer, args: string[]): Promise<ExecResult> {
    const archive = args[1] ?? "";
    const sourceDir = args[3] ?? "";
    const source = container.mounts.find((m) => m.target === sourceDir);
    const output = container.mounts.find((m) => m.target === path.posix.dirname(archive));
    const files = source ? this.volumes.get(source.source) : undefined;

    if (!files || !output) {
      return { exitCode: 2, stdout: "", stderr: `tar: ${sourceDir}: Cannot open` };
    }

    const listing = Object.entries(files)
      .map(([name, content]) => `${name}=${content}`)
      .join("\n");
    await writeFile(path.join(output.source, path.posix.basename(archive)), listing);
    return { exitCode: 0, stdout: "", stderr: "" };
  }

  private mysqldump(container: FakeContainer, args: string[], options: ExecOptions): ExecResult {
    if (container.password !== undefined && options.env?.MYSQL_PWD !== container.password) {
      return { exitCode: 2, stdout: "", stderr: "Access denied for user" };
    }
    const resultFile = resultFileOf(args);
    const database = args[args.length - 2] ?? "";
    if (!resultFile) {
      return { exitCode: 2, stdout: "", stderr: "missing result file" };
    }
    container.files.set(resultFile, `-- dump of ${database}\n`);
    return { exitCode: 0, stdout: "", stderr: "" };
  }
}
