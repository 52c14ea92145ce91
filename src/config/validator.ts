/**
 * Backup scheme validation
 */

import { SchemeInvalidError } from "../errors";
import type { BackupScheme, PauseSpec, SchemeTaskType, TaskKind, TaskSpec } from "../types";

export const SCHEME_TASK_TYPES: Record<SchemeTaskType, TaskKind> = {
  bind_mount_backup: "bind_mount",
  volume_backup: "volume",
  mysql_backup: "mysql",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSchemeTaskType(value: unknown): value is SchemeTaskType {
  return typeof value === "string" && Object.hasOwn(SCHEME_TASK_TYPES, value);
}

type TaskParser = (config: Record<string, unknown>, where: string, problems: string[]) => TaskSpec | null;

const ALLOWED_KEYS: Record<TaskKind, string[]> = {
  bind_mount: ["bind_mounts", "pause"],
  volume: ["volumes", "pause"],
  mysql: ["database", "user", "password", "pause"],
};

function checkUnknownKeys(
  kind: TaskKind,
  config: Record<string, unknown>,
  where: string,
  problems: string[],
): void {
  const unknown = Object.keys(config).filter((key) => !ALLOWED_KEYS[kind].includes(key));
  if (unknown.length > 0) {
    problems.push(`${where}: unknown parameter(s) ${unknown.join(", ")}`);
  }
}

function parseNameList(value: unknown, field: string, where: string, problems: string[]): string[] | null {
  if (!Array.isArray(value) || value.length === 0) {
    problems.push(`${where}.${field} must be a non-empty list`);
    return null;
  }
  const names: string[] = [];
  value.forEach((entry, i) => {
    if (typeof entry !== "string" || entry.trim() === "") {
      problems.push(`${where}.${field}[${i}] must be a non-empty string`);
    } else {
      names.push(entry.trim());
    }
  });
  return names.length === value.length ? names : null;
}

function parseScalar(value: unknown, field: string, where: string, problems: string[]): string | null {
  if (typeof value === "number") {
    return String(value);
  }
  if (typeof value !== "string" || value === "") {
    problems.push(`${where}.${field} must be a non-empty string`);
    return null;
  }
  return value;
}

function parsePause(value: unknown, where: string, problems: string[]): PauseSpec | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value === "none" || value === "service") {
    return value;
  }
  if (Array.isArray(value) && value.every((v): v is string => typeof v === "string" && v !== "")) {
    return value;
  }
  problems.push(`${where}.pause must be "none", "service" or a list of service names`);
  return undefined;
}

const parsers: Record<TaskKind, TaskParser> = {
  bind_mount: (config, where, problems) => {
    const bindMounts = parseNameList(config.bind_mounts, "bind_mounts", where, problems);
    const pause = parsePause(config.pause, where, problems);
    return bindMounts ? { kind: "bind_mount", bindMounts, ...(pause && { pause }) } : null;
  },

  volume: (config, where, problems) => {
    const volumes = parseNameList(config.volumes, "volumes", where, problems);
    const pause = parsePause(config.pause, where, problems);
    return volumes ? { kind: "volume", volumes, ...(pause && { pause }) } : null;
  },

  mysql: (config, where, problems) => {
    const database = parseScalar(config.database, "database", where, problems);
    const user = parseScalar(config.user, "user", where, problems);
    const password = parseScalar(config.password, "password", where, problems);
    const pause = parsePause(config.pause, where, problems);
    if (database === null || user === null || password === null) {
      return null;
    }
    return { kind: "mysql", database, user, password, ...(pause && { pause }) };
  },
};

function parseTask(raw: unknown, where: string, problems: string[]): TaskSpec | null {
  if (!isRecord(raw)) {
    problems.push(`${where} must be an object with "type" and "config"`);
    return null;
  }

  const extra = Object.keys(raw).filter((key) => key !== "type" && key !== "config");
  if (extra.length > 0) {
    problems.push(`${where}: unknown field(s) ${extra.join(", ")}`);
  }

  if (!isSchemeTaskType(raw.type)) {
    problems.push(
      `${where}.type must be one of ${Object.keys(SCHEME_TASK_TYPES).join(", ")} (got ${JSON.stringify(raw.type)})`,
    );
    return null;
  }

  const kind = SCHEME_TASK_TYPES[raw.type];
  const config = raw.config;
  if (!isRecord(config)) {
    problems.push(`${where}.config must be an object`);
    return null;
  }

  checkUnknownKeys(kind, config, `${where}.config`, problems);
  return parsers[kind](config, `${where}.config`, problems);
}

/**
 * Check the structure of a parsed scheme file and convert it to a
 * BackupScheme. Collects every problem before failing.
 */
export function validateScheme(raw: unknown): BackupScheme {
  if (!isRecord(raw)) {
    throw new SchemeInvalidError("Backup scheme must map service names to task lists");
  }

  const problems: string[] = [];
  const scheme: BackupScheme = [];

  for (const [service, tasks] of Object.entries(raw)) {
    if (!Array.isArray(tasks)) {
      problems.push(`${service} must be a list of tasks`);
      continue;
    }

    const parsed: TaskSpec[] = [];
    tasks.forEach((task, i) => {
      const spec = parseTask(task, `${service}[${i}]`, problems);
      if (spec) {
        parsed.push(spec);
      }
    });
    scheme.push({ service, tasks: parsed });
  }

  if (problems.length > 0) {
    throw new SchemeInvalidError("Invalid backup scheme", problems);
  }

  return scheme;
}
