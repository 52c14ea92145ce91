/**
 * Docker Compose topology support
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import * as yaml from "js-yaml";
import { errorMessage, TopologyError } from "../errors";
import type { BindMount, NamedVolume, Service, Topology } from "../types";
import { logger } from "../utils/logger";

export const COMPOSE_FILE_NAMES = [
  "docker-compose.yaml",
  "docker-compose.yml",
  "compose.yaml",
  "compose.yml",
];

export interface ComposeVolumeMount {
  source: string;
  target: string;
  type: "volume" | "bind" | "tmpfs";
  readOnly: boolean;
}

interface ComposeVolumeLongSyntax {
  type?: string;
  source?: string;
  target: string;
  read_only?: boolean;
}

interface ComposeVolumeDefinition {
  external?: boolean | { name?: string };
  name?: string;
}

interface ComposeServiceDefinition {
  container_name?: string;
  image?: string;
  hostname?: string;
  environment?: string[] | Record<string, string | number | boolean | null>;
  volumes?: Array<string | ComposeVolumeLongSyntax>;
}

export interface ComposeFile {
  name?: string;
  services: Record<string, ComposeServiceDefinition>;
  volumes?: Record<string, ComposeVolumeDefinition | null>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function toServiceDefinition(name: string, value: unknown): ComposeServiceDefinition {
  if (value === null || value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new TopologyError(`Service "${name}" must be a mapping`);
  }

  const definition: ComposeServiceDefinition = {
    container_name: optionalString(value.container_name),
    image: optionalString(value.image),
    hostname: optionalString(value.hostname),
  };

  const environment = value.environment;
  if (Array.isArray(environment)) {
    definition.environment = environment.filter((e): e is string => typeof e === "string");
  } else if (isRecord(environment)) {
    const env: Record<string, string | number | boolean | null> = {};
    for (const [key, raw] of Object.entries(environment)) {
      if (
        raw === null ||
        typeof raw === "string" ||
        typeof raw === "number" ||
        typeof raw === "boolean"
      ) {
        env[key] = raw;
      }
    }
    definition.environment = env;
  }

  if (Array.isArray(value.volumes)) {
    const volumes: Array<string | ComposeVolumeLongSyntax> = [];
    for (const entry of value.volumes) {
      if (typeof entry === "string") {
        volumes.push(entry);
      } else if (isRecord(entry) && typeof entry.target === "string") {
        volumes.push({
          type: optionalString(entry.type),
          source: optionalString(entry.source),
          target: entry.target,
          read_only: entry.read_only === true,
        });
      } else {
        logger.warn(`Ignoring unrecognised volume entry in service "${name}"`, entry);
      }
    }
    definition.volumes = volumes;
  }

  return definition;
}

function toVolumeDefinition(value: unknown): ComposeVolumeDefinition | null {
  if (!isRecord(value)) {
    return null;
  }
  const external = value.external;
  return {
    name: optionalString(value.name),
    external:
      typeof external === "boolean"
        ? external
        : isRecord(external)
          ? { name: optionalString(external.name) }
          : undefined,
  };
}

/**
 * Parse compose file contents
 */
export function parseComposeContent(content: string, source: string = "compose file"): ComposeFile {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (e) {
    throw new TopologyError(`Failed to parse ${source}: ${errorMessage(e)}`);
  }

  if (!isRecord(parsed) || !isRecord(parsed.services)) {
    throw new TopologyError(`No services found in ${source}`);
  }

  const services: Record<string, ComposeServiceDefinition> = {};
  for (const [name, definition] of Object.entries(parsed.services)) {
    services[name] = toServiceDefinition(name, definition);
  }

  const composeFile: ComposeFile = { services, name: optionalString(parsed.name) };

  if (isRecord(parsed.volumes)) {
    composeFile.volumes = {};
    for (const [name, definition] of Object.entries(parsed.volumes)) {
      composeFile.volumes[name] = toVolumeDefinition(definition);
    }
  }

  return composeFile;
}

/**
 * Parse a docker-compose.yml file
 */
export async function parseComposeFile(composePath: string): Promise<ComposeFile> {
  let content: string;
  try {
    content = await readFile(composePath, "utf8");
  } catch (e) {
    throw new TopologyError(`Cannot read compose file ${composePath}: ${errorMessage(e)}`);
  }
  return parseComposeContent(content, composePath);
}

/**
 * Find the one compose file in a directory
 */
export function findComposeFile(root: string): string {
  const found = COMPOSE_FILE_NAMES.map((name) => path.join(root, name)).filter((candidate) =>
    existsSync(candidate),
  );

  if (found.length === 0) {
    throw new TopologyError(`No compose file found in ${root}`);
  }
  if (found.length > 1) {
    throw new TopologyError(
      `There must be exactly one compose file in ${root}, found: ${found.map((f) => path.basename(f)).join(", ")}`,
    );
  }
  return found[0] ?? "";
}

/**
 * Parse a volume mount string (short syntax)
 * Formats: "volume_name:/path" or "./host/path:/path" or "/host/path:/path"
 */
export function parseVolumeShortSyntax(volumeString: string): ComposeVolumeMount | null {
  const [source, target, options = ""] = volumeString.split(":");

  // A lone container path is an anonymous volume; nothing to back up
  if (!source || !target) {
    return null;
  }

  // Determine if this is a named volume or a bind mount
  const isBindMount =
    source.startsWith(".") || source.startsWith("/") || source.startsWith("~");

  return {
    source,
    target,
    type: isBindMount ? "bind" : "volume",
    readOnly: options.split(",").includes("ro"),
  };
}

/**
 * Get all volume mounts for a service
 */
export function getServiceVolumes(
  composeFile: ComposeFile,
  serviceName: string,
): ComposeVolumeMount[] {
  const service = composeFile.services[serviceName];

  if (!service || !service.volumes) {
    return [];
  }

  const mounts: ComposeVolumeMount[] = [];

  for (const volumeSpec of service.volumes) {
    if (typeof volumeSpec === "string") {
      const mount = parseVolumeShortSyntax(volumeSpec);
      if (mount) {
        mounts.push(mount);
      }
    } else {
      const type =
        volumeSpec.type === "bind" || volumeSpec.type === "tmpfs" ? volumeSpec.type : "volume";
      mounts.push({
        source: volumeSpec.source || "",
        target: volumeSpec.target,
        type,
        readOnly: volumeSpec.read_only || false,
      });
    }
  }

  return mounts;
}

/**
 * Get the environment of a service as a flat string mapping
 */
export function getServiceEnvironment(
  composeFile: ComposeFile,
  serviceName: string,
): Record<string, string> {
  const environment = composeFile.services[serviceName]?.environment;
  const result: Record<string, string> = {};

  if (Array.isArray(environment)) {
    for (const entry of environment) {
      const separator = entry.indexOf("=");
      if (separator > 0) {
        result[entry.slice(0, separator)] = entry.slice(separator + 1);
      }
    }
  } else if (environment) {
    for (const [key, value] of Object.entries(environment)) {
      if (value !== null) {
        result[key] = String(value);
      }
    }
  }

  return result;
}

/**
 * Resolve the actual Docker volume name for a compose volume.
 * Docker Compose prefixes volumes with the project name unless they are
 * external or carry an explicit name.
 */
export function resolveComposeVolumeName(
  volumeName: string,
  composeFile: ComposeFile,
  projectName: string,
): string {
  const volumeDef = composeFile.volumes?.[volumeName];

  if (volumeDef?.external) {
    const externalName = typeof volumeDef.external === "object" ? volumeDef.external.name : undefined;
    return externalName || volumeDef.name || volumeName;
  }

  if (volumeDef?.name) {
    return volumeDef.name;
  }

  return `${projectName}_${volumeName}`;
}

/**
 * Infer project name from compose file path.
 * Docker Compose uses the directory name as the default project name.
 */
export function inferProjectName(composePath: string): string {
  const dirName = path.basename(path.dirname(path.resolve(composePath))) || "default";
  return normalizeProjectName(dirName);
}

function normalizeProjectName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9_-]/g, "").replace(/^[^a-z0-9]+/, "") || "default";
}

function resolveHostPath(source: string, composeDir: string): string {
  if (source === "~" || source.startsWith("~/")) {
    return path.join(os.homedir(), source.slice(1));
  }
  return path.resolve(composeDir, source);
}

/**
 * Build the topology of a parsed compose file
 */
export function buildTopology(composeFile: ComposeFile, composePath: string): Topology {
  const composeDir = path.dirname(path.resolve(composePath));
  const projectName = composeFile.name
    ? normalizeProjectName(composeFile.name)
    : inferProjectName(composePath);

  const services: Service[] = Object.entries(composeFile.services).map(([name, definition]) => {
    const bindMounts: BindMount[] = [];
    const volumes: NamedVolume[] = [];

    for (const mount of getServiceVolumes(composeFile, name)) {
      if (mount.type === "bind") {
        bindMounts.push({
          source: mount.source,
          hostPath: resolveHostPath(mount.source, composeDir),
          mountPoint: mount.target,
          readOnly: mount.readOnly,
        });
      } else if (mount.type === "volume" && mount.source) {
        volumes.push({
          name: mount.source,
          dockerName: resolveComposeVolumeName(mount.source, composeFile, projectName),
          mountPoint: mount.target,
          readOnly: mount.readOnly,
        });
      }
    }

    return {
      name,
      containerName: definition.container_name || `${projectName}-${name}-1`,
      image: definition.image,
      hostname: definition.hostname,
      environment: getServiceEnvironment(composeFile, name),
      bindMounts,
      volumes,
    };
  });

  return { projectName, composePath: path.resolve(composePath), services };
}

/**
 * Load the topology from a compose file
 */
export async function loadTopology(composePath: string): Promise<Topology> {
  const composeFile = await parseComposeFile(composePath);
  const topology = buildTopology(composeFile, composePath);
  logger.debug(
    `Parsed ${topology.services.length} service(s) from ${composePath}: ${topology.services.map((s) => s.name).join(", ")}`,
  );
  return topology;
}
