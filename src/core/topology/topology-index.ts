/**
 * Lookup of services and their metadata in a parsed topology
 */

import { KeyResolutionError, ServiceNotFoundError } from "../../errors";
import type { Service, Topology } from "../../types";

interface KeyTree {
  [key: string]: KeyTree | string;
}

const KEY_PATH_PATTERN = /^\S+\.environment\.\S+$/;

function toKeyTree(service: Service): KeyTree {
  const node: KeyTree = {
    name: service.name,
    containerName: service.containerName,
    environment: { ...service.environment },
  };
  if (service.image !== undefined) node.image = service.image;
  if (service.hostname !== undefined) node.hostname = service.hostname;
  return node;
}

export class TopologyIndex {
  private readonly byName = new Map<string, Service>();
  private readonly tree: KeyTree = {};

  constructor(readonly topology: Topology) {
    for (const service of topology.services) {
      this.byName.set(service.name, service);
      this.tree[service.name] = toKeyTree(service);
    }
    // Container names are accepted as aliases unless they shadow a service name
    for (const service of topology.services) {
      if (!this.byName.has(service.containerName)) {
        this.byName.set(service.containerName, service);
        this.tree[service.containerName] = toKeyTree(service);
      }
    }
  }

  get services(): Service[] {
    return this.topology.services;
  }

  /**
   * Find a service by compose service name or container name
   */
  resolve(name: string): Service {
    const service = this.byName.get(name);
    if (!service) {
      throw new ServiceNotFoundError(name);
    }
    return service;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * Resolve a dotted path such as "db.environment.MYSQL_PASSWORD". Keys that
   * themselves contain dots are matched greedily. The path must end on a
   * scalar value.
   */
  resolveKeyPath(keyPath: string): string {
    const segments = keyPath.split(".");
    let node: KeyTree | string = this.tree;
    let i = 0;

    while (i < segments.length) {
      if (typeof node === "string") {
        throw new KeyResolutionError(keyPath, segments.slice(i).join("."));
      }

      let matched = false;
      for (let j = segments.length; j > i; j--) {
        const key = segments.slice(i, j).join(".");
        const child: KeyTree | string | undefined = node[key];
        if (child !== undefined && Object.hasOwn(node, key)) {
          node = child;
          i = j;
          matched = true;
          break;
        }
      }

      if (!matched) {
        throw new KeyResolutionError(keyPath, segments[i] ?? keyPath);
      }
    }

    if (typeof node !== "string") {
      throw new KeyResolutionError(keyPath, "<scalar value>");
    }
    return node;
  }

  /**
   * Whether a credential value should be read from the topology instead of
   * taken literally: `<service>.environment.<KEY>` where `<service>` is a
   * known service or container name
   */
  isKeyPath(value: string): boolean {
    return (
      KEY_PATH_PATTERN.test(value) &&
      Object.keys(this.tree).some((name) => value.startsWith(`${name}.environment.`))
    );
  }

  /**
   * Return a literal value unchanged, or the value a key path points to
   */
  resolveValue(value: string): string {
    return this.isKeyPath(value) ? this.resolveKeyPath(value) : value;
  }
}
