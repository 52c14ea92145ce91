/**
 * Topology type definitions: services as declared by the compose file
 */

export interface BindMount {
  /** Source as written in the compose file (e.g. "./scripts") */
  source: string;
  /** Absolute host path */
  hostPath: string;
  /** Mount point inside the container */
  mountPoint: string;
  readOnly: boolean;
}

export interface NamedVolume {
  /** Volume name as declared in the compose file */
  name: string;
  /** Name the container runtime knows the volume by */
  dockerName: string;
  /** Mount point inside the container */
  mountPoint: string;
  readOnly: boolean;
}

export interface Service {
  /** Compose service name */
  name: string;
  /** Runtime identity used for stop/start/exec */
  containerName: string;
  image?: string;
  hostname?: string;
  environment: Record<string, string>;
  bindMounts: BindMount[];
  volumes: NamedVolume[];
}

export interface Topology {
  projectName: string;
  composePath: string;
  services: Service[];
}
