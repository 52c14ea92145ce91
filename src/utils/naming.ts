/**
 * Artifact naming utilities
 *
 * Fresh artifact:   <timestamp>[_<n>]-<target>.<ext>
 * Rotated artifact: <timestamp>[_<n>]-<target>.v<version>.<ext>
 *
 * The timestamp is UTC ISO 8601 with ":" and "." replaced by "-", so names
 * sort chronologically as plain strings. `_<n>` disambiguates artifacts
 * created within the same millisecond.
 */

export type ArtifactExtension = "tar.gz" | "sql";

const TIMESTAMP = String.raw`\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}-\d{3}Z`;

export const ARTIFACT_NAME_PATTERN = new RegExp(
  String.raw`^(${TIMESTAMP})(?:_(\d+))?-(.+?)(?:\.v(\d+))?\.(tar\.gz|sql)$`,
);

export interface ParsedArtifactName {
  timestamp: string;
  /** Collision counter, 0 when absent */
  sequence: number;
  target: string;
  /** Rotation version, null for an artifact that was never rotated */
  version: number | null;
  extension: ArtifactExtension;
  /** Name without version and extension; stable across rotations */
  stem: string;
}

export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/[:.]/g, "-");
}

/**
 * Make a target name safe to use as a directory and file name component
 */
export function sanitizeTargetName(name: string): string {
  const sanitized = name
    .replace(/^\.\/+/, "")
    .replace(/\/+$/, "")
    .replace(/[^a-zA-Z0-9._-]/g, "_")
    .replace(/^[._]+/, "");
  return sanitized || "root";
}

export function generateArtifactName(
  target: string,
  extension: ArtifactExtension,
  date: Date = new Date(),
  sequence: number = 0,
): string {
  const suffix = sequence > 0 ? `_${sequence}` : "";
  return `${formatTimestamp(date)}${suffix}-${sanitizeTargetName(target)}.${extension}`;
}

export function parseArtifactName(fileName: string): ParsedArtifactName | null {
  const match = fileName.match(ARTIFACT_NAME_PATTERN);
  if (!match) return null;

  const [, timestamp, sequence, target, version, extension] = match;
  if (!timestamp || !target || (extension !== "tar.gz" && extension !== "sql")) {
    return null;
  }

  const sequenceNumber = sequence ? parseInt(sequence, 10) : 0;
  const stem = `${timestamp}${sequence ? `_${sequence}` : ""}-${target}`;

  return {
    timestamp,
    sequence: sequenceNumber,
    target,
    version: version !== undefined ? parseInt(version, 10) : null,
    extension,
    stem,
  };
}

export function versionedArtifactName(parsed: ParsedArtifactName, version: number): string {
  return `${parsed.stem}.v${version}.${parsed.extension}`;
}

/**
 * Order artifacts oldest first
 */
export function compareArtifactAge(a: ParsedArtifactName, b: ParsedArtifactName): number {
  if (a.timestamp !== b.timestamp) {
    return a.timestamp < b.timestamp ? -1 : 1;
  }
  if (a.sequence !== b.sequence) {
    return a.sequence - b.sequence;
  }
  return a.stem < b.stem ? -1 : a.stem > b.stem ? 1 : 0;
}
