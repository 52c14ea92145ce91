import { createHash } from "node:crypto";
import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { ArchiveWriter, type ArtifactRequest } from "../../src/core/backup/archive-writer";

const NOW = new Date("2024-01-15T14:30:22.123Z");

describe("ArchiveWriter", () => {
  let tempDir: string;
  let request: ArtifactRequest;
  const writer = new ArchiveWriter(() => NOW);

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    tempDir = mkdtempSync(path.join(os.tmpdir(), "stowaway-writer-test-"));
    request = {
      service: "http-server",
      kind: "bind_mount",
      target: "scripts",
      directory: path.join(tempDir, "http-server", "bind_mounts", "scripts"),
      extension: "tar.gz",
    };
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  test("creates the directory and describes the artifact", async () => {
    const artifact = await writer.write(request, (artifactPath) => writeFile(artifactPath, "hello"));

    expect(artifact).toEqual({
      service: "http-server",
      kind: "bind_mount",
      target: "scripts",
      path: path.join(request.directory, "2024-01-15T14-30-22-123Z-scripts.tar.gz"),
      fileName: "2024-01-15T14-30-22-123Z-scripts.tar.gz",
      sizeBytes: 5,
      checksum: createHash("sha256").update("hello").digest("hex"),
      createdAt: NOW,
    });
    expect(readFileSync(artifact.path, "utf8")).toBe("hello");
  });

  test("never overwrites an artifact with the same timestamp", async () => {
    const first = await writer.write(request, (p) => writeFile(p, "first"));
    const second = await writer.write(request, (p) => writeFile(p, "second"));

    expect(second.fileName).toBe("2024-01-15T14-30-22-123Z_1-scripts.tar.gz");
    expect(readFileSync(first.path, "utf8")).toBe("first");
    expect(readFileSync(second.path, "utf8")).toBe("second");
  });

  test("concurrent writes get distinct names", async () => {
    const artifacts = await Promise.all(
      [0, 1, 2].map((i) => writer.write(request, (p) => writeFile(p, `content ${i}`))),
    );

    expect(new Set(artifacts.map((a) => a.fileName)).size).toBe(3);
    expect(readdirSync(request.directory)).toHaveLength(3);
  });

  test("skips a name whose rotated form already exists", async () => {
    await writer.write(request, (p) => writeFile(p, "x"));
    const [existing] = readdirSync(request.directory);
    const rotated = existing?.replace(".tar.gz", ".v0.tar.gz") ?? "";
    writeFileSync(path.join(request.directory, rotated), "x");
    rmSync(path.join(request.directory, existing ?? ""));

    const artifact = await writer.write(request, (p) => writeFile(p, "y"));

    expect(artifact.fileName).toBe("2024-01-15T14-30-22-123Z_1-scripts.tar.gz");
  });

  test("a failed producer leaves no file behind", async () => {
    await expect(
      writer.write(request, async (p) => {
        await writeFile(p, "partial");
        throw new Error("tar exploded");
      }),
    ).rejects.toThrow("tar exploded");

    expect(readdirSync(request.directory)).toEqual([]);
  });

  test("a producer that deletes the file is reported", async () => {
    await expect(
      writer.write(request, async (p) => {
        rmSync(p);
      }),
    ).rejects.toThrow(/^Cannot read artifact/);
    expect(existsSync(request.directory)).toBe(true);
  });
});
