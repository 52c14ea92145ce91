import { describe, expect, test } from "vitest";
import {
  compareArtifactAge,
  formatTimestamp,
  generateArtifactName,
  type ParsedArtifactName,
  parseArtifactName,
  sanitizeTargetName,
  versionedArtifactName,
} from "../../src/utils/naming";

const DATE = new Date("2024-01-15T14:30:22.123Z");

describe("naming utilities", () => {
  describe("formatTimestamp", () => {
    test("replaces colons and dots", () => {
      expect(formatTimestamp(DATE)).toBe("2024-01-15T14-30-22-123Z");
    });
  });

  describe("sanitizeTargetName", () => {
    test("strips leading ./ and trailing slash", () => {
      expect(sanitizeTargetName("./scripts/")).toBe("scripts");
    });

    test("replaces unsafe characters", () => {
      expect(sanitizeTargetName("/var/lib/my data")).toBe("var_lib_my_data");
    });

    test("keeps dots, dashes and underscores", () => {
      expect(sanitizeTargetName("my-db_v1.2")).toBe("my-db_v1.2");
    });

    test("falls back to root", () => {
      expect(sanitizeTargetName("./")).toBe("root");
      expect(sanitizeTargetName("/")).toBe("root");
    });
  });

  describe("generateArtifactName", () => {
    test("timestamp then target then extension", () => {
      expect(generateArtifactName("scripts", "tar.gz", DATE)).toBe(
        "2024-01-15T14-30-22-123Z-scripts.tar.gz",
      );
    });

    test("appends collision counter to the timestamp", () => {
      expect(generateArtifactName("test_database", "sql", DATE, 2)).toBe(
        "2024-01-15T14-30-22-123Z_2-test_database.sql",
      );
    });

    test("sanitises the target", () => {
      expect(generateArtifactName("./data dir", "tar.gz", DATE)).toBe(
        "2024-01-15T14-30-22-123Z-data_dir.tar.gz",
      );
    });
  });

  describe("parseArtifactName", () => {
    test("parses a fresh artifact", () => {
      expect(parseArtifactName("2024-01-15T14-30-22-123Z-scripts.tar.gz")).toEqual({
        timestamp: "2024-01-15T14-30-22-123Z",
        sequence: 0,
        target: "scripts",
        version: null,
        extension: "tar.gz",
        stem: "2024-01-15T14-30-22-123Z-scripts",
      });
    });

    test("parses counter and version", () => {
      const parsed = parseArtifactName("2024-01-15T14-30-22-123Z_1-test.db.v3.sql");
      expect(parsed?.sequence).toBe(1);
      expect(parsed?.target).toBe("test.db");
      expect(parsed?.version).toBe(3);
      expect(parsed?.extension).toBe("sql");
      expect(parsed?.stem).toBe("2024-01-15T14-30-22-123Z_1-test.db");
    });

    test("rejects other files", () => {
      expect(parseArtifactName("notes.txt")).toBeNull();
      expect(parseArtifactName("2024-01-15-scripts.tar.gz")).toBeNull();
      expect(parseArtifactName("2024-01-15T14-30-22-123Z-scripts.zip")).toBeNull();
      expect(parseArtifactName("README.md")).toBeNull();
    });
  });

  describe("versionedArtifactName", () => {
    test("inserts the version before the extension", () => {
      const parsed = parseArtifactName("2024-01-15T14-30-22-123Z-scripts.v1.tar.gz");
      expect(parsed).not.toBeNull();
      if (!parsed) return;
      expect(versionedArtifactName(parsed, 0)).toBe("2024-01-15T14-30-22-123Z-scripts.v0.tar.gz");
    });
  });

  describe("compareArtifactAge", () => {
    test("orders by timestamp then counter", () => {
      const names = [
        "2024-01-16T00-00-00-000Z-a.tar.gz",
        "2024-01-15T00-00-00-000Z_1-a.v0.tar.gz",
        "2024-01-15T00-00-00-000Z-a.v1.tar.gz",
      ];
      const sorted = names
        .map((name) => parseArtifactName(name))
        .filter((parsed): parsed is ParsedArtifactName => parsed !== null)
        .sort(compareArtifactAge)
        .map((parsed) => parsed.stem);

      expect(sorted).toEqual([
        "2024-01-15T00-00-00-000Z-a",
        "2024-01-15T00-00-00-000Z_1-a",
        "2024-01-16T00-00-00-000Z-a",
      ]);
    });
  });
});
