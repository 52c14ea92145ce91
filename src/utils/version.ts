import { readFileSync } from "node:fs";
import * as path from "node:path";
import { logger } from "./logger";

/**
 * Version from package.json; two levels up from both src/utils and dist/utils
 */
export function readPackageVersion(): string {
  try {
    const content = readFileSync(path.join(__dirname, "..", "..", "package.json"), "utf8");
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed === "object" && parsed !== null && "version" in parsed) {
      return typeof parsed.version === "string" ? parsed.version : "0.0.0";
    }
  } catch (error) {
    logger.debug("Cannot read package version", error);
  }
  return "0.0.0";
}
