/**
 * Backup scheme file loading
 */

import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import { errorMessage, SchemeInvalidError } from "../errors";
import type { BackupScheme } from "../types";
import { logger } from "../utils/logger";
import { validateScheme } from "./validator";

/**
 * Load, parse and validate a backup scheme file
 */
export async function loadScheme(schemePath: string): Promise<BackupScheme> {
  const absolutePath = path.resolve(schemePath);

  let content: string;
  try {
    content = await readFile(absolutePath, "utf8");
  } catch (e) {
    throw new SchemeInvalidError(`Cannot read backup scheme ${absolutePath}: ${errorMessage(e)}`);
  }

  const ext = path.extname(absolutePath).toLowerCase();
  const scheme = validateScheme(parseSchemeContent(content, ext));

  logger.debug(
    `Loaded backup scheme ${absolutePath}: ${scheme.map((s) => `${s.service} (${s.tasks.length})`).join(", ")}`,
  );
  return scheme;
}

export function parseSchemeContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new SchemeInvalidError(`Failed to parse YAML: ${errorMessage(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new SchemeInvalidError(`Failed to parse JSON: ${errorMessage(e)}`);
    }
  }

  throw new SchemeInvalidError(`Unsupported scheme file format: ${ext}. Use .json, .yaml or .yml`);
}
