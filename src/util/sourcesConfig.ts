import * as fs from "fs/promises";
import * as path from "path";
import yaml from "js-yaml";
import { Logger } from "pino";
import { Cadence, parseCadence } from "../model/cadence.js";
import { RawSourceEntry, SourceConfig } from "../model/sourceConfig.js";
import { ValidationError } from "../model/error/ValidationError.js";
import { getErrorMessage } from "../model/error/BackendError.js";
import { resolveFrom } from "./pathUtils.js";
import { SYNC_DEFAULTS } from "../constant.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readRequiredString(entry: RawSourceEntry, key: keyof RawSourceEntry, errors: string[]): string {
  const value = entry[key];
  if (typeof value !== "string" || value.trim() === "") {
    errors.push(`'${key}' is required and must be a non-empty string`);
    return "";
  }
  return value.trim();
}

function readOptionalString(
  entry: RawSourceEntry,
  key: keyof RawSourceEntry,
  fallback: string,
  errors: string[],
): string {
  const value = entry[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "string" || value.trim() === "") {
    errors.push(`'${key}' must be a non-empty string`);
    return fallback;
  }
  return value.trim();
}

function readPatterns(entry: RawSourceEntry, key: "include_paths" | "exclude_paths", errors: string[]): string[] {
  const value = entry[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((pattern): pattern is string => typeof pattern === "string")) {
    errors.push(`'${key}' must be a list of glob patterns`);
    return [];
  }
  return value;
}

function readPriority(entry: RawSourceEntry, errors: string[]): number {
  const value = entry.priority;
  if (value === undefined || value === null) {
    return SYNC_DEFAULTS.PRIORITY;
  }
  const priority = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof priority !== "number" || !Number.isFinite(priority)) {
    errors.push(`'priority' must be a number, got '${String(value)}'`);
    return SYNC_DEFAULTS.PRIORITY;
  }
  return priority;
}

function readCadence(entry: RawSourceEntry, errors: string[]): Cadence {
  const cadence = parseCadence(entry.update_frequency);
  if (cadence === undefined) {
    errors.push(
      `'update_frequency' must be one of ${Object.values(Cadence).join(", ")}, got '${String(entry.update_frequency)}'`,
    );
    return Cadence.Never;
  }
  return cadence;
}

/**
 * Validates one `content_sources` entry and applies defaults.
 * Relative local paths resolve against baseDir.
 *
 * @throws ValidationError listing every problem with the entry
 */
export function parseSourceEntry(entry: unknown, baseDir: string): SourceConfig {
  if (!isRecord(entry)) {
    throw ValidationError.fromErrors(["Source entry must be a mapping"]);
  }

  const raw: RawSourceEntry = entry;
  const errors: string[] = [];

  const name = readRequiredString(raw, "name", errors);
  const url = readRequiredString(raw, "url", errors);
  const localPath = readRequiredString(raw, "local_path", errors);

  const config: SourceConfig = {
    name,
    type: readOptionalString(raw, "type", SYNC_DEFAULTS.SOURCE_TYPE, errors),
    url,
    branch: readOptionalString(raw, "branch", SYNC_DEFAULTS.BRANCH, errors),
    localPath: localPath ? resolveFrom(baseDir, localPath) : "",
    updateFrequency: readCadence(raw, errors),
    includePaths: readPatterns(raw, "include_paths", errors),
    excludePaths: readPatterns(raw, "exclude_paths", errors),
    priority: readPriority(raw, errors),
    sourceLabel: readOptionalString(raw, "source_label", name, errors),
  };

  if (errors.length > 0) {
    throw ValidationError.fromErrors(errors, name || undefined);
  }

  return config;
}

/**
 * Parses the YAML configuration. A malformed entry is logged and skipped;
 * the others still load.
 */
export function parseSourcesConfig(content: string, baseDir: string, logger: Logger): SourceConfig[] {
  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (error) {
    logger.error(`Failed to parse content source configuration: ${getErrorMessage(error)}`);
    return [];
  }

  if (!isRecord(document) || document.content_sources === undefined || document.content_sources === null) {
    logger.warn("No content sources defined in config");
    return [];
  }

  const entries = document.content_sources;
  if (!Array.isArray(entries)) {
    logger.error("'content_sources' must be a list");
    return [];
  }

  const sources: SourceConfig[] = [];
  const names = new Set<string>();

  entries.forEach((entry: unknown, index) => {
    const label = isRecord(entry) && typeof entry.name === "string" ? entry.name : `#${index + 1}`;
    try {
      const source = parseSourceEntry(entry, baseDir);
      if (names.has(source.name)) {
        throw ValidationError.fromErrors([`Duplicate source name '${source.name}'`], source.name);
      }
      names.add(source.name);
      sources.push(source);
      logger.info(`Loaded content source: ${source.name}`);
    } catch (error) {
      logger.error(`Failed to load source ${label}: ${getErrorMessage(error)}`);
    }
  });

  return sources;
}

export async function loadSourcesConfig(configPath: string, logger: Logger): Promise<SourceConfig[]> {
  const resolvedPath = path.resolve(configPath);

  let content: string;
  try {
    content = await fs.readFile(resolvedPath, "utf8");
  } catch (error) {
    logger.warn(`Config file not found: ${resolvedPath} (${getErrorMessage(error)})`);
    logger.warn("Content manager initialized with no sources");
    return [];
  }

  return parseSourcesConfig(content, path.dirname(resolvedPath), logger);
}
