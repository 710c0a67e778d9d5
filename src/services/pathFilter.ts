import * as fs from "fs/promises";
import * as path from "path";
import fg from "fast-glob";
import { minimatch } from "minimatch";
import { Logger } from "pino";
import { PATH_CONSTANTS } from "../constant.js";
import { toRelativePosixPath } from "../util/pathUtils.js";

// Never part of a source's content, even when a pattern names them explicitly
const ALWAYS_IGNORED = [`**/${PATH_CONSTANTS.GIT_DIRECTORY}/**`, `**/${PATH_CONSTANTS.SYNC_MARKER_FILE}`];

/**
 * Exclude patterns are matched against the forward-slash path relative to the
 * source root. A pattern without a slash matches the file name at any depth.
 */
export function isExcluded(relativePath: string, excludePatterns: string[]): boolean {
  return excludePatterns.some((pattern) => minimatch(relativePath, pattern, { dot: true, matchBase: true }));
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    const stats = await fs.stat(dir);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Selects the files under root matched by any include pattern and by no
 * exclude pattern.
 *
 * @returns Absolute file paths, sorted for stable output
 */
export async function selectFiles(
  root: string,
  includePatterns: string[],
  excludePatterns: string[],
  logger: Logger,
): Promise<string[]> {
  const resolvedRoot = path.resolve(root);

  if (!(await isDirectory(resolvedRoot))) {
    logger.warn(`Content path does not exist: ${resolvedRoot}`);
    return [];
  }

  const selected = new Set<string>();

  for (const pattern of includePatterns) {
    let matches: string[];
    try {
      matches = await fg(pattern, {
        cwd: resolvedRoot,
        absolute: true,
        onlyFiles: true,
        dot: true,
        ignore: ALWAYS_IGNORED,
        suppressErrors: true,
      });
    } catch (error) {
      logger.warn(`Skipping include pattern '${pattern}' in ${resolvedRoot}: ${error}`);
      continue;
    }

    for (const match of matches) {
      const relativePath = toRelativePosixPath(resolvedRoot, match);
      if (relativePath === null) {
        continue;
      }
      if (isExcluded(relativePath, excludePatterns)) {
        continue;
      }
      selected.add(path.normalize(match));
    }
  }

  return [...selected].sort();
}
