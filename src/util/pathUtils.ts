import path from "path";

/**
 * Normalizes a filesystem path to use posix-style separators
 * @param filePath The path to normalize
 * @returns Normalized path with forward slashes
 */
export function normalizePath(filePath: string): string {
  return filePath.replace(/\\/g, "/");
}

/**
 * Expresses a file path relative to a root directory in forward-slash form.
 * @returns The relative path, or null when the file does not live under root
 */
export function toRelativePosixPath(root: string, filePath: string): string | null {
  const relativePath = path.relative(root, filePath);
  if (
    relativePath === "" ||
    relativePath === ".." ||
    relativePath.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relativePath)
  ) {
    return null;
  }
  return normalizePath(relativePath);
}

/**
 * Resolves a configured path against a base directory, leaving absolute paths untouched
 */
export function resolveFrom(baseDir: string, configuredPath: string): string {
  return path.isAbsolute(configuredPath) ? path.normalize(configuredPath) : path.resolve(baseDir, configuredPath);
}

/**
 * Gets the directory a staged copy of a checkout is built in before being moved into place
 */
export function getStagingPath(localPath: string): string {
  return `${path.normalize(localPath).replace(/[\\/]+$/, "")}.staging`;
}
