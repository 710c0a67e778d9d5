import * as fs from "fs/promises";
import * as path from "path";
import { PATH_CONSTANTS } from "../constant.js";

export function getSyncMarkerPath(localPath: string): string {
  return path.join(localPath, PATH_CONSTANTS.SYNC_MARKER_FILE);
}

/**
 * Reads the last successful sync time stored beside a checkout.
 * The marker holds a bare Unix timestamp in seconds; a missing or unparsable
 * marker means no prior sync.
 */
export async function readSyncMarker(localPath: string): Promise<Date | null> {
  let content: string;
  try {
    content = await fs.readFile(getSyncMarkerPath(localPath), "utf8");
  } catch {
    return null;
  }

  const trimmed = content.trim();
  if (!/^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/.test(trimmed)) {
    return null;
  }

  const seconds = Number(trimmed);
  if (!Number.isFinite(seconds)) {
    return null;
  }
  return new Date(seconds * 1000);
}

export async function writeSyncMarker(localPath: string, syncTime: Date): Promise<void> {
  await fs.writeFile(getSyncMarkerPath(localPath), String(syncTime.getTime() / 1000), "utf8");
}
