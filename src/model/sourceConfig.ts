import { Cadence } from "./cadence.js";

export interface SourceConfig {
  name: string;
  type: string;
  url: string;
  branch: string;
  localPath: string;
  updateFrequency: Cadence;
  includePaths: string[];
  excludePaths: string[];
  priority: number;
  sourceLabel: string;
}

/**
 * One entry under `content_sources` as written in the YAML file
 */
export interface RawSourceEntry {
  name?: unknown;
  type?: unknown;
  url?: unknown;
  branch?: unknown;
  local_path?: unknown;
  update_frequency?: unknown;
  include_paths?: unknown;
  exclude_paths?: unknown;
  priority?: unknown;
  source_label?: unknown;
}

export interface SourceStats {
  name: string;
  url: string;
  branch: string;
  fileCount: number;
  lastSyncTime: string | null;
  priority: number;
}

export interface ContentStats {
  sourceCount: number;
  sources: SourceStats[];
  totalFileCount: number;
}
