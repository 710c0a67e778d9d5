// URL path constants
export const PATH_CONSTANTS = {
  STATUS_ENDPOINT: "/api/v1/status",
  REFRESH_ENDPOINT: "/api/v1/refresh",

  DEFAULT_CONFIG_FILE: "content_sources.yaml",
  SYNC_MARKER_FILE: ".last_update",
  GIT_DIRECTORY: ".git",
};

export const SYNC_DEFAULTS = {
  BRANCH: "main",
  PRIORITY: 1.0,
  SOURCE_TYPE: "git",
  CONCURRENCY: 4,
  FETCH_TIMEOUT_MS: 5 * 60 * 1000,
  REFRESH_INTERVAL_MS: 15 * 60 * 1000,
};

export const NOTEBOOK_EXTENSION = ".ipynb";
export const DEFAULT_NOTEBOOK_LANGUAGE = "python";

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;
