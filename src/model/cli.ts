/**
 * Raw option values as commander hands them over; numbers are still strings
 * when they come from the environment.
 */
export interface CommandLineOptions {
  config: string;
  concurrency: string;
  timeout: string;
  gitToken?: string;
}

export interface RefreshCommandOptions {
  force?: boolean;
}

export interface ServeCommandOptions {
  host: string;
  port: string;
  interval: string;
}

export interface SyncOptions {
  configPath: string;
  concurrency: number;
  fetchTimeoutMs: number;
  gitToken?: string;
}
