export interface ContentServerOptions {
  host: string;
  port: number;
  refreshIntervalMs: number;
}
