import { CommandLineOptions, ServeCommandOptions, SyncOptions } from "../model/cli.js";
import { ContentServerOptions } from "../model/server.js";
import { ValidationError } from "../model/error/ValidationError.js";

const MAX_PORT = 65535;

function parsePositiveInteger(value: string, option: string, errors: string[]): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (trimmed === "" || !Number.isInteger(parsed) || parsed <= 0) {
    errors.push(`Option ${option} must be a positive integer, got '${value}'`);
    return 0;
  }
  return parsed;
}

function parsePositiveNumber(value: string, option: string, errors: string[]): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (trimmed === "" || !Number.isFinite(parsed) || parsed <= 0) {
    errors.push(`Option ${option} must be a positive number, got '${value}'`);
    return 0;
  }
  return parsed;
}

/**
 * @throws ValidationError listing every invalid option
 */
export function validateAndParseOptions(options: CommandLineOptions): SyncOptions {
  const errors: string[] = [];

  if (!options.config || options.config.trim() === "") {
    errors.push("Option --config must not be empty");
  }
  const concurrency = parsePositiveInteger(options.concurrency, "--concurrency", errors);
  const timeoutSeconds = parsePositiveNumber(options.timeout, "--timeout", errors);

  if (errors.length > 0) {
    throw ValidationError.fromErrors(errors, "options");
  }

  return {
    configPath: options.config.trim(),
    concurrency,
    fetchTimeoutMs: timeoutSeconds * 1000,
    gitToken: options.gitToken || undefined,
  };
}

/**
 * @throws ValidationError listing every invalid option
 */
export function validateServeOptions(options: ServeCommandOptions): ContentServerOptions {
  const errors: string[] = [];

  if (!options.host || options.host.trim() === "") {
    errors.push("Option --host must not be empty");
  }
  const port = parsePositiveInteger(options.port, "--port", errors);
  if (port > MAX_PORT) {
    errors.push(`Option --port must be at most ${MAX_PORT}, got '${options.port}'`);
  }
  const intervalMinutes = parsePositiveNumber(options.interval, "--interval", errors);

  if (errors.length > 0) {
    throw ValidationError.fromErrors(errors, "options");
  }

  return {
    host: options.host.trim(),
    port,
    refreshIntervalMs: intervalMinutes * 60 * 1000,
  };
}
