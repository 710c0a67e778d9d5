import { Logger } from "pino";
import { GitProgressEvent } from "../workers/gitWorkerTypes.js";

export interface ProgressHandlerOptions {
  logger: Logger;
  /** Prefix naming what is being fetched */
  label: string;
  logInterval?: number;
}

export function createProgressHandler(options: ProgressHandlerOptions): (progress: GitProgressEvent) => void {
  const { logger, label, logInterval = 3000 } = options;

  let lastLogTime = Date.now();

  return (progress: GitProgressEvent): void => {
    const now = Date.now();
    if (now - lastLogTime < logInterval) {
      return;
    }

    const loaded = progress.loaded || 0;
    const total = progress.total || 0;

    if (total > 0) {
      const percentage = Math.min(99, Math.round((loaded / total) * 100));
      logger.info(`${label} ${progress.phase || "Syncing"}: ${percentage}% (${loaded}/${total} git objects)`);
      lastLogTime = now;
    }
  };
}
