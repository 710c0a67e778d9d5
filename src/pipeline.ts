import { Logger } from "pino";
import { ContentManager } from "./services/contentManager.js";
import { DocumentLoader } from "./services/documentLoader.js";
import { createGitRepositoryClient } from "./services/gitRepositoryClient.js";
import { RepositoryClientFactory } from "./services/interfaces/repositoryClient.js";
import { loadSourcesConfig } from "./util/sourcesConfig.js";
import { Document } from "./model/document.js";
import { PATH_CONSTANTS } from "./constant.js";

export type { Document, DocumentCandidate, DocumentMetadata } from "./model/document.js";
export type { ContentStats, SourceConfig, SourceStats } from "./model/sourceConfig.js";
export { Cadence } from "./model/cadence.js";
export { ContentManager } from "./services/contentManager.js";
export { ContentSource } from "./services/contentSource.js";
export { DocumentLoader } from "./services/documentLoader.js";
export { needsUpdate } from "./services/frequencyPolicy.js";
export { selectFiles } from "./services/pathFilter.js";

export interface PipelineOptions {
  logger: Logger;
  configPath?: string;
  concurrency?: number;
  fetchTimeoutMs?: number;
  gitToken?: string;
  /** Sync every source regardless of its cadence */
  force?: boolean;
  clientFactory?: RepositoryClientFactory;
}

export async function createContentManager(options: PipelineOptions): Promise<ContentManager> {
  const { logger } = options;
  const configs = await loadSourcesConfig(options.configPath ?? PATH_CONSTANTS.DEFAULT_CONFIG_FILE, logger);

  const manager = new ContentManager(configs, {
    logger,
    clientFactory: options.clientFactory ?? createGitRepositoryClient(logger),
    concurrency: options.concurrency,
    fetchTimeoutMs: options.fetchTimeoutMs,
    gitToken: options.gitToken,
  });
  await manager.initialize();
  return manager;
}

/**
 * Refreshes whatever is due, then yields every non-empty document of every
 * source. Each call runs the whole pipeline from the top.
 */
export async function* streamDocumentsFromSources(options: PipelineOptions): AsyncGenerator<Document> {
  const { logger } = options;
  const manager = await createContentManager(options);

  try {
    logger.info("Checking for content updates...");
    await manager.refresh(options.force ?? false);

    const candidates = await manager.collectDocuments();
    logger.info(`Loading ${candidates.length} files for indexing`);

    yield* new DocumentLoader(logger).stream(candidates);
  } finally {
    manager.destroy();
  }
}

export async function loadDocumentsFromSources(options: PipelineOptions): Promise<Document[]> {
  const documents: Document[] = [];
  for await (const document of streamDocumentsFromSources(options)) {
    documents.push(document);
  }
  options.logger.info(`Successfully loaded ${documents.length} documents`);
  return documents;
}
