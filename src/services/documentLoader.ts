import * as fs from "fs/promises";
import * as path from "path";
import { Logger } from "pino";
import { Document, DocumentCandidate } from "../model/document.js";
import { getErrorMessage } from "../model/error/BackendError.js";
import { extractNotebookText } from "../util/notebook.js";
import { NOTEBOOK_EXTENSION } from "../constant.js";

export function isNotebook(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === NOTEBOOK_EXTENSION;
}

/**
 * Turns selected files into documents. Decoding is lenient on purpose: invalid
 * UTF-8 sequences become replacement characters instead of failing the file.
 */
export class DocumentLoader {
  private readonly logger: Logger;

  public constructor(logger: Logger) {
    this.logger = logger;
  }

  public async load(candidate: DocumentCandidate): Promise<Document | null> {
    try {
      const raw = await fs.readFile(candidate.path, "utf8");
      const text = isNotebook(candidate.path) ? this.extractNotebook(candidate.path, raw) : raw;

      if (!text.trim()) {
        this.logger.warn(`Skipping empty file: ${candidate.path}`);
        return null;
      }

      const stats = await fs.stat(candidate.path);

      return {
        path: candidate.path,
        text,
        metadata: {
          file: path.basename(candidate.path),
          fullPath: candidate.path,
          source: candidate.sourceName,
          sourceLabel: candidate.sourceLabel,
          priority: candidate.priority,
          lastModified: stats.mtimeMs / 1000,
        },
      };
    } catch (error) {
      this.logger.error(`Failed to load file ${candidate.path}: ${getErrorMessage(error)}`);
      return null;
    }
  }

  public async loadAll(candidates: DocumentCandidate[]): Promise<Document[]> {
    const documents: Document[] = [];
    for await (const document of this.stream(candidates)) {
      documents.push(document);
    }
    this.logger.info(`Successfully loaded ${documents.length} documents`);
    return documents;
  }

  public async *stream(candidates: Iterable<DocumentCandidate>): AsyncGenerator<Document> {
    for (const candidate of candidates) {
      const document = await this.load(candidate);
      if (document) {
        yield document;
      }
    }
  }

  private extractNotebook(filePath: string, raw: string): string {
    try {
      return extractNotebookText(path.basename(filePath), raw);
    } catch (error) {
      this.logger.error(`Failed to extract notebook text from ${filePath}: ${getErrorMessage(error)}`);
      return "";
    }
  }
}
