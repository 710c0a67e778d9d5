/**
 * A file selected by filtering, not yet read
 */
export interface DocumentCandidate {
  path: string;
  sourceName: string;
  priority: number;
  sourceLabel: string;
}

export interface DocumentMetadata {
  file: string;
  fullPath: string;
  source: string;
  sourceLabel: string;
  priority: number;
  /** Unix seconds */
  lastModified: number;
}

export interface Document {
  path: string;
  text: string;
  metadata: DocumentMetadata;
}
