import { PackagingError, atomicWrite } from '@repo-blob/shared';
import type { ContentType, OutputDocument } from './types';

export type DocumentSummary = Record<ContentType, number> & {
  totalFiles: number;
  totalSize: number;
};

/** Two-space indented JSON, non-ASCII kept as is. */
export function serializeDocument(document: OutputDocument): string {
  return JSON.stringify(document, null, 2);
}

export async function writeDocument(document: OutputDocument, outputPath: string): Promise<number> {
  const body = serializeDocument(document);
  try {
    await atomicWrite(outputPath, body);
  } catch (error) {
    throw new PackagingError(`Failed to write output document to ${outputPath}`, {
      cause: error,
      details: { outputPath },
    });
  }
  return Buffer.byteLength(body, 'utf8');
}

export function summarizeDocument(document: OutputDocument): DocumentSummary {
  const summary: DocumentSummary = {
    text: 0,
    binary: 0,
    error: 0,
    totalFiles: document.metadata.total_files,
    totalSize: document.metadata.total_size,
  };
  for (const record of Object.values(document.files)) {
    summary[record.content_type] += 1;
  }
  return summary;
}
