import { readStringAt } from '../http';

/**
 * One known location of the blob id in a publisher response.
 */
export interface BlobIdStrategy {
  readonly name: string;
  extract(response: unknown): string | undefined;
}

export interface ExtractedBlobId {
  blobId: string;
  /** Name of the strategy that matched */
  source: string;
}

// jq -r style placeholders that older tooling wrote in place of a missing id
const PLACEHOLDERS = new Set(['', 'null', 'empty']);

function atPath(name: string, ...keys: string[]): BlobIdStrategy {
  return {
    name,
    extract: (response) => {
      const value = readStringAt(response, keys);
      return value !== undefined && !PLACEHOLDERS.has(value) ? value : undefined;
    },
  };
}

/**
 * Tried in order; the first match wins. New publisher versions nest the
 * id under `blobObject`, older ones put it one level up or at the root.
 */
export const BLOB_ID_STRATEGIES: readonly BlobIdStrategy[] = [
  atPath('newlyCreated.blobObject', 'newlyCreated', 'blobObject', 'blobId'),
  atPath('alreadyCertified.blobObject', 'alreadyCertified', 'blobObject', 'blobId'),
  atPath('newlyCreated', 'newlyCreated', 'blobId'),
  atPath('alreadyCertified', 'alreadyCertified', 'blobId'),
  atPath('root', 'blobId'),
];

export function extractBlobId(
  response: unknown,
  strategies: readonly BlobIdStrategy[] = BLOB_ID_STRATEGIES,
): ExtractedBlobId | undefined {
  for (const strategy of strategies) {
    const blobId = strategy.extract(response);
    if (blobId !== undefined) {
      return { blobId, source: strategy.name };
    }
  }
  return undefined;
}
