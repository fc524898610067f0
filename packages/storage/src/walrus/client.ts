import { SilentLogger, UploadError, type Logger, type WalrusConfig } from '@repo-blob/shared';
import { errorMessage, jsonHeaders, readBody, topLevelKeys, trimTrailingSlash } from '../http';
import { extractBlobId, BLOB_ID_STRATEGIES, type BlobIdStrategy } from './blob-id';

export interface WalrusClientOptions extends Omit<WalrusConfig, 'tokenEnv'> {
  /** Bearer token, already resolved from the environment */
  token?: string;
  strategies?: readonly BlobIdStrategy[];
  logger?: Logger;
}

export interface StoredBlob {
  blobId: string;
  /** Strategy that located the id in the response */
  source: string;
  /** Where the blob can be read back from the aggregator */
  url: string;
  /** Parsed publisher response */
  response: unknown;
}

/**
 * Client for a Walrus publisher (uploads) and aggregator (read URLs).
 * No retries: any failure is reported to the caller as an {@link UploadError}.
 */
export class WalrusClient {
  private readonly options: WalrusClientOptions;
  private readonly logger: Logger;

  constructor(options: WalrusClientOptions) {
    this.options = options;
    this.logger = options.logger ?? new SilentLogger();
  }

  storeUrl(): string {
    const params = new URLSearchParams({
      encoding_type: this.options.encodingType,
      epochs: String(this.options.epochs),
      deletable: String(this.options.deletable),
      force: String(this.options.force),
    });
    return `${trimTrailingSlash(this.options.publisherUrl)}/v1/blobs?${params.toString()}`;
  }

  blobUrl(blobId: string): string {
    return `${trimTrailingSlash(this.options.aggregatorUrl)}/v1/${encodeURIComponent(blobId)}`;
  }

  async storeBlob(body: string | Uint8Array): Promise<StoredBlob> {
    const url = this.storeUrl();
    const size = typeof body === 'string' ? Buffer.byteLength(body) : body.byteLength;
    await this.logger.debug(`PUT ${url} (${size} bytes)`);

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'PUT',
        headers: jsonHeaders(this.options.token),
        body,
      });
    } catch (error) {
      throw new UploadError(`Walrus network error: ${errorMessage(error)}`, { cause: error });
    }

    const { text, json } = await readBody(response);

    if (response.status !== 200) {
      throw new UploadError(`Failed to upload to Walrus. HTTP Status: ${response.status}`, {
        status: response.status,
        details: text,
      });
    }

    if (json === undefined) {
      throw new UploadError('Walrus returned a response that is not JSON', {
        status: response.status,
        details: text,
      });
    }

    const extracted = extractBlobId(json, this.options.strategies ?? BLOB_ID_STRATEGIES);
    if (!extracted) {
      throw new UploadError('Failed to extract blob ID from response', {
        status: response.status,
        details: { availableFields: topLevelKeys(json) },
      });
    }

    await this.logger.debug(`Found blob ID in ${extracted.source}: ${extracted.blobId}`);
    return {
      blobId: extracted.blobId,
      source: extracted.source,
      url: this.blobUrl(extracted.blobId),
      response: json,
    };
  }
}
