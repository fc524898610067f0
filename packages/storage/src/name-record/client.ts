import {
  RecordUpdateError,
  SilentLogger,
  type Logger,
  type NameRecordConfig,
} from '@repo-blob/shared';
import { errorMessage, jsonHeaders, readBody, readStringAt, trimTrailingSlash } from '../http';

export interface NameRecordUpdate {
  /** Owner part of the repository slug; the name under which the record lives */
  label: string;
  repository: string;
  /** Content identifier (blob id) to publish */
  cid: string;
}

export interface NameRecordUpdateResult {
  status: number;
  transactionHash?: string;
  /** Block explorer link for the transaction, when a hash came back */
  explorerLink?: string;
  response: unknown;
}

export interface NameRecordClientOptions {
  serverUrl: string;
  explorerUrl: NameRecordConfig['explorerUrl'];
  token?: string;
  logger?: Logger;
}

/**
 * Splits `owner/name` the way the record server expects it. A slug without
 * a slash is used for both parts.
 */
export function splitRepository(slug: string): { label: string; repository: string } {
  const first = slug.indexOf('/');
  if (first === -1) {
    return { label: slug, repository: slug };
  }
  return { label: slug.slice(0, slug.lastIndexOf('/')), repository: slug.slice(first + 1) };
}

export class NameRecordClient {
  private readonly options: NameRecordClientOptions;
  private readonly logger: Logger;

  constructor(options: NameRecordClientOptions) {
    this.options = options;
    this.logger = options.logger ?? new SilentLogger();
  }

  updateUrl(): string {
    return `${trimTrailingSlash(this.options.serverUrl)}/api/update-ens`;
  }

  async update(update: NameRecordUpdate): Promise<NameRecordUpdateResult> {
    const url = this.updateUrl();
    await this.logger.debug(`POST ${url} label=${update.label} repository=${update.repository}`);

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: jsonHeaders(this.options.token),
        body: JSON.stringify({
          label: update.label,
          repository: update.repository,
          cid: update.cid,
        }),
      });
    } catch (error) {
      throw new RecordUpdateError(`Name-record server network error: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const { text, json } = await readBody(response);

    if (response.status !== 200) {
      throw new RecordUpdateError(
        `Failed to update ENS text record. HTTP Status: ${response.status}`,
        { status: response.status, details: text },
      );
    }

    const transactionHash = readStringAt(json, ['data', 'transactionHash']) || undefined;
    return {
      status: response.status,
      transactionHash,
      explorerLink: transactionHash
        ? `${trimTrailingSlash(this.options.explorerUrl)}/tx/${transactionHash}`
        : undefined,
      response: json ?? text,
    };
  }
}
