import type { Logger, RepoBlobConfig } from '@repo-blob/shared';
import { NameRecordClient, WalrusClient } from '@repo-blob/storage';
import { ConfigLoader } from '../config/loader';

export function createWalrusClient(
  config: RepoBlobConfig,
  env: NodeJS.ProcessEnv,
  logger?: Logger,
): WalrusClient {
  const { tokenEnv, ...walrus } = config.walrus;
  return new WalrusClient({
    ...walrus,
    token: ConfigLoader.resolveToken(tokenEnv, env),
    logger: logger?.child({ client: 'walrus' }),
  });
}

/**
 * Returns undefined when no record server is configured.
 */
export function createNameRecordClient(
  config: RepoBlobConfig,
  env: NodeJS.ProcessEnv,
  logger?: Logger,
): NameRecordClient | undefined {
  const { serverUrl, explorerUrl, tokenEnv } = config.nameRecord;
  if (!serverUrl) {
    return undefined;
  }
  return new NameRecordClient({
    serverUrl,
    explorerUrl,
    token: ConfigLoader.resolveToken(tokenEnv, env),
    logger: logger?.child({ client: 'name-record' }),
  });
}
