import { z } from 'zod';

export const DEFAULT_EXCLUDED_DIRS = [
  '.git',
  '.github',
  'node_modules',
  '.next',
  'dist',
  'build',
  '__pycache__',
];
export const DEFAULT_EXCLUDED_EXTENSIONS = ['.log', '.tmp', '.temp', '.lock', '.cache'];
export const DEFAULT_EXCLUDED_FILES = ['.DS_Store', 'Thumbs.db', '.env', '.env.local'];
/** 1 MiB */
export const DEFAULT_MAX_FILE_SIZE = 1024 * 1024;
export const DEFAULT_OUTPUT_FILE = 'codebase.json';

export const DEFAULT_PUBLISHER_URL = 'https://publisher.walrus-testnet.walrus.space';
export const DEFAULT_AGGREGATOR_URL = 'https://aggregator.walrus-testnet.walrus.space';
export const DEFAULT_EXPLORER_URL = 'https://sepolia.basescan.org';

export const PackagerConfigSchema = z.object({
  excludedDirs: z.array(z.string().min(1)).default(DEFAULT_EXCLUDED_DIRS),
  excludedExtensions: z
    .array(z.string().regex(/^\./, 'extensions must start with a dot'))
    .default(DEFAULT_EXCLUDED_EXTENSIONS),
  excludedFiles: z.array(z.string().min(1)).default(DEFAULT_EXCLUDED_FILES),
  maxFileSize: z.number().int().positive().default(DEFAULT_MAX_FILE_SIZE),
  output: z.string().min(1).default(DEFAULT_OUTPUT_FILE),
});
export type PackagerConfig = z.infer<typeof PackagerConfigSchema>;

export const WalrusConfigSchema = z.object({
  publisherUrl: z.string().url().default(DEFAULT_PUBLISHER_URL),
  aggregatorUrl: z.string().url().default(DEFAULT_AGGREGATOR_URL),
  encodingType: z.string().min(1).default('RS2'),
  epochs: z.number().int().positive().default(1),
  deletable: z.boolean().default(false),
  force: z.boolean().default(true),
  /** Name of the environment variable holding a bearer token, if the publisher needs one */
  tokenEnv: z.string().optional(),
});
export type WalrusConfig = z.infer<typeof WalrusConfigSchema>;

export const NameRecordConfigSchema = z.object({
  /** Base URL of the name-record update server; the update step is skipped without it */
  serverUrl: z.string().url().optional(),
  explorerUrl: z.string().url().default(DEFAULT_EXPLORER_URL),
  tokenEnv: z.string().optional(),
});
export type NameRecordConfig = z.infer<typeof NameRecordConfigSchema>;

export const RepoBlobConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  packager: PackagerConfigSchema.default({}),
  walrus: WalrusConfigSchema.default({}),
  nameRecord: NameRecordConfigSchema.default({}),
});

export type RepoBlobConfig = z.infer<typeof RepoBlobConfigSchema>;
/** Input shape accepted before defaults are applied (YAML files, flags) */
export type RepoBlobConfigInput = z.input<typeof RepoBlobConfigSchema>;
