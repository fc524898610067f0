import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import {
  ConfigError,
  RepoBlobConfigSchema,
  type RepoBlobConfig,
  type RepoBlobConfigInput,
} from '@repo-blob/shared';

export const REPO_CONFIG_FILENAME = '.repo-blob.yaml';

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: RepoBlobConfigInput; // CLI flags
  cwd?: string; // Directory holding the repo config
  env?: NodeJS.ProcessEnv; // Environment variables
}

type ConfigRecord = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Environment variables that override single config fields
const ENV_OVERRIDES: ReadonlyArray<{ env: string; section: string; key: string }> = [
  { env: 'WALRUS_PUBLISHER_URL', section: 'walrus', key: 'publisherUrl' },
  { env: 'WALRUS_AGGREGATOR_URL', section: 'walrus', key: 'aggregatorUrl' },
  { env: 'NAME_RECORD_SERVER_URL', section: 'nameRecord', key: 'serverUrl' },
];

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigRecord {
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      const parsed: unknown = yaml.load(content);
      if (parsed === undefined || parsed === null) {
        return {};
      }
      if (!isPlainObject(parsed)) {
        throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
      }
      return parsed;
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  static mergeConfigs(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const output: ConfigRecord = { ...target };

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  static envConfig(env: NodeJS.ProcessEnv): ConfigRecord {
    let config: ConfigRecord = {};
    for (const { env: name, section, key } of ENV_OVERRIDES) {
      const value = env[name];
      if (value) {
        config = this.mergeConfigs(config, { [section]: { [key]: value } });
      }
    }
    return config;
  }

  static load(options: ConfigOptions = {}): RepoBlobConfig {
    const cwd = options.cwd || process.cwd();
    const env = options.env || process.env;

    // 1. User config: ~/.repo-blob/config.yaml
    const userConfig = this.loadYaml(path.join(os.homedir(), '.repo-blob', 'config.yaml'));

    // 2. Repo config: <root>/.repo-blob.yaml
    const repoConfig = this.loadYaml(path.join(cwd, REPO_CONFIG_FILENAME));

    // 3. Explicit --config file (if provided)
    let explicitConfig: ConfigRecord = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // Merge in order of precedence: flags > env > explicit > repo > user
    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, repoConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, this.envConfig(env));
    merged = this.mergeConfigs(merged, options.flags ?? {});

    const result = RepoBlobConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`, {
        details: { issues: result.error.issues.map((i) => i.path.join('.')) },
      });
    }

    return result.data;
  }

  /**
   * Reads the token named by a `tokenEnv` setting, if any.
   */
  static resolveToken(tokenEnv: string | undefined, env: NodeJS.ProcessEnv): string | undefined {
    if (!tokenEnv) {
      return undefined;
    }
    const token = env[tokenEnv];
    if (!token) {
      throw new ConfigError(`Environment variable ${tokenEnv} is not set`);
    }
    return token;
  }
}
