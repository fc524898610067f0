const UNKNOWN = 'unknown';

/**
 * Identifiers of the commit being packaged, taken from the CI runner.
 */
export interface CiContext {
  repository: string;
  branch: string;
  commit: string;
  /** File the runner reads step outputs from (`GITHUB_ENV`) */
  envFile?: string;
}

function fromEnv(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  return value && value.length > 0 ? value : UNKNOWN;
}

export function resolveCiContext(env: NodeJS.ProcessEnv = process.env): CiContext {
  return {
    repository: fromEnv(env, 'GITHUB_REPOSITORY'),
    branch: fromEnv(env, 'GITHUB_REF_NAME'),
    commit: fromEnv(env, 'GITHUB_SHA'),
    envFile: env.GITHUB_ENV || undefined,
  };
}
