// Environment lookups for the configuration layer and the test setup.
// Nothing under src/shared/engine imports this module: search and rules
// stay independent of the host.

type EnvMap = Record<string, string | undefined>;

function hostEnv(): EnvMap | undefined {
  if (typeof process !== 'undefined' && typeof process.env === 'object') {
    return process.env;
  }
  return undefined;
}

/** Raw value of an environment variable, or undefined outside Node. */
export function readEnv(name: string): string | undefined {
  const value = hostEnv()?.[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * NODE_ENV is 'test'. Config loading skips the .env file in that case
 * so a developer's local settings cannot leak into test runs.
 */
export function isTestEnvironment(): boolean {
  return readEnv('NODE_ENV') === 'test';
}

/**
 * Running inside a Jest worker. The effective node environment is forced
 * to 'test' then, whatever NODE_ENV says.
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}

/**
 * Interpret a boolean switch such as SEARCH_TRACE: "1", "true" and
 * "TRUE" turn it on; any other value, or none, leaves it off.
 */
export function parseFlag(raw: string | undefined): boolean {
  if (!raw) return false;
  return raw === '1' || raw === 'true' || raw === 'TRUE';
}
