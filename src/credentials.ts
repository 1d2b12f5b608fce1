import { ConfigError } from './errors.js';

export type CredentialRole = 'user' | 'admin';

/**
 * Environment handed to ciao-cli for one role. Frozen once built.
 */
export interface Credentials {
  readonly role: CredentialRole;
  readonly env: Readonly<Record<string, string>>;
}

export type BaseEnvironment = Readonly<Record<string, string | undefined>>;

const ADMIN_OVERRIDES = [
  ['CIAO_USERNAME', 'CIAO_ADMIN_USERNAME'],
  ['CIAO_PASSWORD', 'CIAO_ADMIN_PASSWORD']
] as const;

function copyEnvironment(baseEnv: BaseEnvironment): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(baseEnv)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return env;
}

export function buildUserCredentials(baseEnv: BaseEnvironment): Credentials {
  const credentials: Credentials = { role: 'user', env: Object.freeze(copyEnvironment(baseEnv)) };
  return Object.freeze(credentials);
}

/**
 * Copy of the base environment with the user identity replaced by the admin identity.
 */
export function buildAdminCredentials(baseEnv: BaseEnvironment): Credentials {
  const env = copyEnvironment(baseEnv);

  for (const [userKey, adminKey] of ADMIN_OVERRIDES) {
    const value = env[adminKey];
    if (value === undefined) {
      throw new ConfigError(`env var ${adminKey} not set`);
    }
    env[userKey] = value;
  }

  const credentials: Credentials = { role: 'admin', env: Object.freeze(env) };
  return Object.freeze(credentials);
}
