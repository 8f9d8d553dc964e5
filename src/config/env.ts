/**
 * Environment Variable Validation
 *
 * Credentials are read from the environment (and `.env`) exactly once and
 * returned as an immutable struct that is passed to the components needing it.
 */

// Load dotenv early so credentials are available to the first resolveCredentials() call
import * as dotenv from 'dotenv';
dotenv.config();

import { ConfigError } from '../types/errors.js';
import type { SentinelHubOverrides } from './pipelineConfig.js';

export type AsfCredentials =
  | { readonly kind: 'token'; readonly token: string }
  | { readonly kind: 'password'; readonly username: string; readonly password: string };

export interface Credentials {
  /** Earthdata Login credentials for ASF downloads, null when neither form is set */
  readonly asf: AsfCredentials | null;
  readonly sentinelHub: Readonly<SentinelHubOverrides>;
}

type EnvSource = Record<string, string | undefined>;

function readTrimmed(env: EnvSource, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Resolve credentials from the environment. A bearer token wins over a username/password pair.
 */
export function resolveCredentials(env: EnvSource = process.env): Credentials {
  const token = readTrimmed(env, 'EDL_TOKEN');
  const username = readTrimmed(env, 'ASF_USERNAME');
  const password = readTrimmed(env, 'ASF_PASSWORD');

  let asf: AsfCredentials | null = null;
  if (token) {
    asf = { kind: 'token', token };
  } else if (username && password) {
    asf = { kind: 'password', username, password };
  }

  return Object.freeze({
    asf: asf ? Object.freeze(asf) : null,
    sentinelHub: Object.freeze({
      clientId: readTrimmed(env, 'SH_CLIENT_ID'),
      clientSecret: readTrimmed(env, 'SH_CLIENT_SECRET'),
      instanceId: readTrimmed(env, 'SH_INSTANCE_ID'),
    }),
  });
}

/**
 * Require ASF credentials before any network activity
 * @throws {ConfigError} If neither EDL_TOKEN nor ASF_USERNAME/ASF_PASSWORD is set
 */
export function requireAsfCredentials(credentials: Credentials): AsfCredentials {
  if (!credentials.asf) {
    throw new ConfigError('Either EDL_TOKEN or ASF_USERNAME/ASF_PASSWORD required', [
      'Add EDL_TOKEN=<earthdata token> to .env',
      'or ASF_USERNAME=<earthdata username> and ASF_PASSWORD=<earthdata password>',
      'Register at https://urs.earthdata.nasa.gov/',
    ]);
  }
  return credentials.asf;
}

export interface CredentialPresence {
  key: string;
  present: boolean;
  preview?: string;
}

const SECRET_KEY_PATTERN = /TOKEN|SECRET|PASSWORD/;

/**
 * Report which credential variables are set, with secret values masked
 */
export function describeCredentialEnv(env: EnvSource = process.env): CredentialPresence[] {
  const keys = ['EDL_TOKEN', 'ASF_USERNAME', 'ASF_PASSWORD', 'SH_CLIENT_ID', 'SH_CLIENT_SECRET', 'SH_INSTANCE_ID'];
  return keys.map((key) => {
    const value = readTrimmed(env, key);
    if (!value) {
      return { key, present: false };
    }
    const preview = SECRET_KEY_PATTERN.test(key) ? maskSecret(value) : value;
    return { key, present: true, preview };
  });
}

export function maskSecret(value: string): string {
  return value.length > 10 ? `${value.slice(0, 10)}...` : '***';
}

/**
 * True when the token has the three dot-separated segments of a JWT
 */
export function looksLikeJwt(token: string): boolean {
  return token.split('.').length === 3;
}
