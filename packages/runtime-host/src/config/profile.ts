/**
 * synthctl Runtime Host — API Profiles
 *
 * A profile holds the credentials and endpoints for one account, stored
 * as `<home>/profiles/<name>.json`:
 *
 *   { "email": "...", "token": "...", "api_url": "...", "inventory_url": "..." }
 *
 * SYNTHCTL_AUTH_EMAIL and SYNTHCTL_AUTH_TOKEN override the stored
 * credentials, and are enough on their own when no profile file exists.
 */

import { ConfigurationError } from '@synthctl/match-dsl';
import { z } from 'zod';
import type { StateIO } from '../state/state-io.js';
import { toConfigurationError } from './issues.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_PROFILE = 'default';
export const DEFAULT_API_URL = 'https://synthetics.api.kentik.com';
export const DEFAULT_INVENTORY_URL = 'https://api.kentik.com/api/v5';

export const EMAIL_ENV = 'SYNTHCTL_AUTH_EMAIL';
export const TOKEN_ENV = 'SYNTHCTL_AUTH_TOKEN';

const PROFILE_NAME = /^[A-Za-z0-9_.-]+$/;

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const ProfileSchema = z
  .object({
    email: z.string().min(1),
    token: z.string().min(1),
    api_url: z.string().url().optional(),
    inventory_url: z.string().url().optional(),
  })
  .strict();

/** A profile as stored on disk. */
export type Profile = z.infer<typeof ProfileSchema>;

/** A profile with environment overrides and default endpoints applied. */
export interface ResolvedProfile {
  readonly name: string;
  readonly email: string;
  readonly token: string;
  readonly apiUrl: string;
  readonly inventoryUrl: string;
}

// ---------------------------------------------------------------------------
// Read / write
// ---------------------------------------------------------------------------

function profilePath(name: string): string {
  if (!PROFILE_NAME.test(name)) {
    throw new ConfigurationError(
      `invalid profile name "${name}" (letters, digits, ".", "_" and "-" only)`,
      'profile',
    );
  }
  return `profiles/${name}.json`;
}

/** The stored profile, validated, or undefined when none is stored. */
export function readProfile(io: StateIO, name: string = DEFAULT_PROFILE): Profile | undefined {
  const path = profilePath(name);
  const raw = io.readJson(path);
  if (raw === undefined) {
    return undefined;
  }
  const result = ProfileSchema.safeParse(raw);
  if (!result.success) {
    throw toConfigurationError(result.error, path);
  }
  return result.data;
}

export function writeProfile(io: StateIO, name: string, profile: Profile): void {
  const result = ProfileSchema.safeParse(profile);
  if (!result.success) {
    throw toConfigurationError(result.error, 'profile');
  }
  io.writeJson(profilePath(name), result.data);
}

/**
 * Load the named profile and apply environment overrides.
 *
 * @throws ConfigurationError when no email or token is available from
 *   either the profile file or the environment
 */
export function loadProfile(
  io: StateIO,
  name: string = DEFAULT_PROFILE,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedProfile {
  const stored = readProfile(io, name);
  const email = nonEmpty(env[EMAIL_ENV]) ?? stored?.email;
  const token = nonEmpty(env[TOKEN_ENV]) ?? stored?.token;

  if (email === undefined || token === undefined) {
    const missing = email === undefined ? `email (${EMAIL_ENV})` : `token (${TOKEN_ENV})`;
    const hint = stored === undefined ? `no profile "${name}" is stored and ` : '';
    throw new ConfigurationError(`${hint}no API ${missing} is set`, 'profile');
  }

  return {
    name,
    email,
    token,
    apiUrl: stored?.api_url ?? DEFAULT_API_URL,
    inventoryUrl: stored?.inventory_url ?? DEFAULT_INVENTORY_URL,
  };
}

/** The token with all but its last four characters hidden. */
export function maskToken(token: string): string {
  if (token.length <= 4) {
    return '*'.repeat(token.length);
  }
  return '*'.repeat(token.length - 4) + token.slice(-4);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}
