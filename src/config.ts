/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. `loadConfig`
 * reads the environment into a typed object; the runtime receives that
 * object explicitly instead of importing a module-level singleton.
 *
 * @see .env.example for the variables the runtime reads
 */

import 'dotenv/config';
import { isValidTimezone } from './services/date/time.js';

// ---------------------------------------------------------------------------
// Config helpers: make required vs optional intent explicit
// ---------------------------------------------------------------------------

type Env = Record<string, string | undefined>;

/** Read a required env var. Returns undefined if missing (caught by validateConfig). */
function required(env: Env, key: string): string | undefined {
  return env[key] || undefined;
}

/** Read an optional string env var with a default. */
function optional(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(env: Env, key: string, defaultValue: number): number {
  const raw = env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Read an optional enum env var; unknown values fall back to the default. */
function optionalEnum<T extends string>(
  env: Env,
  key: string,
  allowed: readonly T[],
  defaultValue: T
): T {
  const raw = env[key];
  return allowed.find((value) => value === raw) ?? defaultValue;
}

/** Return a path that differs between dev and production. */
function dbPath(env: Env, envKey: string, prodPath: string, devPath: string): string {
  return env[envKey] || (env.NODE_ENV === 'production' ? prodPath : devPath);
}

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

export const STORE_PROVIDERS = ['sqlite', 'memory'] as const;
export const MEMORY_PROVIDERS = ['mem0', 'sqlite'] as const;

export type StoreProvider = (typeof STORE_PROVIDERS)[number];
export type MemoryProvider = (typeof MEMORY_PROVIDERS)[number];

export interface AppConfig {
  port: number;
  nodeEnv: string;
  /** Public URL of the OAuth server, used in spoken connect links */
  baseUrl: string;
  assistantName: string;
  /** Fallback IANA zone for users who did not declare one */
  defaultTimezone: string;

  google: {
    clientId: string | undefined;
    clientSecret: string | undefined;
    emailRedirectUri: string;
    calendarRedirectUri: string;
  };

  /** Credential storage configuration */
  credentials: {
    provider: StoreProvider;
    sqlitePath: string;
    encryptionKey: string | undefined;
  };

  /** Pending OAuth state storage */
  oauthState: {
    provider: StoreProvider;
    sqlitePath: string;
  };

  /** Long-term memory store */
  memory: {
    provider: MemoryProvider;
    mem0ApiKey: string | undefined;
    mem0BaseUrl: string;
    sqlitePath: string;
    retrievalTimeoutMs: number;
    enrichmentTimeoutMs: number;
  };
}

export function loadConfig(env: Env = process.env): AppConfig {
  const baseUrl = optional(env, 'BASE_URL', 'http://localhost:8000');

  return {
    port: optionalInt(env, 'PORT', 8000),
    nodeEnv: optional(env, 'NODE_ENV', 'development'),
    baseUrl,
    assistantName: optional(env, 'ASSISTANT_NAME', 'Juniper'),
    defaultTimezone: optional(env, 'DEFAULT_TIMEZONE', 'America/Los_Angeles'),

    google: {
      clientId: required(env, 'GOOGLE_CLIENT_ID'),
      clientSecret: required(env, 'GOOGLE_CLIENT_SECRET'),
      emailRedirectUri: optional(env, 'EMAIL_REDIRECT_URI', `${baseUrl}/email/callback`),
      calendarRedirectUri: optional(env, 'CALENDAR_REDIRECT_URI', `${baseUrl}/calendar/callback`),
    },

    credentials: {
      provider: optionalEnum(env, 'CREDENTIAL_STORE_PROVIDER', STORE_PROVIDERS, 'sqlite'),
      sqlitePath: dbPath(env, 'CREDENTIAL_STORE_SQLITE_PATH', '/app/data/credentials.db', './data/credentials.db'),
      encryptionKey: required(env, 'CREDENTIAL_ENCRYPTION_KEY'),
    },

    oauthState: {
      provider: optionalEnum(env, 'OAUTH_STATE_STORE_PROVIDER', STORE_PROVIDERS, 'memory'),
      sqlitePath: dbPath(env, 'OAUTH_STATE_SQLITE_PATH', '/app/data/oauth-state.db', './data/oauth-state.db'),
    },

    memory: {
      provider: optionalEnum(env, 'MEMORY_STORE_PROVIDER', MEMORY_PROVIDERS, 'mem0'),
      mem0ApiKey: required(env, 'MEM0_API_KEY'),
      mem0BaseUrl: optional(env, 'MEM0_BASE_URL', 'https://api.mem0.ai'),
      sqlitePath: dbPath(env, 'MEMORY_SQLITE_PATH', '/app/data/memory.db', './data/memory.db'),
      retrievalTimeoutMs: optionalInt(env, 'MEMORY_RETRIEVAL_TIMEOUT_MS', 3000),
      enrichmentTimeoutMs: optionalInt(env, 'MEMORY_ENRICHMENT_TIMEOUT_MS', 1500),
    },
  };
}

/**
 * Validate critical configuration at startup.
 * Throws if required values are missing or invalid.
 */
export function validateConfig(config: AppConfig): void {
  const errors: string[] = [];

  // Google OAuth (required for email/calendar)
  if (!config.google.clientId) errors.push('GOOGLE_CLIENT_ID is required');
  if (!config.google.clientSecret) errors.push('GOOGLE_CLIENT_SECRET is required');

  // Encryption key validation
  if (config.credentials.provider === 'sqlite') {
    if (!config.credentials.encryptionKey) {
      errors.push('CREDENTIAL_ENCRYPTION_KEY is required');
    } else if (!/^[0-9a-fA-F]{64}$/.test(config.credentials.encryptionKey)) {
      errors.push('CREDENTIAL_ENCRYPTION_KEY must be a 64-character hex string (32 bytes)');
    }
  }

  if (config.memory.provider === 'mem0' && !config.memory.mem0ApiKey) {
    errors.push('MEM0_API_KEY is required when MEMORY_STORE_PROVIDER=mem0');
  }

  // Numeric bounds
  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    errors.push(`PORT must be 1-65535, got ${config.port}`);
  }
  if (!(config.memory.retrievalTimeoutMs >= 100)) {
    errors.push(`MEMORY_RETRIEVAL_TIMEOUT_MS must be >= 100, got ${config.memory.retrievalTimeoutMs}`);
  }
  if (!(config.memory.enrichmentTimeoutMs >= 100)) {
    errors.push(`MEMORY_ENRICHMENT_TIMEOUT_MS must be >= 100, got ${config.memory.enrichmentTimeoutMs}`);
  }

  if (!isValidTimezone(config.defaultTimezone)) {
    errors.push(`DEFAULT_TIMEZONE must be an IANA timezone, got "${config.defaultTimezone}"`);
  }

  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}
