/**
 * render-dash Runtime Host — Config Loading
 *
 * Reads config.yaml, substitutes `${VAR}` references from the environment,
 * validates it and produces the immutable service store.
 *
 * Every problem is a ConfigError and is fatal: the CLI and dashboard never
 * start against a partially valid configuration.
 */

import { readFileSync } from 'node:fs';
import { YAMLParseError, parse as parseYaml } from 'yaml';
import type { ServiceRecord } from '@render-dash/core';
import { ConfigFileSchema, formatIssues } from './schema.js';
import type { ServiceEntry } from './schema.js';
import { resolveConfigPath } from './paths.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ConfigErrorCode =
  | 'missing-file'
  | 'unreadable-file'
  | 'invalid-yaml'
  | 'invalid-schema'
  | 'unset-env'
  | 'missing-credential'
  | 'empty-store'
  | 'duplicate-id'
  | 'duplicate-alias'
  | 'unknown-service';

export class ConfigError extends Error {
  constructor(
    readonly code: ConfigErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface AppConfig {
  /** Absolute path of the file this config was read from. */
  readonly path: string;
  /** Opaque bearer credential for the remote API. */
  readonly apiKey: string;
  readonly refreshIntervalSeconds: number;
  readonly requestTimeoutMs: number;
  /** Ordered as authored. */
  readonly services: ReadonlyArray<ServiceRecord>;
}

export interface LoadConfigOptions {
  readonly configPath?: string | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
  readonly cwd?: string | undefined;
  /** Accept a file with no services (used by `rdash services add`). */
  readonly allowEmptyServices?: boolean | undefined;
}

/** Env var consulted when render.api_key is absent. */
export const API_KEY_ENV = 'RENDER_API_KEY';

// ---------------------------------------------------------------------------
// Environment Substitution
// ---------------------------------------------------------------------------

const ENV_REF = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Replace every `${NAME}` in `value` with the environment variable NAME.
 *
 * @throws {ConfigError} code 'unset-env' if a referenced variable is unset
 */
export function substituteEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(ENV_REF, (_match, name: string) => {
    const resolved = env[name];
    if (resolved === undefined) {
      throw new ConfigError(
        'unset-env',
        `Environment variable ${name} is not set. Set it with: export ${name}=your-value`,
      );
    }
    return resolved;
  });
}

// ---------------------------------------------------------------------------
// Store Validation
// ---------------------------------------------------------------------------

/**
 * Enforce the store-wide invariants: unique ids, and aliases unique across
 * the whole store when compared case-insensitively.
 *
 * @throws {ConfigError} code 'duplicate-id' or 'duplicate-alias'
 */
export function validateServiceStore(services: ReadonlyArray<ServiceRecord>): void {
  const ids = new Set<string>();
  const aliasOwners = new Map<string, string>();

  for (const service of services) {
    if (ids.has(service.id)) {
      throw new ConfigError('duplicate-id', `Service id ${service.id} is configured more than once`);
    }
    ids.add(service.id);

    for (const alias of service.aliases) {
      const key = alias.toLowerCase();
      const owner = aliasOwners.get(key);
      if (owner === service.id) {
        throw new ConfigError('duplicate-alias', `Alias '${alias}' is listed twice for service ${service.id}`);
      }
      if (owner !== undefined) {
        throw new ConfigError(
          'duplicate-alias',
          `Alias '${alias}' is used by both ${owner} and ${service.id}. Aliases must be unique.`,
        );
      }
      aliasOwners.set(key, service.id);
    }
  }
}

export function toServiceRecord(entry: ServiceEntry): ServiceRecord {
  return Object.freeze({
    id: entry.id,
    name: entry.name ?? entry.id,
    aliases: Object.freeze([...entry.aliases]),
    priority: entry.priority,
  });
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/**
 * Parse and validate config text. Split from loadConfig() so callers that
 * already hold the text (and tests) skip the filesystem.
 *
 * @throws {ConfigError}
 */
export function parseConfig(
  text: string,
  path: string,
  opts: Pick<LoadConfigOptions, 'env' | 'allowEmptyServices'> = {},
): AppConfig {
  const env = opts.env ?? process.env;

  let data: unknown;
  try {
    data = parseYaml(text);
  } catch (err: unknown) {
    if (err instanceof YAMLParseError) {
      throw new ConfigError('invalid-yaml', `Invalid YAML in ${path}: ${err.message}`);
    }
    throw err;
  }

  if (data === null || typeof data !== 'object' || Array.isArray(data)) {
    throw new ConfigError('invalid-schema', `Config file ${path} must contain a YAML mapping`);
  }

  const parsed = ConfigFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError('invalid-schema', `Invalid config in ${path}:\n${formatIssues(parsed.error)}`);
  }
  const { render, services } = parsed.data;

  const rawKey = render.api_key !== undefined ? substituteEnvVars(render.api_key, env) : env[API_KEY_ENV];
  const apiKey = rawKey?.trim() ?? '';
  if (apiKey === '') {
    throw new ConfigError(
      'missing-credential',
      `Missing render.api_key in ${path}. ` +
        `Set it to \${${API_KEY_ENV}} and export ${API_KEY_ENV}=your-key`,
    );
  }

  const records = (services ?? []).map(toServiceRecord);
  if (records.length === 0 && opts.allowEmptyServices !== true) {
    throw new ConfigError(
      'empty-store',
      `No services configured in ${path}. Add one with: rdash services add <name>`,
    );
  }
  validateServiceStore(records);

  return Object.freeze({
    path,
    apiKey,
    refreshIntervalSeconds: render.refresh_interval,
    requestTimeoutMs: Math.round(render.request_timeout * 1000),
    services: Object.freeze(records),
  });
}

/**
 * Locate, read and validate the config file.
 *
 * @throws {ConfigError}
 */
export function loadConfig(opts: LoadConfigOptions = {}): AppConfig {
  const path = resolveConfigPath(opts);

  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) {
      throw new ConfigError(
        'missing-file',
        `No config file found at ${path}. ` +
          `Create one, pass --config <path>, or run: rdash services add <name>`,
      );
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError('unreadable-file', `Cannot read config file ${path}: ${message}`);
  }

  return parseConfig(text, path, opts);
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

export function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
