/**
 * render-dash Runtime Host — Config Editing
 *
 * Adds and removes service records in config.yaml for `rdash services`.
 * Edits go through the yaml Document API so operator comments and key
 * order survive the rewrite. Only the `services` sequence is touched.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { Document, isSeq, parseDocument } from 'yaml';
import { z } from 'zod';
import type { ServiceRecord } from '@render-dash/core';
import { DEFAULT_PRIORITY } from '@render-dash/core';
import { ConfigError, API_KEY_ENV, toServiceRecord, validateServiceStore } from './load.js';
import { ConfigFileSchema, DEFAULT_REFRESH_INTERVAL_SECONDS, ServiceEntrySchema, formatIssues } from './schema.js';
import type { ServiceEntry } from './schema.js';

export interface NewService {
  readonly id: string;
  readonly name?: string | undefined;
  readonly aliases: ReadonlyArray<string>;
  readonly priority?: number | undefined;
}

const EditableSchema = z.object({ services: ConfigFileSchema.shape.services });

// ---------------------------------------------------------------------------
// Add
// ---------------------------------------------------------------------------

/**
 * Append a service to the config at `path`, creating the file when it does
 * not exist yet.
 *
 * @returns the record as it will be loaded
 * @throws {ConfigError} on invalid input, an unreadable file, or a
 *   duplicate id or alias
 */
export function addServiceToConfig(path: string, service: NewService): ServiceRecord {
  const doc = existsSync(path) ? readDocument(path) : newConfigDocument();

  const parsed = ServiceEntrySchema.safeParse({
    id: service.id,
    ...(service.name !== undefined ? { name: service.name } : {}),
    aliases: [...service.aliases],
    priority: service.priority ?? DEFAULT_PRIORITY,
  });
  if (!parsed.success) {
    throw new ConfigError('invalid-schema', `Invalid service entry:\n${formatIssues(parsed.error)}`);
  }
  const entry = parsed.data;

  const existing = readEntries(doc, path);
  validateServiceStore([...existing, entry].map(toServiceRecord));

  const node = doc.createNode(serializeEntry(entry));
  const services = doc.get('services', true);
  if (isSeq(services)) {
    services.add(node);
  } else {
    doc.set('services', doc.createNode([serializeEntry(entry)]));
  }

  writeDocument(path, doc);
  return toServiceRecord(entry);
}

// ---------------------------------------------------------------------------
// Remove
// ---------------------------------------------------------------------------

/**
 * Remove the service whose id or one of whose aliases equals `term`
 * (case-insensitive).
 *
 * @returns the removed record
 * @throws {ConfigError} code 'unknown-service' when nothing matches
 */
export function removeServiceFromConfig(path: string, term: string): ServiceRecord {
  const doc = readDocument(path);
  const entries = readEntries(doc, path);
  const index = findEntryIndex(entries, term);
  const entry = index === -1 ? undefined : entries[index];
  if (entry === undefined) {
    throw new ConfigError('unknown-service', `No configured service has the id or alias '${term}'`);
  }

  doc.deleteIn(['services', index]);
  writeDocument(path, doc);
  return toServiceRecord(entry);
}

/** Index of the entry matching `term` by exact id or alias, else -1. */
export function findEntryIndex(
  entries: ReadonlyArray<{ readonly id: string; readonly aliases: ReadonlyArray<string> }>,
  term: string,
): number {
  const needle = term.trim().toLowerCase();
  if (needle === '') return -1;
  return entries.findIndex(
    (entry) =>
      entry.id.toLowerCase() === needle || entry.aliases.some((alias) => alias.toLowerCase() === needle),
  );
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function newConfigDocument(): Document {
  const doc = new Document({
    render: {
      api_key: `\${${API_KEY_ENV}}`,
      refresh_interval: DEFAULT_REFRESH_INTERVAL_SECONDS,
    },
    services: [],
  });
  doc.commentBefore = ' render-dash configuration';
  return doc;
}

function readDocument(path: string): Document {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError('unreadable-file', `Cannot read config file ${path}: ${message}`);
  }

  const doc = parseDocument(text);
  const [first] = doc.errors;
  if (first !== undefined) {
    throw new ConfigError('invalid-yaml', `Invalid YAML in ${path}: ${first.message}`);
  }
  return doc;
}

function readEntries(doc: Document, path: string): ServiceEntry[] {
  const data: unknown = doc.toJS() ?? {};
  const parsed = EditableSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError('invalid-schema', `Invalid config in ${path}:\n${formatIssues(parsed.error)}`);
  }
  return parsed.data.services ?? [];
}

function serializeEntry(entry: ServiceEntry): Record<string, unknown> {
  return {
    id: entry.id,
    ...(entry.name !== undefined ? { name: entry.name } : {}),
    aliases: [...entry.aliases],
    priority: entry.priority,
  };
}

function writeDocument(path: string, doc: Document): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, doc.toString(), 'utf-8');
}
