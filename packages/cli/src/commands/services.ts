/**
 * rdash services — Manage the configured service list
 *
 * Subcommands:
 *   rdash services list
 *   rdash services add <name|srv-id>
 *   rdash services remove <alias|id>
 *
 * `add` looks the service up on Render (directly for `srv-` ids, otherwise
 * by name or id substring over every visible service), asks for aliases and
 * appends the record to config.yaml, creating the file if needed. `remove`
 * requires typing `yes`.
 */

import { Command } from 'commander';
import * as readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { DEFAULT_PRIORITY } from '@render-dash/core';
import type { ServiceDetail } from '@render-dash/core';
import {
  API_KEY_ENV,
  ConfigError,
  RenderClient,
  addServiceToConfig,
  findEntryIndex,
  loadConfig,
  removeServiceFromConfig,
  resolveConfigPath,
} from '@render-dash/runtime-host';
import { defaultAlias, formatRemoteChoices, formatServiceList } from '../tui/output/services.js';
import { t } from '../tui/theme.js';
import { fail } from './runtime.js';
import type { GlobalOptions } from './runtime.js';

/** How many remote services to list when a search finds nothing. */
const SUGGESTION_LIMIT = 10;

// ---------------------------------------------------------------------------
// Prompt parsing
// ---------------------------------------------------------------------------

export type Selection = { kind: 'pick'; index: number } | { kind: 'cancel' } | { kind: 'invalid' };

/** Parse a 1-based menu choice; `0` cancels. */
export function parseSelection(answer: string, count: number): Selection {
  const trimmed = answer.trim();
  if (!/^\d+$/.test(trimmed)) return { kind: 'invalid' };
  const n = Number(trimmed);
  if (n === 0) return { kind: 'cancel' };
  if (n > count) return { kind: 'invalid' };
  return { kind: 'pick', index: n - 1 };
}

/**
 * Primary alias (falls back to the suggested default) followed by any
 * comma-separated extras, de-duplicated case-insensitively.
 */
export function parseAliases(primary: string, extra: string, fallback: string): string[] {
  const aliases: string[] = [];
  const seen = new Set<string>();
  const first = primary.trim() === '' ? fallback : primary.trim();
  for (const alias of [first, ...extra.split(',')]) {
    const value = alias.trim();
    if (value === '' || seen.has(value.toLowerCase())) continue;
    seen.add(value.toLowerCase());
    aliases.push(value);
  }
  return aliases;
}

/** Remote services whose name or id contains `term` (case-insensitive). */
export function searchRemote(services: ReadonlyArray<ServiceDetail>, term: string): ServiceDetail[] {
  const needle = term.toLowerCase();
  return services.filter(
    (service) => service.name.toLowerCase().includes(needle) || service.id.toLowerCase().includes(needle),
  );
}

// ---------------------------------------------------------------------------
// rdash services list
// ---------------------------------------------------------------------------

const listCommand = new Command('list')
  .description('List configured services in priority order')
  .action((_options: unknown, command: Command) => {
    const globals = command.optsWithGlobals<GlobalOptions>();
    try {
      const config = loadConfig({ configPath: globals.config });
      process.stdout.write(formatServiceList(config.services));
    } catch (err) {
      fail('services list', err);
    }
  });

// ---------------------------------------------------------------------------
// rdash services add <term>
// ---------------------------------------------------------------------------

interface AddContext {
  path: string;
  apiKey: string;
  timeoutMs?: number;
}

/** Config path and credential for `add`; works before any config file exists. */
function resolveAddContext(globals: GlobalOptions): AddContext {
  try {
    const config = loadConfig({ configPath: globals.config, allowEmptyServices: true });
    return { path: config.path, apiKey: config.apiKey, timeoutMs: config.requestTimeoutMs };
  } catch (err) {
    const apiKey = process.env[API_KEY_ENV];
    if (err instanceof ConfigError && err.code === 'missing-file' && apiKey !== undefined && apiKey !== '') {
      return { path: resolveConfigPath({ configPath: globals.config }), apiKey };
    }
    throw err;
  }
}

async function findCandidates(client: RenderClient, term: string): Promise<ServiceDetail[]> {
  if (term.startsWith('srv-')) {
    // eslint-disable-next-line no-console
    console.log(t.muted(`Looking up service id ${term}...`));
    return [await client.fetchServiceDetail(term)];
  }

  // eslint-disable-next-line no-console
  console.log(t.muted(`Searching for services matching '${term}'...`));
  const all = await client.listServices();
  const matches = searchRemote(all, term);
  if (matches.length === 0) {
    // eslint-disable-next-line no-console
    console.error(`[rdash services add] No services found matching '${term}'`);
    if (all.length > 0) {
      // eslint-disable-next-line no-console
      console.error('\nAvailable services:');
      process.stderr.write(formatRemoteChoices(all.slice(0, SUGGESTION_LIMIT)));
      if (all.length > SUGGESTION_LIMIT) {
        // eslint-disable-next-line no-console
        console.error(`  ... and ${all.length - SUGGESTION_LIMIT} more`);
      }
    }
    // eslint-disable-next-line no-console
    console.error('\nOr add by service id directly: rdash services add srv-xxxxxxxx');
  }
  return matches;
}

async function chooseService(rl: readline.Interface, matches: ServiceDetail[]): Promise<ServiceDetail | null> {
  const [only] = matches;
  if (matches.length === 1 && only !== undefined) {
    // eslint-disable-next-line no-console
    console.log(`Found: ${t.white(only.name)} ${t.dim(`(${only.id})`)}`);
    return only;
  }

  // eslint-disable-next-line no-console
  console.log(`Found ${matches.length} matching services:`);
  process.stdout.write(formatRemoteChoices(matches));
  for (;;) {
    const answer = await rl.question(`\nSelect service (1-${matches.length}, or 0 to cancel): `);
    const selection = parseSelection(answer, matches.length);
    if (selection.kind === 'cancel') return null;
    if (selection.kind === 'pick') {
      const picked = matches[selection.index];
      if (picked !== undefined) return picked;
    }
    // eslint-disable-next-line no-console
    console.log(`Please enter a number between 0 and ${matches.length}`);
  }
}

/** Interactive pick plus alias prompts; null when the operator cancels. */
async function promptForService(
  matches: ServiceDetail[],
): Promise<{ service: ServiceDetail; aliases: string[] } | null> {
  const rl = readline.createInterface({ input, output });
  try {
    const service = await chooseService(rl, matches);
    if (service === null) return null;
    const suggested = defaultAlias(service.name);
    const primary = await rl.question(`\nAlias for this service [${suggested}]: `);
    const extra = await rl.question('Additional aliases (comma-separated, Enter to skip): ');
    return { service, aliases: parseAliases(primary, extra, suggested) };
  } finally {
    rl.close();
  }
}

const addCommand = new Command('add')
  .description('Find a Render service by name or srv- id and add it to the config')
  .argument('<term>', 'Service name, partial name, or srv- id')
  .action(async (term: string, _options: unknown, command: Command) => {
    const globals = command.optsWithGlobals<GlobalOptions>();

    let context: AddContext;
    let matches: ServiceDetail[];
    try {
      context = resolveAddContext(globals);
      const client = new RenderClient({ apiKey: context.apiKey, timeoutMs: context.timeoutMs });
      matches = await findCandidates(client, term);
    } catch (err) {
      fail('services add', err);
    }
    if (matches.length === 0) process.exit(1);

    const picked = await promptForService(matches);
    if (picked === null) {
      // eslint-disable-next-line no-console
      console.log('Cancelled.');
      return;
    }
    const { service, aliases } = picked;

    try {
      addServiceToConfig(context.path, {
        id: service.id,
        name: service.name,
        aliases,
        priority: DEFAULT_PRIORITY,
      });
    } catch (err) {
      fail('services add', err);
    }

    // eslint-disable-next-line no-console
    console.log(`\n${t.green('✓')} Added ${service.name} to ${context.path}`);
    // eslint-disable-next-line no-console
    console.log('\nYou can now use:');
    for (const alias of aliases) {
      // eslint-disable-next-line no-console
      console.log(`  rdash ${alias} status`);
    }
  });

// ---------------------------------------------------------------------------
// rdash services remove <alias|id>
// ---------------------------------------------------------------------------

const removeCommand = new Command('remove')
  .description('Remove a service from the config (asks for confirmation)')
  .argument('<alias-or-id>', 'Alias or service id to remove')
  .action(async (term: string, _options: unknown, command: Command) => {
    const globals = command.optsWithGlobals<GlobalOptions>();

    let path: string;
    let name: string;
    let id: string;
    try {
      const config = loadConfig({ configPath: globals.config, allowEmptyServices: true });
      const record = config.services[findEntryIndex(config.services, term)];
      if (record === undefined) {
        throw new ConfigError('unknown-service', `Service '${term}' not found in ${config.path}`);
      }
      path = config.path;
      name = record.name;
      id = record.id;
    } catch (err) {
      fail('services remove', err);
    }

    // eslint-disable-next-line no-console
    console.log(`Remove service: ${t.white(name)} ${t.dim(`(${id})`)}?`);
    const rl = readline.createInterface({ input, output });
    let answer = '';
    try {
      answer = await rl.question("Type 'yes' to confirm: ");
    } finally {
      rl.close();
    }

    if (answer.trim().toLowerCase() !== 'yes') {
      // eslint-disable-next-line no-console
      console.log('Cancelled.');
      return;
    }

    try {
      removeServiceFromConfig(path, id);
    } catch (err) {
      fail('services remove', err);
    }
    // eslint-disable-next-line no-console
    console.log(`${t.green('✓')} Removed ${name} from ${path}`);
  });

// ---------------------------------------------------------------------------
// rdash services
// ---------------------------------------------------------------------------

export const servicesCommand = new Command('services')
  .description('Manage configured services')
  .addCommand(listCommand)
  .addCommand(addCommand)
  .addCommand(removeCommand);
