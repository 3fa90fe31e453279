/**
 * render-dash Runtime Host — Config and State Path Resolution
 *
 * The config file is located using the following precedence (first hit
 * wins):
 *
 *   1. Explicit `configPath` option (from the --config CLI flag)
 *   2. RDASH_CONFIG environment variable
 *   3. `config.yaml` in the current working directory, if it exists
 *   4. The OS config file (see getOsConfigPath())
 *
 * Steps 1 and 2 are returned even when the file does not exist, so the
 * loader can report the path the operator asked for. Step 4 is the
 * fallback and also the file `rdash services add` creates.
 *
 * Runtime state (the sync log) lives under getStateDir().
 */

import { existsSync } from 'node:fs';
import { homedir, platform } from 'node:os';
import { join, resolve } from 'node:path';

export const APP_DIR_NAME = 'render-dashboard';
export const CONFIG_FILE_NAME = 'config.yaml';

export interface PathEnvironment {
  readonly env?: NodeJS.ProcessEnv | undefined;
  readonly cwd?: string | undefined;
  readonly home?: string | undefined;
  readonly platform?: NodeJS.Platform | undefined;
}

// ---------------------------------------------------------------------------
// OS Config File Location
// ---------------------------------------------------------------------------

/**
 * Platform-specific location of the config file.
 *
 *   macOS:   ~/Library/Preferences/render-dashboard/config.yaml
 *   Windows: %APPDATA%\render-dashboard\config.yaml
 *   Linux:   $XDG_CONFIG_HOME/render-dashboard/config.yaml (default ~/.config)
 */
export function getOsConfigPath(pathEnv: PathEnvironment = {}): string {
  const env = pathEnv.env ?? process.env;
  const home = pathEnv.home ?? homedir();
  switch (pathEnv.platform ?? platform()) {
    case 'darwin':
      return join(home, 'Library', 'Preferences', APP_DIR_NAME, CONFIG_FILE_NAME);
    case 'win32': {
      const appData = env['APPDATA'] ?? join(home, 'AppData', 'Roaming');
      return join(appData, APP_DIR_NAME, CONFIG_FILE_NAME);
    }
    default: {
      const xdg = env['XDG_CONFIG_HOME'];
      const base = xdg !== undefined && xdg !== '' ? xdg : join(home, '.config');
      return join(base, APP_DIR_NAME, CONFIG_FILE_NAME);
    }
  }
}

// ---------------------------------------------------------------------------
// Config Resolution
// ---------------------------------------------------------------------------

export interface ResolveConfigPathOptions extends PathEnvironment {
  /** Explicit override, highest precedence. */
  readonly configPath?: string | undefined;
}

export function resolveConfigPath(opts: ResolveConfigPathOptions = {}): string {
  const env = opts.env ?? process.env;
  const cwd = opts.cwd ?? process.cwd();

  if (typeof opts.configPath === 'string' && opts.configPath !== '') {
    return resolve(cwd, opts.configPath);
  }

  const fromEnv = env['RDASH_CONFIG'];
  if (typeof fromEnv === 'string' && fromEnv !== '') {
    return resolve(cwd, fromEnv);
  }

  const local = join(cwd, CONFIG_FILE_NAME);
  if (existsSync(local)) return local;

  return getOsConfigPath(opts);
}

// ---------------------------------------------------------------------------
// State Directory
// ---------------------------------------------------------------------------

/**
 * Directory for runtime state such as `logs/sync.jsonl`.
 *
 * RDASH_STATE_DIR overrides; otherwise $XDG_STATE_HOME/render-dashboard
 * (default ~/.local/state/render-dashboard). macOS and Windows use the
 * directory that holds the config file.
 */
export function getStateDir(pathEnv: PathEnvironment = {}): string {
  const env = pathEnv.env ?? process.env;
  const override = env['RDASH_STATE_DIR'];
  if (typeof override === 'string' && override !== '') return override;

  const os = pathEnv.platform ?? platform();
  if (os === 'darwin' || os === 'win32') {
    return join(getOsConfigPath(pathEnv), '..');
  }

  const home = pathEnv.home ?? homedir();
  const xdg = env['XDG_STATE_HOME'];
  const base = xdg !== undefined && xdg !== '' ? xdg : join(home, '.local', 'state');
  return join(base, APP_DIR_NAME);
}
