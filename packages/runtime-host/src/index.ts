/**
 * @render-dash/runtime-host
 *
 * Side-effectful implementations of the contracts declared in
 * @render-dash/core: the Render HTTP client, config loading and editing,
 * the JSONL sync log and the browser launcher.
 *
 * The core defines interfaces; this package provides implementations.
 * No core code imports from this package.
 */

// Config paths (--config → RDASH_CONFIG → ./config.yaml → OS config dir)
export type { PathEnvironment, ResolveConfigPathOptions } from './config/paths.js';
export {
  APP_DIR_NAME,
  CONFIG_FILE_NAME,
  getOsConfigPath,
  getStateDir,
  resolveConfigPath,
} from './config/paths.js';

// Config schema, loading and editing
export type { ConfigFile, ServiceEntry } from './config/schema.js';
export {
  ConfigFileSchema,
  DEFAULT_REFRESH_INTERVAL_SECONDS,
  DEFAULT_REQUEST_TIMEOUT_SECONDS,
  MIN_REFRESH_INTERVAL_SECONDS,
  ServiceEntrySchema,
} from './config/schema.js';
export type { AppConfig, ConfigErrorCode, LoadConfigOptions } from './config/load.js';
export {
  API_KEY_ENV,
  ConfigError,
  loadConfig,
  parseConfig,
  substituteEnvVars,
  validateServiceStore,
} from './config/load.js';
export type { NewService } from './config/edit.js';
export { addServiceToConfig, findEntryIndex, removeServiceFromConfig } from './config/edit.js';

// Render API client
export type { RetryOptions, Sleep } from './http/retry.js';
export { DEFAULT_RETRY_DELAY_MS, withRetry } from './http/retry.js';
export type { RenderClientOptions } from './render/render-client.js';
export {
  DEFAULT_REQUEST_TIMEOUT_MS,
  RENDER_API_BASE_URL,
  RenderClient,
  classifyStatus,
} from './render/render-client.js';
export { mapDeployState, mapServiceState } from './render/schema.js';

// Sync log (JSONL under <state dir>/logs/)
export type { LogIO } from './logging/log-io.js';
export { FileLogIO, MemoryLogIO } from './logging/log-io.js';
export { FileSyncLogSink, SYNC_LOG_FILE } from './logging/file-sync-log-sink.js';
export { ulid } from './logging/ulid.js';

// Browser
export type { BrowserLauncher, DashboardPage, OpenerCommand } from './browser/launcher.js';
export {
  DASHBOARD_BASE_URL,
  DASHBOARD_PAGES,
  SystemBrowserLauncher,
  dashboardUrl,
  openerFor,
} from './browser/launcher.js';
