/**
 * render-dash Runtime Host — Browser Launcher
 *
 * Builds Render dashboard URLs and opens them in the operator's browser
 * with the platform opener (`open`, `xdg-open`, `cmd /c start`).
 */

import { spawn } from 'node:child_process';
import { platform } from 'node:os';

export const DASHBOARD_BASE_URL = 'https://dashboard.render.com/web';

export type DashboardPage = 'logs' | 'events' | 'deploys' | 'settings';

export const DASHBOARD_PAGES: ReadonlyArray<DashboardPage> = ['logs', 'events', 'deploys', 'settings'];

/** Settings is the service's landing page; the others are sub-paths. */
export function dashboardUrl(serviceId: string, page: DashboardPage): string {
  const base = `${DASHBOARD_BASE_URL}/${encodeURIComponent(serviceId)}`;
  return page === 'settings' ? base : `${base}/${page}`;
}

export interface BrowserLauncher {
  /** Resolves once the opener exited successfully; rejects otherwise. */
  open(url: string): Promise<void>;
}

export interface OpenerCommand {
  readonly command: string;
  readonly args: ReadonlyArray<string>;
}

export function openerFor(url: string, os: NodeJS.Platform = platform()): OpenerCommand {
  switch (os) {
    case 'darwin':
      return { command: 'open', args: [url] };
    case 'win32':
      // The empty string is start's window title argument.
      return { command: 'cmd', args: ['/c', 'start', '""', url] };
    default:
      return { command: 'xdg-open', args: [url] };
  }
}

// ---------------------------------------------------------------------------
// SystemBrowserLauncher
// ---------------------------------------------------------------------------

export class SystemBrowserLauncher implements BrowserLauncher {
  constructor(private readonly os: NodeJS.Platform = platform()) {}

  open(url: string): Promise<void> {
    const { command, args } = openerFor(url, this.os);

    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], { stdio: 'ignore' });

      child.on('error', (err) => {
        reject(new Error(`Could not launch ${command}: ${err.message}`, { cause: err }));
      });

      child.on('close', (code) => {
        if (code === 0) {
          resolve();
        } else {
          reject(new Error(`${command} exited with code ${code ?? 'null'}`));
        }
      });
    });
  }
}
