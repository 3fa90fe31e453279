/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 *   rdash <service> <action> [--json]
 *   rdash dashboard
 *   rdash services list | add <term> | remove <alias|id>
 *
 * Global options (--config, --log) are accepted before or after the
 * subcommand. A service token that equals a subcommand name is taken as the
 * subcommand.
 */

import { program } from 'commander';
import { dashboardCommand } from './dashboard.js';
import { servicesCommand } from './services.js';
import { SERVICE_ACTIONS, runServiceAction } from './service-action.js';
import type { ServiceActionOptions } from './service-action.js';

program
  .name('rdash')
  .description(
    'Status of your Render services from the terminal.\n' +
    'Resolve a service by alias or name, print its status, or open its dashboard pages.',
  )
  .version('0.1.0')
  .option('-c, --config <path>', 'Path to config.yaml (default: ./config.yaml, then the OS config dir)')
  .option('--log', 'Append sync events to <state dir>/logs/sync.jsonl (also RDASH_LOG=1)')
  .option('--json', 'With the status action: print JSON')
  .argument('[service]', 'Service alias, partial alias, or partial name')
  .argument('[action]', `One of: ${SERVICE_ACTIONS.join(', ')}`)
  .addHelpText(
    'after',
    '\nExamples:\n' +
    '  rdash chat logs\n' +
    '  rdash auth events\n' +
    '  rdash api status --json\n' +
    '  rdash services add chat',
  )
  .action(async (service: string | undefined, action: string | undefined, options: ServiceActionOptions) => {
    if (service === undefined) {
      program.help({ error: true });
    }
    if (action === undefined) {
      // eslint-disable-next-line no-console
      console.error(`[rdash] Missing action for '${service}'. Usage: rdash <service> <action>`);
      // eslint-disable-next-line no-console
      console.error(`  Valid actions: ${SERVICE_ACTIONS.join(', ')}`);
      process.exit(1);
    }
    await runServiceAction(service, action, options);
  });

program.addCommand(dashboardCommand);
program.addCommand(servicesCommand);

export { program };
