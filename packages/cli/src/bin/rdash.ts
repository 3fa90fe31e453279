#!/usr/bin/env node
/**
 * bin/rdash.ts — TTY-aware entry point for the `rdash` command.
 *
 * Bare `rdash` in an interactive terminal opens the live dashboard.
 * Anything else goes to Commander.
 *
 * rdash (in TTY)        → dashboard
 * rdash chat logs       → open the logs page for the service aliased "chat"
 * rdash | cat           → help
 */

const isTTY       = process.stdout.isTTY === true && process.stdin.isTTY === true
const bareCommand = process.argv.length <= 2

try {
  if (isTTY && bareCommand) {
    const { launchDashboard } = await import('../commands/dashboard.js')
    await launchDashboard({})
  } else {
    const { program } = await import('../commands/index.js')
    await program.parseAsync()
  }
} catch (err) {
  const { fail } = await import('../commands/runtime.js')
  fail('', err)
}
