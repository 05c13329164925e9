#!/usr/bin/env node
/**
 * CLI for browser-supervisor
 *
 * Commands:
 * - cleanup: Terminate disposable browser workers, preserving the automation server
 * - scan: Print the classified process snapshot
 */

import { Command } from 'commander';
import * as path from 'path';
import * as fs from 'fs';
import { runCleanupCommand, CleanupCommandOptions } from './cleanup-command';
import { runScanCommand, ScanCommandOptions } from './scan-command';
import { EXIT_ERROR } from './options';

const program = new Command();

// Package info - from dist/cli/ go up two levels to root
const packageJsonPath = path.join(__dirname, '..', '..', 'package.json');
let version = '0.1.0';
try {
  const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string') {
    version = packageJson.version;
  }
} catch {
  // Running from sources: keep the fallback version
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Abort on the first SIGINT/SIGTERM; the command decides what that means.
 * A second signal falls through to Node's default handler and exits at once.
 */
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  const onSignal = () => controller.abort();
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  return controller.signal;
}

program
  .name('browser-supervisor')
  .description('Session and process supervision for automated browser fleets')
  .version(version);

program
  .command('cleanup')
  .description('Terminate disposable browser workers; never touch the automation server')
  .option('-v, --verbose', 'Log every target and scan at debug level')
  .option('--dry-run', 'Report what would be terminated without signalling anything')
  .option('--verify-only', 'Only check that no disposable workers remain and the server survived')
  .option('--worker-marker <marker>', 'Command-line token identifying browser workers (repeatable)', collect)
  .option('--supervisor-marker <marker>', 'Command-line token identifying the automation server (repeatable)', collect)
  .option('--grace-period <ms>', 'Wait between SIGTERM and SIGKILL')
  .option('--include-descendants', 'Also terminate unrelated children of browser workers')
  .option('-c, --config <path>', 'JSON config file (default: $BROWSER_SUPERVISOR_CONFIG)')
  .action(async (options: CleanupCommandOptions) => {
    // Resolves after any in-flight cleanup has settled, interrupted or not
    process.exitCode = await runCleanupCommand(options, { signal: interruptSignal() });
    process.exit();
  });

program
  .command('scan')
  .description('Print the classified process snapshot')
  .option('--json', 'Output as JSON')
  .option('-a, --all', 'Include unrelated processes')
  .option('--worker-marker <marker>', 'Command-line token identifying browser workers (repeatable)', collect)
  .option('--supervisor-marker <marker>', 'Command-line token identifying the automation server (repeatable)', collect)
  .option('-c, --config <path>', 'JSON config file (default: $BROWSER_SUPERVISOR_CONFIG)')
  .action(async (options: ScanCommandOptions) => {
    process.exitCode = await runScanCommand(options);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(EXIT_ERROR);
});
