/**
 * `scan` command - print the classified process snapshot
 */

import { createCleanupStack } from '../src/supervisor';
import { summarize } from '../src/process/registry';
import { ProcessRecord } from '../src/types/process';
import { toError } from '../src/errors';
import { createLogger } from '../src/utils/logger';
import { applyCommandConfig, CommonOptions, EXIT_ERROR, EXIT_OK } from './options';
import { CommandDeps } from './cleanup-command';

const log = createLogger('Scan');

export interface ScanCommandOptions extends CommonOptions {
  json?: boolean;
  /** Also list Unrelated processes */
  all?: boolean;
}

export function formatSnapshot(records: readonly ProcessRecord[], all = false): string[] {
  const summary = summarize(records);
  const lines = [
    `${summary.total} process(es): ${summary.protected} protected, ${summary.disposable} disposable, ${summary.unrelated} unrelated`,
  ];
  for (const record of records) {
    if (record.classification === 'Unrelated' && !all) continue;
    lines.push(`  ${record.classification.padEnd(10)} ${String(record.pid).padStart(7)}  ${record.name}`);
  }
  return lines;
}

export async function runScanCommand(options: ScanCommandOptions, deps: Omit<CommandDeps, 'signaller'> = {}): Promise<number> {
  const out = deps.out ?? ((line: string) => console.log(line));
  try {
    const config = applyCommandConfig(options, {}, deps.env);
    const { registry } = createCleanupStack(config, { source: deps.source });
    const records = await registry.scan();
    if (options.json) {
      out(JSON.stringify(records, null, 2));
    } else {
      for (const line of formatSnapshot(records, options.all)) {
        out(line);
      }
    }
    return EXIT_OK;
  } catch (error) {
    log.error(`Scan failed: ${toError(error).message}`);
    return EXIT_ERROR;
  }
}
