/**
 * CLI command: querymix import
 *
 * Reads a query log (a JSON array or newline-delimited JSON of executed
 * queries) and writes a stress config with one entry per distinct query,
 * weighted by how often it ran.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { stringify } from 'yaml';
import {
  parseQueryLog,
  buildConfigFromQueryLog,
  detectConfigFormat,
  type ConfigFormat,
  type StressConfig,
} from '@querymix/core';

interface ImportCommandOptions {
  out: string;
  includeFailed?: boolean;
}

export function serializeConfig(config: StressConfig, format: ConfigFormat): string {
  return format === 'yaml' ? stringify(config) : `${JSON.stringify(config, null, 2)}\n`;
}

export function registerImportCommand(program: Command): void {
  program
    .command('import')
    .description('Convert a query log into a stress config')
    .argument('<queryLog>', 'Path to a query log (JSON array or newline-delimited JSON)')
    .requiredOption('--out <file>', 'Where to write the stress config (.json, .yaml or .yml)')
    .option('--include-failed', 'Keep queries whose outcome is not COMPLETED')
    .action(async (queryLogPath: string, options: ImportCommandOptions) => {
      try {
        let content: string;
        try {
          content = await readFile(resolve(queryLogPath), 'utf-8');
        } catch {
          // eslint-disable-next-line no-console
          console.error(chalk.red('Query log not found:'), queryLogPath);
          process.exit(1);
        }

        const rowsResult = parseQueryLog(content);
        if (rowsResult.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red('Failed to read query log:'), rowsResult.error.message);
          process.exit(1);
        }

        const config = buildConfigFromQueryLog(rowsResult.value, {
          includeFailed: options.includeFailed === true,
        });
        const outPath = resolve(options.out);
        await writeFile(outPath, serializeConfig(config, detectConfigFormat(outPath)), 'utf-8');

        // eslint-disable-next-line no-console
        console.log(
          chalk.green(`Wrote ${config.queries.length} query entries from ${rowsResult.value.length} log rows to`),
          chalk.cyan(outPath),
        );
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('Import failed:'), message);
        process.exit(1);
      }
    });
}
