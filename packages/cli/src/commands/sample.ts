import { Command } from 'commander';
import chalk from 'chalk';
import {
  createQueryGenerator,
  formatDuration,
  mathRandomSource,
  SeededRng,
  type QueryOrder,
  type RandomSource,
  type RenderedBatch,
} from '@querymix/core';
import { describeSource, loadDistribution } from './shared.js';

interface SampleCommandOptions {
  count: string;
  seed?: string;
  order: string;
  json?: boolean;
}

const QUERY_ORDERS: readonly QueryOrder[] = ['random', 'sequential'];

export function isQueryOrder(value: string): value is QueryOrder {
  return QUERY_ORDERS.some((order) => order === value);
}

/**
 * Format a sampled batch for terminal display, numbered from 1.
 */
export function formatBatch(batch: RenderedBatch, index: number): string {
  const lines: string[] = [];
  const rank = chalk.dim(`[${index + 1}]`);
  const entry = chalk.cyan(`entry ${batch.entryIndex}`);
  const source = chalk.magenta(describeSource(batch.source));

  let context = '';
  if (batch.sqlContext.length > 0) {
    context = `  context: ${chalk.dim(batch.sqlContext.join('.'))}`;
  }

  lines.push(`${rank} ${entry} ${source}${context}`);
  for (const query of batch.queries) {
    lines.push(`    ${query}`);
  }
  return lines.join('\n');
}

/** One JSON object per batch, for piping into an executor. */
export function formatBatchJSON(batch: RenderedBatch): string {
  return JSON.stringify({
    entryIndex: batch.entryIndex,
    queries: batch.queries,
    sqlContext: batch.sqlContext,
  });
}

export function formatSummary(batchCount: number, queryCount: number, elapsedMs: number): string {
  return chalk.bold(
    `Sampled ${batchCount} batch(es), ${queryCount} quer${queryCount === 1 ? 'y' : 'ies'} in ${formatDuration(elapsedMs)}`,
  );
}

export function registerSampleCommand(program: Command): void {
  program
    .command('sample')
    .description('Draw query batches from a stress config and print them')
    .argument('<config>', 'Path to a stress config (.json, .yaml or .yml)')
    .option('--count <n>', 'Number of batches to draw', '1')
    .option('--seed <n>', 'Seed for reproducible draws')
    .option('--order <order>', 'Entry order: random or sequential', 'random')
    .option('--json', 'Print one JSON object per batch')
    .action(async (configPath: string, options: SampleCommandOptions) => {
      try {
        const count = parseInt(options.count, 10);
        if (isNaN(count) || count < 1) {
          // eslint-disable-next-line no-console
          console.error(chalk.red('Invalid --count value. Must be a positive integer.'));
          process.exit(1);
        }

        let random: RandomSource = mathRandomSource;
        if (options.seed !== undefined) {
          const seed = parseInt(options.seed, 10);
          if (isNaN(seed)) {
            // eslint-disable-next-line no-console
            console.error(chalk.red('Invalid --seed value. Must be an integer.'));
            process.exit(1);
          }
          random = new SeededRng(seed);
        }

        const order = options.order;
        if (!isQueryOrder(order)) {
          // eslint-disable-next-line no-console
          console.error(chalk.red(`Invalid --order value "${order}". Use random or sequential.`));
          process.exit(1);
        }

        const indexResult = await loadDistribution(configPath);
        if (indexResult.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red('Failed to build query distribution:'), indexResult.error.message);
          process.exit(1);
        }

        const generator = createQueryGenerator(indexResult.value, { order, random });
        const started = performance.now();
        let queryCount = 0;

        for (let i = 0; i < count; i++) {
          const batch = generator.sampleBatch();
          if (batch.isErr()) {
            // eslint-disable-next-line no-console
            console.error(chalk.red('Sampling failed:'), batch.error.message);
            process.exit(1);
          }
          queryCount += batch.value.queries.length;
          // eslint-disable-next-line no-console
          console.log(options.json ? formatBatchJSON(batch.value) : formatBatch(batch.value, i));
        }

        if (!options.json) {
          // eslint-disable-next-line no-console
          console.log('');
          // eslint-disable-next-line no-console
          console.log(formatSummary(count, queryCount, performance.now() - started));
        }
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('Sample failed:'), message);
        process.exit(1);
      }
    });
}
