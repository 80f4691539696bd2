import { Command } from 'commander';
import chalk from 'chalk';
import type { DistributionIndex, QueryMatcher } from '@querymix/core';
import { describeSource, loadDistribution } from './shared.js';

/**
 * Format one matcher as a table row: range, share of the total weight,
 * source and the number of queries it renders.
 */
export function formatMatcher(matcher: QueryMatcher, totalFrequency: number): string {
  const { min, max } = matcher.range;
  const share = (((max - min) / totalFrequency) * 100).toFixed(2);
  const count = matcher.queries.length;

  const range = chalk.cyan(`[${min}, ${max})`.padEnd(12));
  const percent = chalk.green(`${share}%`.padStart(7));
  const source = chalk.magenta(`#${matcher.entryIndex} ${describeSource(matcher.source)}`);
  const queries = chalk.dim(`${count} ${count === 1 ? 'query' : 'queries'}`);

  return `  ${range} ${percent}  ${source}  ${queries}`;
}

export function formatDistribution(index: DistributionIndex): string {
  const lines: string[] = [];
  lines.push(chalk.bold(
    `Distribution: ${index.matchers.length} entries, total frequency ${index.totalFrequency}`,
  ));
  lines.push('');
  for (const matcher of index.matchers) {
    lines.push(formatMatcher(matcher, index.totalFrequency));
  }
  return lines.join('\n');
}

export function registerInspectCommand(program: Command): void {
  program
    .command('inspect')
    .description('Show the weighted ranges built from a stress config')
    .argument('<config>', 'Path to a stress config (.json, .yaml or .yml)')
    .action(async (configPath: string) => {
      try {
        const indexResult = await loadDistribution(configPath);
        if (indexResult.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red('Failed to build query distribution:'), indexResult.error.message);
          process.exit(1);
        }

        // eslint-disable-next-line no-console
        console.log(formatDistribution(indexResult.value));
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('Inspect failed:'), message);
        process.exit(1);
      }
    });
}
