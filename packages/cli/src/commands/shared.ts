import { resolve } from 'node:path';
import { Result, err } from 'neverthrow';
import {
  loadStressConfig,
  buildDistribution,
  type ConfigError,
  type DistributionError,
  type DistributionIndex,
  type QuerySource,
} from '@querymix/core';

/**
 * Load a stress config from disk and build its distribution in one step.
 */
export async function loadDistribution(
  configPath: string,
): Promise<Result<DistributionIndex, ConfigError | DistributionError>> {
  const configResult = await loadStressConfig(resolve(configPath));
  if (configResult.isErr()) {
    return err(configResult.error);
  }
  return buildDistribution(configResult.value);
}

export function describeSource(source: QuerySource): string {
  return source.kind === 'group' ? `group "${source.name}"` : 'query';
}
