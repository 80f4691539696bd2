/**
 * Converts a query log (`queries.json`) into a stress configuration.
 *
 * The log is either a JSON array of rows or newline-delimited JSON, one row
 * per executed query. Identical query text run under the same context
 * collapses into a single entry whose frequency is the number of runs.
 */

import { Result, ok, err } from 'neverthrow';
import { z } from 'zod';
import type { QueryEntryConfig, StressConfig } from '../types/config.js';
import { ConfigError } from '../types/errors.js';
import { formatZodErrors } from './config-parser.js';

const COMPLETED_OUTCOME = 'COMPLETED';

const queryLogRowSchema = z.object({
  queryText: z.string().optional(),
  outcome: z.string().optional(),
  context: z.string().optional(),
  username: z.string().optional(),
  queryId: z.string().optional(),
});

export type QueryLogRow = z.infer<typeof queryLogRowSchema>;

export interface QueryLogImportOptions {
  /** Keep rows whose outcome is set to something other than COMPLETED. */
  includeFailed?: boolean;
}

function parseRows(content: string): Result<unknown[], ConfigError> {
  const trimmed = content.trim();
  if (trimmed.length === 0) {
    return ok([]);
  }

  if (trimmed.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      return Array.isArray(parsed)
        ? ok(parsed)
        : err(new ConfigError('Query log must be a JSON array or newline-delimited JSON'));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Unknown parse error';
      return err(new ConfigError(`Invalid JSON in query log: ${message}`));
    }
  }

  const rows: unknown[] = [];
  const lines = trimmed.split(/\r?\n/);
  for (const [lineIndex, line] of lines.entries()) {
    if (line.trim().length === 0) continue;
    try {
      rows.push(JSON.parse(line));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Unknown parse error';
      return err(new ConfigError(`Invalid JSON on line ${lineIndex + 1} of query log: ${message}`));
    }
  }
  return ok(rows);
}

export function parseQueryLog(content: string): Result<QueryLogRow[], ConfigError> {
  const rows = parseRows(content);
  if (rows.isErr()) {
    return err(rows.error);
  }

  const validated = z.array(queryLogRowSchema).safeParse(rows.value);
  if (!validated.success) {
    return err(new ConfigError(`Query log validation failed: ${formatZodErrors(validated.error)}`));
  }
  return ok(validated.data);
}

export function buildConfigFromQueryLog(
  rows: readonly QueryLogRow[],
  options: QueryLogImportOptions = {},
): StressConfig {
  const entries = new Map<string, QueryEntryConfig>();

  for (const row of rows) {
    const text = row.queryText?.trim() ?? '';
    if (text.length === 0) continue;
    if (!options.includeFailed && row.outcome !== undefined && row.outcome !== COMPLETED_OUTCOME) continue;

    const context = row.context?.trim() ?? '';
    const key = JSON.stringify([text, context]);
    const existing = entries.get(key);
    if (existing) {
      existing.frequency += 1;
      continue;
    }
    entries.set(key, {
      frequency: 1,
      query: text,
      ...(context.length > 0 ? { sqlContext: [context] } : {}),
    });
  }

  return { queries: [...entries.values()], queryGroups: [] };
}
