import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { Result, ok, err } from 'neverthrow';
import { parse } from 'yaml';
import { z } from 'zod';
import type { ConfigFormat, StressConfig } from '../types/config.js';
import { ConfigError } from '../types/errors.js';

// --- Zod Schemas ---

const parameterValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const sequenceSchema = z.object({
  name: z.string().min(1, 'Sequence name must not be empty'),
  start: z.number().int('Sequence start must be an integer'),
  end: z.number().int('Sequence end must be an integer'),
  step: z.number().int('Sequence step must be an integer')
    .refine((step) => step !== 0, 'Sequence step must not be 0')
    .optional(),
});

const queryEntrySchema = z.object({
  frequency: z.number().int('frequency must be an integer').nonnegative('frequency must not be negative'),
  query: z.string().nullable().optional(),
  queryGroup: z.string().nullable().optional(),
  parameters: z.record(z.string(), z.array(parameterValueSchema)).nullable().optional(),
  sequence: sequenceSchema.nullable().optional(),
  sqlContext: z.array(z.string()).nullable().optional(),
});

const queryGroupSchema = z.object({
  name: z.string().min(1, 'Query group name must not be empty'),
  queries: z.array(z.string()),
});

export const stressConfigSchema = z.object({
  queries: z.array(queryEntrySchema),
  queryGroups: z.array(queryGroupSchema).optional(),
});

export type StressConfigSchema = z.infer<typeof stressConfigSchema>;

// --- Helpers ---

export function formatZodErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

export function detectConfigFormat(filePath: string): ConfigFormat {
  const ext = extname(filePath).toLowerCase();
  return ext === '.yaml' || ext === '.yml' ? 'yaml' : 'json';
}

function parseContent(content: string, format: ConfigFormat): Result<unknown, ConfigError> {
  try {
    return ok(format === 'yaml' ? parse(content) : JSON.parse(content));
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    return err(new ConfigError(`Invalid ${format === 'yaml' ? 'YAML' : 'JSON'} in config file: ${message}`));
  }
}

// --- Main ---

export function parseStressConfig(content: string, format: ConfigFormat): Result<StressConfig, ConfigError> {
  const parsed = parseContent(content, format);
  if (parsed.isErr()) {
    return err(parsed.error);
  }

  const raw = parsed.value;
  if (raw === null || raw === undefined || typeof raw !== 'object' || Array.isArray(raw)) {
    return err(new ConfigError('Config file is empty or not an object'));
  }

  const validationResult = stressConfigSchema.safeParse(raw);
  if (!validationResult.success) {
    return err(new ConfigError(`Config validation failed: ${formatZodErrors(validationResult.error)}`));
  }

  return ok(validationResult.data);
}

export async function loadStressConfig(filePath: string): Promise<Result<StressConfig, ConfigError>> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch {
    return err(new ConfigError(`Config file not found: ${filePath}`));
  }

  return parseStressConfig(content, detectConfigFormat(filePath));
}
