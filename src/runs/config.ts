/**
 * Configuration files for batch comparisons (YAML or JSON).
 */

import { readFileSync } from 'node:fs';
import { basename, dirname, extname, resolve } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../errors.js';

export const configSchema = z
  .object({
    $schema: z.string().optional(),
    runList: z.string().min(1),
    destination: z.string().min(1),
    subsample: z.number().int().positive().default(1),
    predictedExtension: z.string().min(1).default('.pcl'),
    actualExtension: z.string().min(1).default('.acl'),
    outputFileName: z.string().min(1).default('ConfusionMatrix.txt'),
    /** Custom vocabulary in matrix order; the last label is the catch-all. */
    labels: z
      .array(z.string().min(1))
      .min(1)
      .refine((labels) => new Set(labels).size === labels.length, {
        message: 'labels must be unique',
      })
      .optional(),
  })
  .strict();

export type CompareConfig = z.infer<typeof configSchema>;

export interface ConfigOptions {
  /** Directory that relative `runList` and `destination` paths are resolved against. */
  baseDir?: string;
  /** Values that replace the ones read from the file, before validation. */
  overrides?: Record<string, unknown>;
}

/**
 * Validate a configuration object (after parsing YAML/JSON).
 */
export function parseConfig(data: unknown, opts?: ConfigOptions): CompareConfig {
  const merged = opts?.overrides ? { ...asRecord(data), ...opts.overrides } : data;
  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`, { cause: result.error });
  }
  const config = result.data;
  if (opts?.baseDir !== undefined) {
    config.runList = resolve(opts.baseDir, config.runList);
    config.destination = resolve(opts.baseDir, config.destination);
  }
  return config;
}

export function loadConfigFromText(
  content: string,
  opts?: ConfigOptions & { fmt?: 'yaml' | 'json' },
): CompareConfig {
  const fmt = opts?.fmt ?? 'yaml';
  let raw: unknown;
  try {
    raw = fmt === 'yaml' ? YAML.parse(content) : JSON.parse(content);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new ConfigError(`Could not parse ${fmt} configuration: ${message}`, { cause: e });
  }
  return parseConfig(raw, opts);
}

/**
 * Load a configuration file. Relative paths inside it are resolved against
 * the file's own directory.
 */
export function loadConfigFromFile(
  path: string,
  opts?: { overrides?: Record<string, unknown>; fmt?: 'yaml' | 'json' },
): CompareConfig {
  const fmt = opts?.fmt ?? inferFormat(path);
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new ConfigError(`Could not read configuration '${path}': ${message}`, { cause: e });
  }
  return loadConfigFromText(content, {
    fmt,
    baseDir: dirname(resolve(path)),
    overrides: opts?.overrides,
  });
}

function inferFormat(path: string): 'yaml' | 'json' {
  const ext = extname(path).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') return 'yaml';
  if (ext === '.json') return 'json';
  throw new ConfigError(
    `Could not infer format for filename '${basename(path)}'. Use the fmt option to specify the format.`,
  );
}

function asRecord(data: unknown): Record<string, unknown> {
  if (data === null || data === undefined) return {};
  if (typeof data === 'object' && !Array.isArray(data)) {
    return { ...data };
  }
  throw new ConfigError('Invalid configuration: expected a mapping at the top level');
}
