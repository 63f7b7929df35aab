/**
 * Ingestion Configuration
 *
 * Read from a YAML document (the CONFIG_YAML binding). Missing keys fall
 * back to DEFAULT_CONFIG; unknown keys are rejected.
 */

import * as yaml from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors';

const configSchema = z
  .object({
    strict: z.boolean().default(false),
    quiet: z.boolean().default(false),
    maxBatchSize: z.number().int().positive().max(100_000).default(1000),
    source: z.string().trim().min(1).optional(),
  })
  .strict();

export type IngestConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG: IngestConfig = configSchema.parse({});

export function parseConfig(yamlContent: string | undefined): IngestConfig {
  if (!yamlContent || yamlContent.trim() === '') {
    return DEFAULT_CONFIG;
  }

  const doc = yaml.parseDocument(yamlContent);
  if (doc.errors.length > 0) {
    throw new ConfigError(`Invalid config YAML: ${doc.errors[0].message}`);
  }

  const result = configSchema.safeParse(doc.toJSON() ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(`Invalid config at "${issue.path.join('.') || '(root)'}": ${issue.message}`);
  }
  return result.data;
}
