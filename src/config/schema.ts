/**
 * Quire — Configuration Schemas
 *
 * Shape of the source list file and of the runtime settings read from
 * the environment.
 */

import { z } from 'zod';
import { MAX_TIMEOUT_MS } from '../feeds/aggregator';

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

export const SourceConfigSchema = z.object({
  name: z.string().trim().min(1, 'Source name cannot be empty'),
  url: z
    .string()
    .trim()
    .url('Invalid URL')
    .refine(isHttpUrl, 'Invalid URL scheme: only HTTP and HTTPS are supported'),
});
export type SourceConfig = z.infer<typeof SourceConfigSchema>;

export const QuireConfigSchema = z.object({
  sources: z.object({
    rss: z
      .array(SourceConfigSchema)
      .default([])
      .superRefine((entries, ctx) => {
        const seen = new Set<string>();
        entries.forEach((entry, index) => {
          if (seen.has(entry.name)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              message: `Duplicate source name: ${entry.name}`,
              path: [index, 'name'],
            });
          }
          seen.add(entry.name);
        });
      }),
  }),
});
export type QuireConfig = z.infer<typeof QuireConfigSchema>;

const emptyAsUnset = (value: unknown) => (value === '' ? undefined : value);

export const RuntimeSettingsSchema = z.object({
  QUIRE_CONFIG: z.preprocess(emptyAsUnset, z.string().optional()),
  QUIRE_TIMEOUT_MS: z.preprocess(
    emptyAsUnset,
    z.coerce.number().int().positive().max(MAX_TIMEOUT_MS).default(10_000)
  ),
  QUIRE_MAX_CONCURRENCY: z.preprocess(emptyAsUnset, z.coerce.number().int().positive().optional()),
});
