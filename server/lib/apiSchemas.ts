/**
 * Zod schemas for the holdings pipeline's boundaries: the per-source field
 * mapping configuration and the normalized holding records a source yields.
 *
 * Field mappings are declared, not inferred. Each canonical field lists the
 * header names a source is known to publish it under; header drift is
 * absorbed by adding an alias to the config instead of by guessing.
 */

import { z } from 'zod';
import type { HoldingRecord } from '../../shared/holdings-types.js';

// ---------------------------------------------------------------------------
// Source configuration
// ---------------------------------------------------------------------------

const HeaderAliasesSchema = z
  .union([z.string().trim().min(1), z.array(z.string().trim().min(1)).min(1)])
  .transform((value) => (Array.isArray(value) ? value : [value]));

/** Canonical field → accepted header names (matched case-insensitively). */
export const FieldMappingSchema = z
  .object({
    ticker: HeaderAliasesSchema,
    weight: HeaderAliasesSchema,
    date: HeaderAliasesSchema.optional(),
    name: HeaderAliasesSchema.optional(),
    cusip: HeaderAliasesSchema.optional(),
    sector: HeaderAliasesSchema.optional(),
    shares: HeaderAliasesSchema.optional(),
    marketValue: HeaderAliasesSchema.optional(),
    price: HeaderAliasesSchema.optional(),
    priceChange: HeaderAliasesSchema.optional(),
  })
  .strict();

export type FieldMapping = z.infer<typeof FieldMappingSchema>;
export type CanonicalField = keyof FieldMapping;

export const HoldingsSourceSchema = z
  .object({
    id: z
      .string()
      .trim()
      .toLowerCase()
      .regex(/^[a-z0-9_-]+$/, 'id must be lowercase letters, digits, "-" or "_"'),
    fund: z.string().trim().min(1),
    description: z.string().trim().optional(),
    kind: z.enum(['csv', 'html']),
    url: z.string().url(),
    filePrefix: z
      .string()
      .trim()
      .regex(/^[a-z0-9_-]+$/, 'filePrefix must be lowercase letters, digits, "-" or "_"'),
    fields: FieldMappingSchema,
    demoFile: z.string().trim().min(1).optional(),
  })
  .strict();

export type HoldingsSource = z.infer<typeof HoldingsSourceSchema>;

export const HoldingsSourcesConfigSchema = z
  .object({
    sources: z.array(HoldingsSourceSchema).min(1, 'at least one source must be declared'),
  })
  .superRefine((config, ctx) => {
    const seenIds = new Set<string>();
    const seenPrefixes = new Set<string>();
    config.sources.forEach((source, index) => {
      if (seenIds.has(source.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['sources', index, 'id'], message: `duplicate id ${source.id}` });
      }
      if (seenPrefixes.has(source.filePrefix)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sources', index, 'filePrefix'],
          message: `duplicate filePrefix ${source.filePrefix}`,
        });
      }
      seenIds.add(source.id);
      seenPrefixes.add(source.filePrefix);
    });
  });

export type HoldingsSourcesConfig = z.infer<typeof HoldingsSourcesConfigSchema>;

// ---------------------------------------------------------------------------
// Normalized holding record
// ---------------------------------------------------------------------------

export const HoldingRecordSchema: z.ZodType<HoldingRecord> = z.object({
  ticker: z.string().min(1),
  weightPercent: z.number().finite().min(0).max(100),
  name: z.string().nullable(),
  cusip: z.string().nullable(),
  sector: z.string().nullable(),
  shares: z.number().finite().nullable(),
  marketValue: z.number().finite().nullable(),
  price: z.number().finite().nullable(),
  priceChangePercent: z.number().finite().nullable(),
});

/** Demo fixture: raw table cells keyed by header, as a page would publish them. */
export const DemoHoldingsSchema = z.object({
  asOf: z.string().trim().min(1),
  columns: z.array(z.string()).min(1),
  rows: z.array(z.array(z.string())).min(1),
});

export type DemoHoldings = z.infer<typeof DemoHoldingsSchema>;

// ---------------------------------------------------------------------------
// Issue formatting
// ---------------------------------------------------------------------------

/** Format the first few issues as `path: message` pairs for error text. */
export function formatZodIssues(error: z.ZodError, limit = 3): string {
  return error.issues
    .slice(0, limit)
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

