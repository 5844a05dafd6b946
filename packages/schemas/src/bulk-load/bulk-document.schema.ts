import { z } from 'zod';

/**
 * One row of a bulk-load dump. candle_color is accepted but recomputed on load.
 */
export const BulkCandleRowSchema = z.object({
  symbol: z.string().min(1),
  /** ISO-8601, e.g. '2025-03-26T08:00:00+00:00' */
  timestamp: z.string().min(1),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number().nullable().optional(),
  candle_color: z.string().optional(),
});

/**
 * One table of a dump, named by its short identifier (e.g. 'es_1m').
 * A missing or null row list is treated like an empty one.
 */
export const BulkTableSchema = z.object({
  table: z.string().min(1),
  rows: z
    .array(BulkCandleRowSchema)
    .nullable()
    .optional()
    .transform((rows) => rows ?? []),
});

export const BulkDocumentSchema = z.object({
  tables: z.array(BulkTableSchema),
});

export type BulkCandleRow = z.infer<typeof BulkCandleRowSchema>;
export type BulkTable = z.infer<typeof BulkTableSchema>;
export type BulkDocument = z.infer<typeof BulkDocumentSchema>;
