import { z } from 'zod';

const NullableSeries = z.array(z.number().nullable());

/**
 * Subset of the Yahoo Finance v8 chart response used for candles
 */
export const YahooChartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z.object({ symbol: z.string() }).passthrough(),
          /** Bar open times, Unix seconds. Absent when the range has no bars. */
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z
              .array(
                z.object({
                  open: NullableSeries.optional(),
                  high: NullableSeries.optional(),
                  low: NullableSeries.optional(),
                  close: NullableSeries.optional(),
                  volume: NullableSeries.optional(),
                })
              )
              .default([]),
          }),
        })
      )
      .nullable(),
    error: z
      .object({
        code: z.string(),
        description: z.string(),
      })
      .nullable(),
  }),
});

export type YahooChartResponse = z.infer<typeof YahooChartResponseSchema>;
