import Decimal from 'decimal.js';
import { DateTime } from 'luxon';
import { z } from 'zod';
import { PriceLevel } from '../../models';

const scalar = z.union([z.string().trim().min(1), z.number()]);

export const numeric = scalar.pipe(z.coerce.number().finite());

export const decimal = scalar.transform((value, ctx) => {
  try {
    const parsed = new Decimal(value);
    if (parsed.isFinite()) {
      return parsed;
    }
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid decimal: ${String(error)}` });
    return z.NEVER;
  }
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Decimal must be finite' });
  return z.NEVER;
});

/**
 * UTC timestamp (ISO-8601, `yyyy-MM-dd HH:mm:ss`, or epoch milliseconds) to epoch seconds.
 */
export const utcTimestampSeconds = scalar.transform((value, ctx) => {
  const text = String(value).trim();
  if (/^\d+$/.test(text)) {
    return Math.floor(Number(text) / 1000);
  }
  let parsed = DateTime.fromISO(text, { zone: 'utc' });
  if (!parsed.isValid) {
    parsed = DateTime.fromSQL(text, { zone: 'utc' });
  }
  if (!parsed.isValid) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unparseable UTC timestamp "${text}"` });
    return z.NEVER;
  }
  return Math.floor(parsed.toSeconds());
});

export const priceLevel = z
  .tuple([numeric, numeric])
  .rest(z.unknown())
  .transform(([price, size]): PriceLevel => [price, size]);

export const bookData = z.object({
  ts: numeric,
  bids: z.array(priceLevel),
  asks: z.array(priceLevel),
});

export const orderBookSnapshotResponse = z.object({
  data: z.array(bookData).min(1),
});

export const orderBookDiffMessage = z.object({
  arg: z.object({ instId: z.string().min(1) }),
  action: z.literal('update'),
  data: z.array(bookData).min(1),
});

export const tradeEntry = z.object({
  instId: z.string().min(1),
  tradeId: z.union([z.string().min(1), z.number()]).transform(String),
  side: z.enum(['buy', 'sell']),
  sz: numeric,
  px: numeric,
  ts: numeric,
});

export const tradeMessage = z.object({
  data: z.array(tradeEntry),
});

export const fundingUpdateEntry = z.object({
  index_price: decimal.optional(),
  mark_price: decimal.optional(),
  next_funding_time: utcTimestampSeconds.optional(),
  predicted_funding_rate_e6: decimal.optional(),
});

export const fundingDeltaMessage = z.object({
  type: z.literal('delta'),
  topic: z.string().min(1),
  data: z.object({
    update: z.array(fundingUpdateEntry),
  }),
});

export const indexTickerResponse = z.object({
  data: z.array(z.object({ idxPx: decimal })).min(1),
});

export const markPriceResponse = z.object({
  data: z.array(z.object({ markPx: decimal })).min(1),
});

export const fundingRateResponse = z.object({
  data: z
    .array(
      z.object({
        nextFundingTime: numeric.pipe(z.number().int()),
        nextFundingRate: decimal,
      }),
    )
    .min(1),
});

export const lastTradedPriceResponse = z.object({
  data: z.array(z.object({ last: numeric })).min(1),
});
