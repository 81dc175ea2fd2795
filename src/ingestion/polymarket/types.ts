/**
 * Polymarket Wire Types
 *
 * zod schemas for Gamma, CLOB and market-channel payloads. Only the fields the
 * bot reads are declared; anything else is stripped at parse time.
 */

import { z } from 'zod';

const idField = z.union([z.string(), z.number()]).transform(String);
const numeric = z.union([z.number(), z.string()]).pipe(z.coerce.number());

// Gamma serializes arrays as JSON strings: '["Yes", "No"]'
const jsonArrayField = z.union([z.string(), z.array(z.union([z.string(), z.number()]))]).nullish();

export const GammaMarketSchema = z.object({
  id: idField,
  conditionId: z.string().min(1),
  question: z.string(),
  slug: z.string().nullish(),
  outcomes: jsonArrayField,
  outcomePrices: jsonArrayField,
  clobTokenIds: jsonArrayField,
  endDate: z.string().nullish(),
  active: z.boolean().nullish(),
  closed: z.boolean().nullish(),
  resolved: z.boolean().nullish(),
  winningOutcome: z.string().nullish(),
  negRisk: z.boolean().nullish(),
  events: z.array(z.object({ id: idField })).nullish(),
});

export const GammaEventSchema = z.object({
  id: idField,
  title: z.string().default(''),
  negRisk: z.boolean().nullish(),
  markets: z.array(z.unknown()).nullish(),
});

export const ClobPriceSchema = z.object({
  price: numeric,
});

const BookLevelSchema = z.object({
  price: numeric,
  size: numeric,
});

export const ClobBookSchema = z.object({
  bids: z.array(BookLevelSchema).default([]),
  asks: z.array(BookLevelSchema).default([]),
});

// Market channel: only resolution messages are consumed
export const MarketResolvedMessageSchema = z.object({
  event_type: z.literal('market_resolved'),
  market: z.string(),
  asset_id: z.string(),
  winner: z.boolean(),
});

export type GammaMarket = z.infer<typeof GammaMarketSchema>;
export type GammaEvent = z.infer<typeof GammaEventSchema>;
export type ClobBook = z.infer<typeof ClobBookSchema>;
export type MarketResolvedMessage = z.infer<typeof MarketResolvedMessageSchema>;
