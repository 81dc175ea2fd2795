/**
 * Data API Wire Types
 */

import { z } from 'zod';

const numeric = z.union([z.number(), z.string()]).pipe(z.coerce.number());

export const LeaderboardRowSchema = z.object({
  proxyWallet: z.string().min(1),
  userName: z.string().nullish(),
  pnl: numeric,
  vol: numeric.optional(),
});

export const DataApiTradeSchema = z.object({
  proxyWallet: z.string().min(1),
  side: z.enum(['BUY', 'SELL']),
  conditionId: z.string().min(1),
  outcome: z.string().default(''),
  outcomeIndex: numeric,
  price: numeric,
  size: numeric,
  timestamp: numeric,          // Unix seconds
  title: z.string().default(''),
});

export type LeaderboardRow = z.infer<typeof LeaderboardRowSchema>;
export type DataApiTrade = z.infer<typeof DataApiTradeSchema>;
