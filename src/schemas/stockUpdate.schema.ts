import { z } from "zod";

// -------------------------------------------------
// Broadcast snapshot, as stored in Valkey
// -------------------------------------------------
export const quoteSchema = z.object({
  symbol: z.string(),
  companyName: z.string(),
  price: z.number(),
  changePercent: z.number(),
  volume: z.number(),
  marketCap: z.number(),
  previousClose: z.number().optional(),
  open: z.number().optional(),
  dayHigh: z.number().optional(),
  dayLow: z.number().optional(),
  yearHigh: z.number().optional(),
  yearLow: z.number().optional(),
  timestamp: z.string(),
  source: z.enum(["live", "fallback"]),
});

export const stockUpdatePayloadSchema = z.object({
  type: z.literal("stock_update"),
  data: z.array(quoteSchema),
  timestamp: z.string(),
});
