import { z } from "zod";

// -------------------------------------------------
// Finnhub payloads
// -------------------------------------------------
export const finnhubQuoteSchema = z.object({
  c: z.number(),             // current price
  h: z.number().optional(),  // day high
  l: z.number().optional(),  // day low
  o: z.number().optional(),  // open
  pc: z.number().optional(), // previous close
  t: z.number().optional(),
});

export type FinnhubQuote = z.infer<typeof finnhubQuoteSchema>;

// Unknown symbols come back as an empty object
export const finnhubProfileSchema = z.object({
  name: z.string().optional(),
  ticker: z.string().optional(),
  marketCapitalization: z.number().optional(), // in millions
});

export type FinnhubProfile = z.infer<typeof finnhubProfileSchema>;

// "no_data" responses carry only the status field
export const finnhubCandleSchema = z.object({
  s: z.string(),
  t: z.array(z.number()).default([]), // unix seconds
  o: z.array(z.number()).default([]),
  h: z.array(z.number()).default([]),
  l: z.array(z.number()).default([]),
  c: z.array(z.number()).default([]),
  v: z.array(z.number()).default([]),
});

export type FinnhubCandles = z.infer<typeof finnhubCandleSchema>;
