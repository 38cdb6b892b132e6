/**
 * Market catalog - candidate markets and paper books from a JSON file
 *
 * The file stands in for the external scanner: markets are listed best first.
 * A `book` entry seeds the paper venue's top of book for the YES token.
 */

import { readFile } from "node:fs/promises";

import { ResultAsync, err, ok, type Result } from "neverthrow";
import { z } from "zod";

import { roundTo, type BookSummary, type MarketCandidate } from "@outcome-mm/core";

const priceSchema = z.number().gt(0).lt(1);

const bookSchema = z
  .object({
    bestBid: priceSchema,
    bestAsk: priceSchema,
    bidDepth: z.number().nonnegative().default(100),
    askDepth: z.number().nonnegative().default(100),
    minOrderSize: z.number().positive().optional(),
  })
  .refine(b => b.bestBid < b.bestAsk, { message: "bestBid must be below bestAsk" });

const marketSchema = z.object({
  marketId: z.string().min(1),
  tokenId: z.string().min(1),
  noTokenId: z.string().min(1).optional(),
  conditionId: z.string().min(1).optional(),
  daysToResolution: z.number().nonnegative().optional(),
  question: z.string().optional(),
  book: bookSchema.optional(),
});

const catalogSchema = z.object({
  markets: z.array(marketSchema),
});

export type CatalogMarket = z.infer<typeof marketSchema>;
export type CatalogBook = z.infer<typeof bookSchema>;

export type CatalogError =
  | { type: "READ_FAILED"; message: string }
  | { type: "INVALID_CATALOG"; message: string };

export interface MarketCatalog {
  markets: CatalogMarket[];
}

export function parseMarketCatalog(raw: unknown): Result<MarketCatalog, CatalogError> {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join(".") : "";
    return err({ type: "INVALID_CATALOG", message: `${where}: ${issue?.message ?? "invalid"}` });
  }

  const seen = new Set<string>();
  for (const market of parsed.data.markets) {
    if (seen.has(market.marketId)) {
      return err({ type: "INVALID_CATALOG", message: `duplicate marketId ${market.marketId}` });
    }
    seen.add(market.marketId);
  }

  return ok({ markets: parsed.data.markets });
}

export function loadMarketCatalog(path: string): ResultAsync<MarketCatalog, CatalogError> {
  return ResultAsync.fromPromise(
    readFile(path, "utf8").then((text): unknown => JSON.parse(text)),
    (e): CatalogError => ({ type: "READ_FAILED", message: e instanceof Error ? e.message : String(e) }),
  ).andThen(parseMarketCatalog);
}

export const toCandidate = (market: CatalogMarket): MarketCandidate => ({
  marketId: market.marketId,
  tokenId: market.tokenId,
  noTokenId: market.noTokenId,
  conditionId: market.conditionId,
  daysToResolution: market.daysToResolution,
  question: market.question,
});

export function toBookSummary(book: CatalogBook): BookSummary {
  const totalDepth = book.bidDepth + book.askDepth;
  return {
    bestBid: book.bestBid,
    bestAsk: book.bestAsk,
    bidDepth: book.bidDepth,
    askDepth: book.askDepth,
    mid: roundTo((book.bestBid + book.bestAsk) / 2, 4),
    spread: roundTo(book.bestAsk - book.bestBid, 4),
    imbalance: totalDepth > 0 ? roundTo((book.bidDepth - book.askDepth) / totalDepth, 4) : 0,
    minOrderSize: book.minOrderSize,
  };
}
