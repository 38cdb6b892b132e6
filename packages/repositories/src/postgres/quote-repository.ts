/**
 * Postgres Quote Repository
 */

import { desc, eq, inArray } from "drizzle-orm";
import { err, ok, okAsync, ResultAsync } from "neverthrow";

import { mmQuote, type Db, type MmQuote } from "@outcome-mm/db";

import type { QuoteRepository } from "../interfaces/quote-repository";
import { parseQuoteStatus, toRepositoryError, type QuoteRecord, type RepositoryError } from "../types";

const toQuoteRecord = (row: MmQuote): QuoteRecord => ({
  id: row.id,
  marketId: row.marketId,
  tokenId: row.tokenId,
  noTokenId: row.noTokenId,
  conditionId: row.conditionId,
  bidPrice: Number(row.bidPrice),
  askPrice: Number(row.askPrice),
  bidSize: Number(row.bidSize),
  askSize: Number(row.askSize),
  bidOrderId: row.bidOrderId,
  askOrderId: row.askOrderId,
  midPrice: Number(row.midPrice),
  status: parseQuoteStatus(row.status),
  levels: row.levels,
  createdAt: row.createdAt,
  updatedAt: row.updatedAt,
});

/**
 * Create a Postgres quote repository
 */
export function createPostgresQuoteRepository(db: Db): QuoteRepository {
  return {
    insertQuote(quote) {
      return ResultAsync.fromPromise(
        db
          .insert(mmQuote)
          .values({
            marketId: quote.marketId,
            tokenId: quote.tokenId,
            noTokenId: quote.noTokenId,
            conditionId: quote.conditionId,
            bidPrice: String(quote.bidPrice),
            askPrice: String(quote.askPrice),
            bidSize: String(quote.bidSize),
            askSize: String(quote.askSize),
            bidOrderId: quote.bidOrderId,
            askOrderId: quote.askOrderId,
            midPrice: String(quote.midPrice),
            status: quote.status,
            levels: quote.levels,
          })
          .returning({ id: mmQuote.id }),
        toRepositoryError,
      ).andThen(rows => {
        const row = rows[0];
        return row ? ok(row.id) : err<number, RepositoryError>({ type: "DB_ERROR", message: "insert returned no id" });
      });
    },

    updateQuoteStatus(id, status) {
      return ResultAsync.fromPromise(
        db.update(mmQuote).set({ status, updatedAt: new Date() }).where(eq(mmQuote.id, id)),
        toRepositoryError,
      ).map(() => undefined);
    },

    getActiveQuotes() {
      return ResultAsync.fromPromise(
        db.select().from(mmQuote).where(eq(mmQuote.status, "active")).orderBy(desc(mmQuote.createdAt)),
        toRepositoryError,
      ).map(rows => rows.map(toQuoteRecord));
    },

    getQuotesByIds(ids) {
      if (ids.length === 0) return okAsync<QuoteRecord[], RepositoryError>([]);
      return ResultAsync.fromPromise(
        db
          .select()
          .from(mmQuote)
          .where(inArray(mmQuote.id, ids)),
        toRepositoryError,
      ).map(rows => rows.map(toQuoteRecord));
    },
  };
}
