/**
 * Quote Repository Interface
 *
 * - One row per placed quote pair
 * - Requotes retire the old row (`replaced`) and insert a new one
 * - Active rows are what a restart rebuilds live quotes from
 */

import type { ResultAsync } from "neverthrow";

import type { NewQuoteRecord, QuoteRecord, QuoteStatus, RepositoryError } from "../types";

export interface QuoteRepository {
  /** Returns the new row id */
  insertQuote(quote: NewQuoteRecord): ResultAsync<number, RepositoryError>;

  updateQuoteStatus(id: number, status: QuoteStatus): ResultAsync<void, RepositoryError>;

  getActiveQuotes(): ResultAsync<QuoteRecord[], RepositoryError>;

  getQuotesByIds(ids: number[]): ResultAsync<QuoteRecord[], RepositoryError>;
}
