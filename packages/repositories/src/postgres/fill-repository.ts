/**
 * Postgres Fill Repository
 *
 * - Insert mm_fill rows, ignoring duplicates by order id
 */

import { and, asc, gte, lt } from "drizzle-orm";
import { ResultAsync } from "neverthrow";

import { mmFill, type Db, type MmFill } from "@outcome-mm/db";

import type { FillRepository } from "../interfaces/fill-repository";
import { parseLeg, parseNullableNumeric, parseSide, toNullableNumeric, toRepositoryError, type FillRecord } from "../types";

const toFillRecord = (row: MmFill): FillRecord => ({
  ts: row.ts,
  quoteId: row.quoteId,
  marketId: row.marketId,
  tokenId: row.tokenId,
  orderId: row.orderId,
  leg: parseLeg(row.leg),
  side: parseSide(row.side),
  price: Number(row.price),
  size: Number(row.size),
  fee: Number(row.fee),
  midAtFill: parseNullableNumeric(row.midAtFill),
  realizedPnl: parseNullableNumeric(row.realizedPnl),
});

/**
 * Create a Postgres fill repository
 */
export function createPostgresFillRepository(db: Db): FillRepository {
  return {
    insertFill(fill) {
      return ResultAsync.fromPromise(
        db
          .insert(mmFill)
          .values({
            ts: fill.ts,
            quoteId: fill.quoteId,
            marketId: fill.marketId,
            tokenId: fill.tokenId,
            orderId: fill.orderId,
            leg: fill.leg,
            side: fill.side,
            price: String(fill.price),
            size: String(fill.size),
            fee: String(fill.fee),
            midAtFill: toNullableNumeric(fill.midAtFill),
            realizedPnl: toNullableNumeric(fill.realizedPnl),
          })
          .onConflictDoNothing({ target: mmFill.orderId }),
        toRepositoryError,
      ).map(() => undefined);
    },

    listFillsBetween(from, to) {
      return ResultAsync.fromPromise(
        db
          .select()
          .from(mmFill)
          .where(and(gte(mmFill.ts, from), lt(mmFill.ts, to)))
          .orderBy(asc(mmFill.ts)),
        toRepositoryError,
      ).map(rows => rows.map(toFillRecord));
    },
  };
}
