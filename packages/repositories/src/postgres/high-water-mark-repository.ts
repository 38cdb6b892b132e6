/**
 * Postgres High-Water-Mark Repository
 */

import { eq } from "drizzle-orm";
import { ResultAsync } from "neverthrow";

import { HIGH_WATER_MARK_ROW_ID, highWaterMark, type Db } from "@outcome-mm/db";

import type { HighWaterMarkRepository } from "../interfaces/high-water-mark-repository";
import { toRepositoryError } from "../types";

/**
 * Create a Postgres high-water-mark repository
 */
export function createPostgresHighWaterMarkRepository(db: Db): HighWaterMarkRepository {
  return {
    getHighWaterMark() {
      return ResultAsync.fromPromise(
        db.select().from(highWaterMark).where(eq(highWaterMark.id, HIGH_WATER_MARK_ROW_ID)).limit(1),
        toRepositoryError,
      ).map(rows => {
        const row = rows[0];
        return row ? Number(row.value) : null;
      });
    },

    setHighWaterMark(value) {
      const now = new Date();
      return ResultAsync.fromPromise(
        db
          .insert(highWaterMark)
          .values({ id: HIGH_WATER_MARK_ROW_ID, value: String(value), updatedAt: now })
          .onConflictDoUpdate({
            target: highWaterMark.id,
            set: { value: String(value), updatedAt: now },
          }),
        toRepositoryError,
      ).map(() => undefined);
    },
  };
}
