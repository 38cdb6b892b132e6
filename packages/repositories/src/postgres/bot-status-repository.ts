/**
 * Postgres Bot Status Repository
 */

import { eq, sql } from "drizzle-orm";
import { okAsync, ResultAsync } from "neverthrow";

import { botStatus, type Db } from "@outcome-mm/db";

import type { BotStatusRepository } from "../interfaces/bot-status-repository";
import { toRepositoryError } from "../types";

/**
 * Create a Postgres bot status repository
 */
export function createPostgresBotStatusRepository(db: Db): BotStatusRepository {
  return {
    setStatus(entries) {
      const now = new Date();
      const rows = Object.entries(entries).map(([key, value]) => ({ key, value, updatedAt: now }));
      if (rows.length === 0) return okAsync(undefined);

      return ResultAsync.fromPromise(
        db
          .insert(botStatus)
          .values(rows)
          .onConflictDoUpdate({
            target: botStatus.key,
            set: { value: sql`excluded.value`, updatedAt: now },
          }),
        toRepositoryError,
      ).map(() => undefined);
    },

    getStatus(key) {
      return ResultAsync.fromPromise(
        db.select().from(botStatus).where(eq(botStatus.key, key)).limit(1),
        toRepositoryError,
      ).map(rows => rows[0]?.value ?? null);
    },
  };
}
