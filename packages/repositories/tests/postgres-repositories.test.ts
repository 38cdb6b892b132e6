/**
 * Postgres Repository export checks (no database in unit tests)
 */

import { describe, expect, it } from "vitest";

import * as repositories from "../src";

describe("Postgres repository exports", () => {
  it.each([
    "createPostgresQuoteRepository",
    "createPostgresFillRepository",
    "createPostgresInventoryRepository",
    "createPostgresHighWaterMarkRepository",
    "createPostgresDailyMetricsRepository",
    "createPostgresBotStatusRepository",
    "createPostgresRepositories",
  ] as const)("should export %s", name => {
    expect(typeof repositories[name]).toBe("function");
  });
});

describe("parseQuoteStatus", () => {
  it("should keep known statuses and read unknown ones as cancelled", () => {
    expect(repositories.parseQuoteStatus("active")).toBe("active");
    expect(repositories.parseQuoteStatus("bogus")).toBe("cancelled");
  });
});
