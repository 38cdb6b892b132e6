// Schema
export * from "./schema";

// Connection helper (Node-only)
export { getDb } from "./get-db";
export type { Db, DbConnection } from "./get-db";
