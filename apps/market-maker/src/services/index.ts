export * from "./inventory-ledger";
export * from "./quoter";
export * from "./risk-manager";
export * from "./market-state";
