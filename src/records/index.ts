export type {
  TransactionRecord,
  TransactionType,
  TransactionStatus,
  NewTransaction,
  TransactionUpdate,
  BalanceSnapshot,
} from "./types.js";
export { isTransactionStatus, isTransactionType } from "./types.js";
export type { TransactionStore } from "./store.js";
export { createInMemoryTransactionStore } from "./in-memory.js";
export { createSqliteTransactionStore } from "./sqlite.js";
export { categorize, spendingCategories, OTHER, PERSONAL_TRANSFER, type SpendingCategory } from "./categories.js";
export { computeSpendingStats, type SpendingStats, type CategoryTotal } from "./stats.js";
