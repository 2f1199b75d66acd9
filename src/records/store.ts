import type { BalanceSnapshot, NewTransaction, TransactionRecord, TransactionUpdate } from "./types.js";

export interface TransactionStore {
  saveTransaction(input: NewTransaction): TransactionRecord;
  updateTransaction(id: string, updates: TransactionUpdate): TransactionRecord | undefined;
  getTransaction(id: string): TransactionRecord | undefined;
  /** Newest first. */
  listTransactions(limit?: number): TransactionRecord[];
  clearTransactions(): void;
  saveLastBalance(balance: number, timestamp?: number): void;
  getLastBalance(): BalanceSnapshot | undefined;
}
