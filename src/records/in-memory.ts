import { genId } from "../shared/ids.js";
import type { TransactionStore } from "./store.js";
import type { BalanceSnapshot, NewTransaction, TransactionRecord, TransactionUpdate } from "./types.js";

export function createInMemoryTransactionStore(): TransactionStore {
  const records = new Map<string, TransactionRecord>();
  let lastBalance: BalanceSnapshot | undefined;

  return {
    saveTransaction(input: NewTransaction): TransactionRecord {
      const record: TransactionRecord = {
        id: genId("txn"),
        type: input.type,
        amount: input.amount,
        recipient: input.recipient,
        status: input.status ?? "pending",
        timestamp: input.timestamp ?? Date.now(),
        message: input.message ?? "",
        referenceId: null,
        balance: null,
        sessionId: input.sessionId ?? null,
      };
      records.set(record.id, record);
      return { ...record };
    },

    updateTransaction(id: string, updates: TransactionUpdate): TransactionRecord | undefined {
      const record = records.get(id);
      if (!record) return undefined;
      for (const [key, value] of Object.entries(updates)) {
        if (value === undefined) continue;
        Object.assign(record, { [key]: value });
      }
      return { ...record };
    },

    getTransaction(id: string): TransactionRecord | undefined {
      const record = records.get(id);
      return record ? { ...record } : undefined;
    },

    listTransactions(limit?: number): TransactionRecord[] {
      const sorted = Array.from(records.values())
        .reverse()
        .sort((a, b) => b.timestamp - a.timestamp)
        .map((r) => ({ ...r }));
      return limit === undefined ? sorted : sorted.slice(0, limit);
    },

    clearTransactions(): void {
      records.clear();
    },

    saveLastBalance(balance: number, timestamp = Date.now()): void {
      lastBalance = { balance, timestamp };
    },

    getLastBalance(): BalanceSnapshot | undefined {
      return lastBalance ? { ...lastBalance } : undefined;
    },
  };
}
