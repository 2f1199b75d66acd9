import { categorize } from "./categories.js";
import type { TransactionRecord } from "./types.js";

export interface CategoryTotal {
  id: string;
  label: string;
  count: number;
  total: number;
}

export interface SpendingStats {
  totalSpent: number;
  transactionCount: number;
  averageSpent: number;
  /** Largest total first. */
  byCategory: CategoryTotal[];
}

/** Totals over successful outgoing payments only. */
export function computeSpendingStats(records: readonly TransactionRecord[]): SpendingStats {
  const sends = records.filter((r) => r.type === "send" && r.status === "success");
  const byId = new Map<string, CategoryTotal>();
  let totalSpent = 0;
  for (const record of sends) {
    totalSpent += record.amount;
    const category = categorize(record.message);
    const entry = byId.get(category.id) ?? { id: category.id, label: category.label, count: 0, total: 0 };
    entry.count += 1;
    entry.total += record.amount;
    byId.set(category.id, entry);
  }
  return {
    totalSpent,
    transactionCount: sends.length,
    averageSpent: sends.length > 0 ? totalSpent / sends.length : 0,
    byCategory: Array.from(byId.values()).sort((a, b) => b.total - a.total),
  };
}
