import { describe, it, expect } from "vitest";
import { categorize, spendingCategories } from "../../src/records/categories.js";
import { computeSpendingStats } from "../../src/records/stats.js";
import type { TransactionRecord } from "../../src/records/types.js";

function record(overrides: Partial<TransactionRecord>): TransactionRecord {
  return {
    id: "txn-1",
    type: "send",
    amount: 0,
    recipient: "9876543210",
    status: "success",
    timestamp: 1000,
    message: "",
    referenceId: null,
    balance: null,
    sessionId: null,
    ...overrides,
  };
}

describe("categorize", () => {
  it("matches merchant keywords case-insensitively", () => {
    expect(categorize("Paid to SWIGGY").id).toBe("food_dining");
    expect(categorize("metro card top-up").id).toBe("transport");
  });

  it("uses table order when several categories match", () => {
    expect(categorize("pizza from the mall").id).toBe("food_dining");
  });

  it("falls back to personal transfer, or other for an empty message", () => {
    expect(categorize("for rent").id).toBe("personal_transfer");
    expect(categorize("").id).toBe("other");
    expect(categorize(null).id).toBe("other");
  });

  it("loads every category from the data file", () => {
    expect(spendingCategories().map((c) => c.id)).toEqual([
      "food_dining",
      "shopping",
      "groceries",
      "transport",
      "entertainment",
      "bills_utilities",
      "health",
      "education",
    ]);
  });
});

describe("computeSpendingStats", () => {
  it("totals successful sends only, grouped by category", () => {
    const stats = computeSpendingStats([
      record({ amount: 300, message: "swiggy order" }),
      record({ amount: 100, message: "zomato" }),
      record({ amount: 200, message: "electricity bill" }),
      record({ amount: 999, status: "failed", message: "swiggy" }),
      record({ type: "balance_check", amount: 0, message: "Your balance is Rs. 10" }),
    ]);
    expect(stats).toEqual({
      totalSpent: 600,
      transactionCount: 3,
      averageSpent: 200,
      byCategory: [
        { id: "food_dining", label: "Food & Dining", count: 2, total: 400 },
        { id: "bills_utilities", label: "Bills & Utilities", count: 1, total: 200 },
      ],
    });
  });

  it("reports zeros without sends", () => {
    expect(computeSpendingStats([])).toEqual({ totalSpent: 0, transactionCount: 0, averageSpent: 0, byCategory: [] });
  });
});
