/**
 * SQLite transaction store on better-sqlite3, loaded on first use.
 * Pass ":memory:" for a throwaway database.
 */

import type { TransactionStore } from "./store.js";
import {
  isTransactionStatus,
  isTransactionType,
  type BalanceSnapshot,
  type NewTransaction,
  type TransactionRecord,
  type TransactionUpdate,
} from "./types.js";
import { genId } from "../shared/ids.js";

interface TransactionRow {
  id: string;
  type: string;
  amount: number;
  recipient: string;
  status: string;
  timestamp: number;
  message: string;
  referenceId: string | null;
  balance: number | null;
  sessionId: string | null;
}

const COLUMNS = "id, type, amount, recipient, status, timestamp, message, referenceId, balance, sessionId";

const UPDATABLE: ReadonlyArray<keyof TransactionUpdate> = ["status", "message", "referenceId", "balance", "sessionId"];

function rowToRecord(row: TransactionRow): TransactionRecord {
  return {
    id: row.id,
    type: isTransactionType(row.type) ? row.type : "send",
    amount: row.amount,
    recipient: row.recipient,
    status: isTransactionStatus(row.status) ? row.status : "failed",
    timestamp: row.timestamp,
    message: row.message,
    referenceId: row.referenceId,
    balance: row.balance,
    sessionId: row.sessionId,
  };
}

export async function createSqliteTransactionStore(dbPath: string): Promise<TransactionStore> {
  const Database = (await import("better-sqlite3")).default;
  const db = new Database(dbPath);

  db.exec(`
    CREATE TABLE IF NOT EXISTS transactions (
      id TEXT PRIMARY KEY,
      type TEXT NOT NULL,
      amount REAL NOT NULL,
      recipient TEXT NOT NULL DEFAULT '',
      status TEXT NOT NULL,
      timestamp INTEGER NOT NULL,
      message TEXT NOT NULL DEFAULT '',
      referenceId TEXT,
      balance REAL,
      sessionId TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_transactions_timestamp ON transactions(timestamp);
    CREATE TABLE IF NOT EXISTS last_balance (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      balance REAL NOT NULL,
      timestamp INTEGER NOT NULL
    );
  `);

  const insertRow = db.prepare<[string, string, number, string, string, number, string, string | null]>(
    "INSERT INTO transactions (id, type, amount, recipient, status, timestamp, message, sessionId) VALUES (?, ?, ?, ?, ?, ?, ?, ?)",
  );
  const getRow = db.prepare<[string], TransactionRow>(`SELECT ${COLUMNS} FROM transactions WHERE id = ?`);
  const listRows = db.prepare<[], TransactionRow>(
    `SELECT ${COLUMNS} FROM transactions ORDER BY timestamp DESC, rowid DESC`,
  );
  const upsertBalance = db.prepare<[number, number]>(
    "INSERT INTO last_balance (id, balance, timestamp) VALUES (1, ?, ?) ON CONFLICT(id) DO UPDATE SET balance = excluded.balance, timestamp = excluded.timestamp",
  );
  const getBalance = db.prepare<[], BalanceSnapshot>("SELECT balance, timestamp FROM last_balance WHERE id = 1");

  return {
    saveTransaction(input: NewTransaction): TransactionRecord {
      const id = genId("txn");
      insertRow.run(
        id,
        input.type,
        input.amount,
        input.recipient,
        input.status ?? "pending",
        input.timestamp ?? Date.now(),
        input.message ?? "",
        input.sessionId ?? null,
      );
      const row = getRow.get(id);
      if (!row) throw new Error(`Transaction ${id} was not stored`);
      return rowToRecord(row);
    },

    updateTransaction(id: string, updates: TransactionUpdate): TransactionRecord | undefined {
      const sets: string[] = [];
      const values: Array<string | number | null> = [];
      for (const key of UPDATABLE) {
        const value = updates[key];
        if (value === undefined) continue;
        sets.push(`${key} = ?`);
        values.push(value);
      }
      if (sets.length > 0) {
        db.prepare(`UPDATE transactions SET ${sets.join(", ")} WHERE id = ?`).run(...values, id);
      }
      const row = getRow.get(id);
      return row ? rowToRecord(row) : undefined;
    },

    getTransaction(id: string): TransactionRecord | undefined {
      const row = getRow.get(id);
      return row ? rowToRecord(row) : undefined;
    },

    listTransactions(limit?: number): TransactionRecord[] {
      const rows = listRows.all().map(rowToRecord);
      return limit === undefined ? rows : rows.slice(0, limit);
    },

    clearTransactions(): void {
      db.prepare("DELETE FROM transactions").run();
    },

    saveLastBalance(balance: number, timestamp = Date.now()): void {
      upsertBalance.run(balance, timestamp);
    },

    getLastBalance(): BalanceSnapshot | undefined {
      return getBalance.get();
    },
  };
}
