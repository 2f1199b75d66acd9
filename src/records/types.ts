export type TransactionType = "send" | "receive" | "balance_check";
export type TransactionStatus = "pending" | "success" | "failed";

export const TRANSACTION_TYPES: readonly TransactionType[] = ["send", "receive", "balance_check"];
export const TRANSACTION_STATUSES: readonly TransactionStatus[] = ["pending", "success", "failed"];

export function isTransactionType(s: string): s is TransactionType {
  return TRANSACTION_TYPES.some((t) => t === s);
}

export function isTransactionStatus(s: string): s is TransactionStatus {
  return TRANSACTION_STATUSES.some((t) => t === s);
}

export interface TransactionRecord {
  id: string;
  type: TransactionType;
  /** Currency units; 0 for balance checks. */
  amount: number;
  /** UPI id or mobile number; empty for balance checks. */
  recipient: string;
  status: TransactionStatus;
  timestamp: number;
  /** Final message from the bank, or the failure reason. */
  message: string;
  referenceId: string | null;
  balance: number | null;
  /** Engine session that produced this record, when there was one. */
  sessionId: string | null;
}

export type NewTransaction = Pick<TransactionRecord, "type" | "amount" | "recipient"> &
  Partial<Pick<TransactionRecord, "status" | "message" | "sessionId" | "timestamp">>;

export type TransactionUpdate = Partial<
  Pick<TransactionRecord, "status" | "message" | "referenceId" | "balance" | "sessionId">
>;

export interface BalanceSnapshot {
  balance: number;
  timestamp: number;
}
