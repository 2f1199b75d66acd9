import { genId } from "../shared/ids.js";
import { DEFAULT_REMARKS } from "../shared/constants.js";

export type OperationKind = "balance_check" | "send_money" | "link_bank";

/** Supplied once at session start; never logged. */
export interface SessionSecrets {
  /** Bank routing code (IFSC). */
  bankIfsc: string;
  bankName: string;
  /** Last six card digits followed by MM and YY of the expiry date. */
  cardVerification: string;
  /** Not needed for link_bank. */
  pin?: string;
}

export interface TransferParams {
  /** 10-digit mobile number or a UPI id (`name@bank`). */
  recipient: string;
  /** Whole currency units; fractional units are not accepted by the remote menu. */
  amount: string;
  remarks: string;
}

export interface ProgressFlags {
  menuSelected: boolean;
  /** Second-level menu: payment method for send_money, change-bank submenu for link_bank. */
  paymentMethodSelected: boolean;
  pinSent: boolean;
  bankSent: boolean;
  cardSent: boolean;
  recipientSent: boolean;
  amountSent: boolean;
  remarksSent: boolean;
}

export type ProgressFlag = keyof ProgressFlags;

export interface Session {
  readonly id: string;
  readonly kind: OperationKind;
  readonly secrets: Readonly<SessionSecrets>;
  readonly transfer?: Readonly<TransferParams>;
  readonly progress: ProgressFlags;
  /** Number of answers given so far, for diagnostics. */
  step: number;
  readonly startedAt: number;
}

export interface SessionHandle {
  readonly id: string;
  readonly kind: OperationKind;
}

export function initialProgress(): ProgressFlags {
  return {
    menuSelected: false,
    paymentMethodSelected: false,
    pinSent: false,
    bankSent: false,
    cardSent: false,
    recipientSent: false,
    amountSent: false,
    remarksSent: false,
  };
}

/** Amount as sent to the remote menu: whole units, fraction dropped. */
export function formatAmount(amount: number): string {
  return Math.trunc(amount).toString();
}

export function createSession(
  kind: OperationKind,
  secrets: SessionSecrets,
  transfer?: { recipient: string; amount: number; remarks?: string },
  now = Date.now(),
): Session {
  return {
    id: genId("sess"),
    kind,
    secrets: { ...secrets },
    transfer: transfer
      ? {
          recipient: transfer.recipient.trim(),
          amount: formatAmount(transfer.amount),
          remarks: transfer.remarks?.trim() || DEFAULT_REMARKS,
        }
      : undefined,
    progress: initialProgress(),
    step: 0,
    startedAt: now,
  };
}

/** Sets a progress flag; flags never revert. */
export function markSent(session: Session, flag: ProgressFlag): void {
  if (session.progress[flag]) return;
  session.progress[flag] = true;
  session.step += 1;
}

/** First four characters of the routing code when available, else the bank's display name. */
export function bankAnswer(secrets: Readonly<SessionSecrets>): string {
  const ifsc = secrets.bankIfsc.trim();
  return ifsc.length >= 4 ? ifsc.slice(0, 4).toUpperCase() : secrets.bankName;
}

export function toHandle(session: Session): SessionHandle {
  return { id: session.id, kind: session.kind };
}
