import type pino from "pino";
import type { SessionEngine } from "../engine/engine.js";
import type { Outcome } from "../engine/outcome.js";
import type { Dialer } from "../engine/ports.js";
import type { OperationKind, SessionHandle } from "../engine/session.js";
import type { TransactionStore } from "../records/store.js";
import type { TransactionRecord } from "../records/types.js";
import { DialError, InvalidRequestError, errorMessage } from "../shared/errors.js";
import { getLogger, preview } from "../shared/logging.js";
import { isValidRecipient, toSessionSecrets, validateCredentials } from "./credentials.js";

export type PaymentState =
  | { status: "idle" }
  | { status: "in_progress"; kind: OperationKind; message: string }
  | { status: "success"; kind: OperationKind; message: string; record: TransactionRecord | null }
  | { status: "error"; kind: OperationKind; message: string };

export interface PaymentServiceOptions {
  engine: SessionEngine;
  dialer: Dialer;
  store: TransactionStore;
  /** Defaults to the engine's configured short code. */
  shortCode?: string;
  logger?: pino.Logger;
}

interface PendingOperation {
  handle: SessionHandle;
  recordId: string | null;
}

const STARTING_MESSAGE: Record<OperationKind, string> = {
  balance_check: "Checking balance...",
  send_money: "Sending money...",
  link_bank: "Linking bank account...",
};

/**
 * Starts engine sessions for user requests, dials the short code, and keeps
 * transaction records in step with session outcomes.
 */
export class PaymentService {
  private readonly engine: SessionEngine;
  private readonly dialer: Dialer;
  private readonly store: TransactionStore;
  private readonly shortCode: string;
  private readonly logger: pino.Logger;
  private readonly listeners = new Set<(state: PaymentState) => void>();
  private readonly unsubscribers: Array<() => void>;
  private pending: PendingOperation | null = null;
  private current: PaymentState = { status: "idle" };

  constructor(opts: PaymentServiceOptions) {
    this.engine = opts.engine;
    this.dialer = opts.dialer;
    this.store = opts.store;
    this.shortCode = opts.shortCode ?? opts.engine.config.shortCode;
    this.logger = opts.logger ?? getLogger("payments");
    this.unsubscribers = [
      this.engine.onOutcome((outcome, sessionId) => this.handleOutcome(outcome, sessionId)),
      this.engine.onTurn((turn) => {
        if (this.pending?.handle.id !== turn.sessionId || this.current.status !== "in_progress") return;
        this.setState({ status: "in_progress", kind: this.current.kind, message: turn.preview });
      }),
      this.engine.bus.on("session_cancelled", ({ sessionId, reason }) =>
        this.handleCancelled(sessionId, reason === "superseded" ? "Superseded by a new request" : "Cancelled"),
      ),
    ];
  }

  get state(): PaymentState {
    return this.current;
  }

  onStateChange(listener: (state: PaymentState) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  async checkBalance(credentials: unknown): Promise<SessionHandle> {
    const creds = validateCredentials(credentials);
    const handle = this.engine.startBalanceCheck(toSessionSecrets(creds));
    const record = this.store.saveTransaction({
      type: "balance_check",
      amount: 0,
      recipient: "",
      sessionId: handle.id,
    });
    return this.launch(handle, record.id);
  }

  async sendMoney(credentials: unknown, recipient: string, amount: number, remarks?: string): Promise<SessionHandle> {
    const creds = validateCredentials(credentials);
    const to = recipient.trim();
    if (!isValidRecipient(to)) {
      throw new InvalidRequestError("Recipient must be a UPI id or a 10-digit mobile number");
    }
    if (!Number.isFinite(amount) || Math.trunc(amount) < 1) {
      throw new InvalidRequestError("Amount must be at least 1");
    }
    const handle = this.engine.startSendMoney(toSessionSecrets(creds), to, amount, remarks);
    const record = this.store.saveTransaction({
      type: "send",
      amount: Math.trunc(amount),
      recipient: to,
      sessionId: handle.id,
    });
    return this.launch(handle, record.id);
  }

  /** Change the linked bank account. Creates no transaction record. */
  async linkBank(credentials: unknown): Promise<SessionHandle> {
    const creds = validateCredentials(credentials);
    const handle = this.engine.startLinkBank(toSessionSecrets(creds, { withPin: false }));
    return this.launch(handle, null);
  }

  /** Cancel the running operation; its record is marked failed. */
  cancel(): boolean {
    const pending = this.pending;
    if (!pending) return false;
    return this.engine.cancel(pending.handle);
  }

  dispose(): void {
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.listeners.clear();
  }

  private async launch(handle: SessionHandle, recordId: string | null): Promise<SessionHandle> {
    this.pending = { handle, recordId };
    this.setState({ status: "in_progress", kind: handle.kind, message: STARTING_MESSAGE[handle.kind] });
    this.logger.info({ sessionId: handle.id, kind: handle.kind, shortCode: this.shortCode }, "Dialing");
    try {
      await this.dialer.dial(this.shortCode);
    } catch (err) {
      const message = `Failed to dial ${this.shortCode}: ${errorMessage(err)}`;
      this.logger.error({ err, sessionId: handle.id }, "Dial failed");
      this.engine.cancel(handle);
      if (recordId) this.store.updateTransaction(recordId, { status: "failed", message });
      this.setState({ status: "error", kind: handle.kind, message });
      throw new DialError(message, this.shortCode);
    }
    return handle;
  }

  private handleOutcome(outcome: Outcome, sessionId: string): void {
    const pending = this.pending;
    if (!pending || pending.handle.id !== sessionId) return;
    this.pending = null;
    const kind = pending.handle.kind;

    let record: TransactionRecord | null = null;
    if (pending.recordId) {
      record =
        this.store.updateTransaction(pending.recordId, {
          status: outcome.success ? "success" : "failed",
          message: outcome.finalMessage,
          referenceId: outcome.referenceId,
          balance: outcome.balance,
        }) ?? null;
    }
    if (kind === "balance_check" && outcome.success && outcome.balance !== null) {
      this.store.saveLastBalance(outcome.balance);
    }
    this.logger.info(
      { sessionId, kind, success: outcome.success, reason: outcome.reason, text: preview(outcome.finalMessage) },
      "Operation finished",
    );
    this.setState(
      outcome.success
        ? { status: "success", kind, message: outcome.finalMessage, record }
        : { status: "error", kind, message: outcome.finalMessage },
    );
  }

  private handleCancelled(sessionId: string, message: string): void {
    const pending = this.pending;
    if (!pending || pending.handle.id !== sessionId) return;
    this.pending = null;
    if (pending.recordId) this.store.updateTransaction(pending.recordId, { status: "failed", message });
    this.setState({ status: "idle" });
  }

  private setState(state: PaymentState): void {
    this.current = state;
    for (const listener of this.listeners) {
      try {
        listener(state);
      } catch (err) {
        this.logger.warn({ err }, "State listener failed");
      }
    }
  }
}
