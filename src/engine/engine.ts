import type pino from "pino";
import { resolveEngineConfig, type EngineConfig } from "../config.js";
import { ActuationError, SnapshotUnavailableError, errorMessage } from "../shared/errors.js";
import { getLogger, preview } from "../shared/logging.js";
import type { SnapshotActuator } from "./actuator.js";
import { decideResponse, type CascadeDecision } from "./cascade.js";
import { classifySnapshot, type ClassifiedSnapshot } from "./classifier.js";
import { EngineEventBus, type TurnClassification, type TurnEvent } from "./events.js";
import { buildOutcome, isErrorMessage, isSuccessMessage, type Outcome } from "./outcome.js";
import type { SnapshotSource } from "./ports.js";
import { TimerRegistry } from "./scheduler.js";
import {
  createSession,
  toHandle,
  type OperationKind,
  type Session,
  type SessionHandle,
  type SessionSecrets,
} from "./session.js";
import { createEngineState, fingerprint, resetEngineState, type EngineState } from "./state.js";
import { CONTROL_LABELS } from "./vocabulary.js";

/** Extra wait added when a response is deferred by the minimum submit interval. */
const DEFER_SLACK_MS = 100;

export interface SessionEngineOptions {
  source: SnapshotSource;
  actuator: SnapshotActuator;
  config?: Partial<EngineConfig>;
  bus?: EngineEventBus;
  logger?: pino.Logger;
  now?: () => number;
}

/**
 * Drives one USSD session at a time: watches snapshot changes, waits for each
 * dialog turn to settle, answers it at most once, and reports the outcome.
 *
 * Everything runs on the event loop; waiting is done only with timers from
 * {@link TimerRegistry}, so a superseded wait never fires.
 */
export class SessionEngine {
  readonly bus: EngineEventBus;
  readonly config: EngineConfig;
  private readonly source: SnapshotSource;
  private readonly actuator: SnapshotActuator;
  private readonly logger: pino.Logger;
  private readonly timers: TimerRegistry;
  private readonly now: () => number;
  private readonly state: EngineState = createEngineState();
  private session: Session | null = null;
  private lastTurn: string | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(opts: SessionEngineOptions) {
    this.source = opts.source;
    this.actuator = opts.actuator;
    this.config = resolveEngineConfig(opts.config);
    this.logger = opts.logger ?? getLogger("engine");
    this.bus = opts.bus ?? new EngineEventBus(this.logger);
    this.timers = new TimerRegistry(this.logger);
    this.now = opts.now ?? (() => Date.now());
  }

  /** Start listening to the snapshot feed. Idempotent. */
  attach(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.source.onSnapshotChanged((sourceId) => this.notifySnapshotChanged(sourceId));
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.timers.cancelAll();
  }

  get activeSession(): Readonly<Session> | null {
    return this.session;
  }

  /** Text of the most recent new turn, kept after the session ends for display. */
  get lastTurnText(): string | null {
    return this.lastTurn;
  }

  get engineState(): Readonly<EngineState> {
    return this.state;
  }

  startBalanceCheck(secrets: SessionSecrets): SessionHandle {
    return this.begin(createSession("balance_check", secrets, undefined, this.now()));
  }

  startSendMoney(secrets: SessionSecrets, recipient: string, amount: number, remarks?: string): SessionHandle {
    return this.begin(createSession("send_money", secrets, { recipient, amount, remarks }, this.now()));
  }

  startLinkBank(secrets: SessionSecrets): SessionHandle {
    return this.begin(createSession("link_bank", secrets, undefined, this.now()));
  }

  /**
   * Cancel the active session. With a handle, only that session is cancelled.
   * Returns false when there was nothing to cancel.
   */
  cancel(handle?: SessionHandle): boolean {
    const session = this.session;
    if (!session) return false;
    if (handle && handle.id !== session.id) return false;
    this.clearSession();
    this.logger.info({ sessionId: session.id }, "Session cancelled");
    this.bus.publish({
      type: "session_cancelled",
      payload: { sessionId: session.id, reason: "user", timestamp: this.now() },
    });
    return true;
  }

  onOutcome(listener: (outcome: Outcome, sessionId: string, kind: OperationKind) => void): () => void {
    return this.bus.on("outcome", (payload) => listener(payload.outcome, payload.sessionId, payload.kind));
  }

  onTurn(listener: (turn: TurnEvent) => void): () => void {
    return this.bus.on("turn", listener);
  }

  /** Entry point for the platform's content-changed events. Never throws. */
  notifySnapshotChanged(sourceId: string): void {
    if (!this.config.sourceIds.includes(sourceId)) return;
    try {
      this.onDialogEvent();
    } catch (err) {
      if (err instanceof SnapshotUnavailableError) {
        this.logger.warn({ err }, "Dropped snapshot event");
      } else {
        this.logger.error({ err }, "Snapshot event handling failed");
      }
    }
  }

  private begin(session: Session): SessionHandle {
    const previous = this.session;
    this.clearSession();
    if (previous) {
      this.logger.info({ sessionId: previous.id }, "Session superseded by a new request");
      this.bus.publish({
        type: "session_cancelled",
        payload: { sessionId: previous.id, reason: "superseded", timestamp: this.now() },
      });
    }
    this.session = session;
    this.lastTurn = null;
    this.armTimeout();
    this.logger.info({ sessionId: session.id, kind: session.kind }, "Session started");
    this.bus.publish({
      type: "session_started",
      payload: { sessionId: session.id, kind: session.kind, timestamp: session.startedAt },
    });
    return toHandle(session);
  }

  /** Drops the session and every pending timer, including an in-flight submit. */
  private clearSession(): void {
    this.session = null;
    this.timers.cancelAll();
    resetEngineState(this.state);
  }

  private onDialogEvent(): void {
    const session = this.session;
    if (!session) return;

    const now = this.now();
    if (this.state.lastEventAt > 0 && now - this.state.lastEventAt < this.config.debounceMs) return;
    this.state.lastEventAt = now;

    const classified = this.readSnapshot();
    if (!classified) {
      this.logger.debug("No snapshot available, skipping event");
      return;
    }
    const { rawText, isProtocolContent } = classified;
    if (!rawText) return;
    if (!isProtocolContent) {
      this.logger.debug({ text: preview(rawText, 50) }, "Skipping non-USSD content");
      return;
    }

    const fp = fingerprint(rawText);
    if (fp === this.state.currentFingerprint) {
      if (this.state.isStabilized) return;
      // Same turn still painting: restart the settle window.
      this.scheduleSettle(rawText, fp);
      return;
    }

    // An answer still waiting for focus or for its send click belongs to the old turn.
    const droppedFocus = this.timers.cancel("focus");
    const droppedSubmit = this.timers.cancel("submit");
    if (droppedFocus || droppedSubmit) {
      this.state.isSubmitting = false;
      this.logger.debug({ sessionId: session.id }, "Turn replaced before its answer was sent");
    }
    this.state.currentFingerprint = fp;
    this.state.isStabilized = false;
    this.state.currentText = rawText;
    this.lastTurn = rawText;
    this.armTimeout();
    this.logger.debug({ sessionId: session.id, text: preview(rawText) }, "New dialog detected");

    if (isErrorMessage(rawText)) {
      this.publishTurn(session, rawText, "new_error_terminal");
      this.logger.warn({ sessionId: session.id, text: preview(rawText, 100) }, "Error turn, ending session");
      this.finish(buildOutcome(rawText, false));
      return;
    }
    this.publishTurn(session, rawText, "new_non_terminal");
    this.scheduleSettle(rawText, fp);
  }

  private readSnapshot(): ClassifiedSnapshot | null {
    try {
      const snapshot = this.source.currentSnapshot();
      return snapshot ? classifySnapshot(snapshot) : null;
    } catch (err) {
      throw new SnapshotUnavailableError(errorMessage(err));
    }
  }

  private scheduleSettle(text: string, fp: string): void {
    this.timers.replace("settle", this.config.settleMs, () => {
      this.state.isStabilized = true;
      this.processStabilized(text, fp);
    });
  }

  private processStabilized(text: string, fp: string): void {
    const session = this.session;
    if (!session || fp !== this.state.currentFingerprint) return;

    if (fp === this.state.lastRespondedFingerprint) {
      this.logger.debug({ fingerprint: fp }, "Already responded to this dialog");
      return;
    }
    if (this.state.isSubmitting) {
      this.timers.replace("settle", this.config.cooldownMs, () => this.processStabilized(text, fp));
      return;
    }
    const sinceSubmit = this.now() - this.state.lastSubmitAt;
    if (this.state.lastSubmitAt > 0 && sinceSubmit < this.config.minSubmitIntervalMs) {
      this.logger.debug({ sinceSubmit }, "Too soon since last submit, deferring");
      this.timers.replace(
        "settle",
        this.config.minSubmitIntervalMs - sinceSubmit + DEFER_SLACK_MS,
        () => this.processStabilized(text, fp),
      );
      return;
    }

    if (isSuccessMessage(text)) {
      this.finish(buildOutcome(text, true));
      return;
    }

    const decision = decideResponse(session, text);
    if (!decision) {
      this.logger.debug({ sessionId: session.id, step: session.step }, "No response for this turn");
      return;
    }
    this.logger.info(
      { sessionId: session.id, field: decision.field, step: session.step, length: decision.value.length },
      "Answering turn",
    );
    this.state.isSubmitting = true;
    this.respond(session, decision, fp);
  }

  private respond(session: Session, decision: CascadeDecision, fp: string): void {
    try {
      const snapshot = this.requireSnapshot("lookup");
      const input = this.actuator.findInputField(snapshot);
      if (input) {
        if (!this.actuator.isFocused(input)) {
          this.actuator.requestFocus(input);
          this.timers.replace("focus", this.config.focusRetryMs, () => this.inject(session, decision, fp));
          return;
        }
        this.inject(session, decision, fp);
        return;
      }

      const ack = this.actuator.findControlByLabel(snapshot, CONTROL_LABELS.acknowledge);
      if (ack) {
        this.actuator.activate(ack);
        this.state.lastSubmitAt = this.now();
        this.logger.debug({ sessionId: session.id }, "No input field, acknowledged dialog");
      } else {
        this.logger.warn({ sessionId: session.id }, "No input field or acknowledge control found");
      }
      this.holdCooldown();
    } catch (err) {
      this.actuationFailed(err, "lookup");
    }
  }

  private inject(session: Session, decision: CascadeDecision, fp: string): void {
    if (this.session !== session || fp !== this.state.currentFingerprint) {
      this.logger.debug({ sessionId: session.id }, "Turn changed before injection, dropping answer");
      this.timers.cancel("focus");
      this.state.isSubmitting = false;
      return;
    }
    try {
      const snapshot = this.requireSnapshot("inject");
      const input = this.actuator.findInputField(snapshot);
      if (!input) throw new ActuationError("Input field not found for text injection", "inject");
      this.actuator.setText(input, decision.value);
      this.state.lastRespondedFingerprint = fp;
      this.bus.publish({
        type: "response_sent",
        payload: { sessionId: session.id, field: decision.field, step: session.step, timestamp: this.now() },
      });
      this.timers.replace("submit", this.config.injectionDelayMs, () => this.submit());
    } catch (err) {
      this.actuationFailed(err, "inject");
    }
  }

  private submit(): void {
    try {
      const snapshot = this.requireSnapshot("submit");
      const button = this.actuator.findControlByLabel(snapshot, CONTROL_LABELS.submit);
      if (button) {
        this.actuator.activate(button);
        this.state.lastSubmitAt = this.now();
        this.logger.debug("Clicked send control");
      } else {
        this.logger.warn("Send control not found");
      }
    } catch (err) {
      this.logger.warn({ err }, "Submit failed");
    } finally {
      this.holdCooldown();
    }
  }

  private holdCooldown(): void {
    this.timers.replace("cooldown", this.config.cooldownMs, () => {
      this.state.isSubmitting = false;
      this.logger.debug("Submission lock released");
    });
  }

  private actuationFailed(err: unknown, stage: ActuationError["stage"]): void {
    const error = err instanceof ActuationError ? err : new ActuationError(errorMessage(err), stage);
    this.logger.warn({ err: error, stage: error.stage }, "Actuation failed, waiting for the next turn");
    this.timers.cancel("focus");
    this.timers.cancel("submit");
    this.state.isSubmitting = false;
  }

  private requireSnapshot(stage: ActuationError["stage"]) {
    const snapshot = this.source.currentSnapshot();
    if (!snapshot) throw new ActuationError("Snapshot unavailable", stage);
    return snapshot;
  }

  private finish(outcome: Outcome): void {
    const session = this.session;
    if (!session) return;
    this.clearSession();
    this.logger.info(
      { sessionId: session.id, success: outcome.success, reason: outcome.reason, steps: session.step },
      "Session finished",
    );
    this.timers.replace("dismiss", this.config.dismissDelayMs, () => this.dismissDialog());
    this.bus.publish({ type: "outcome", payload: { sessionId: session.id, kind: session.kind, outcome } });
  }

  private dismissDialog(): void {
    try {
      const snapshot = this.source.currentSnapshot();
      const button = snapshot ? this.actuator.findControlByLabel(snapshot, CONTROL_LABELS.dismiss) : null;
      if (!button) {
        this.logger.debug("No dialog to dismiss");
        return;
      }
      this.actuator.activate(button);
    } catch (err) {
      this.logger.warn({ err: new ActuationError(errorMessage(err), "dismiss") }, "Dismiss failed");
    }
  }

  private armTimeout(): void {
    const ms = this.config.sessionTimeoutMs;
    if (ms <= 0) return;
    this.timers.replace("timeout", ms, () => {
      const seconds = Math.round(ms / 1000);
      this.logger.warn({ sessionId: this.session?.id }, "Session timed out");
      this.finish(buildOutcome(`Session timed out after ${seconds}s without a final message`, false, "timeout"));
    });
  }

  private publishTurn(session: Session, text: string, classification: TurnClassification): void {
    this.bus.publish({
      type: "turn",
      payload: {
        sessionId: session.id,
        text,
        preview: preview(text, this.config.previewLength),
        classification,
        timestamp: this.now(),
      },
    });
  }
}
