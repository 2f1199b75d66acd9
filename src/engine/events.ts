import { EventEmitter } from "node:events";
import type pino from "pino";
import { getLogger } from "../shared/logging.js";
import type { Outcome } from "./outcome.js";
import type { OperationKind, ProgressFlag } from "./session.js";

export type TurnClassification = "ignored" | "new_error_terminal" | "new_non_terminal" | "repeat_non_terminal";

export interface TurnEvent {
  sessionId: string;
  text: string;
  /** `text` shortened for progress displays. */
  preview: string;
  classification: TurnClassification;
  timestamp: number;
}

export type EngineEvent =
  | { type: "session_started"; payload: { sessionId: string; kind: OperationKind; timestamp: number } }
  | { type: "turn"; payload: TurnEvent }
  | { type: "response_sent"; payload: { sessionId: string; field: ProgressFlag; step: number; timestamp: number } }
  | { type: "outcome"; payload: { sessionId: string; kind: OperationKind; outcome: Outcome } }
  | {
      type: "session_cancelled";
      payload: { sessionId: string; reason: "user" | "superseded"; timestamp: number };
    };

export type EngineEventType = EngineEvent["type"];

export function isEventOf<T extends EngineEventType>(
  event: EngineEvent,
  type: T,
): event is Extract<EngineEvent, { type: T }> {
  return event.type === type;
}

/** A listener that throws is logged and skipped; it never stops delivery to the others. */
export class EngineEventBus {
  private readonly emitter = new EventEmitter();
  private readonly logger: pino.Logger;

  constructor(logger?: pino.Logger) {
    this.emitter.setMaxListeners(100);
    this.logger = logger ?? getLogger("events");
  }

  publish(event: EngineEvent): void {
    this.emitter.emit("event", event);
  }

  subscribe(listener: (event: EngineEvent) => void): () => void {
    const guarded = (event: EngineEvent): void => {
      try {
        listener(event);
      } catch (err) {
        this.logger.warn({ err, type: event.type }, "Event listener failed");
      }
    };
    this.emitter.on("event", guarded);
    return () => this.emitter.off("event", guarded);
  }

  /** Subscribe to one event type with a narrowed payload. */
  on<T extends EngineEventType>(
    type: T,
    listener: (payload: Extract<EngineEvent, { type: T }>["payload"]) => void,
  ): () => void {
    return this.subscribe((event) => {
      if (isEventOf(event, type)) listener(event.payload);
    });
  }
}
