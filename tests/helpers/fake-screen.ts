import pino from "pino";
import { SnapshotActuator } from "../../src/engine/actuator.js";
import type { Dialer, SnapshotSource } from "../../src/engine/ports.js";
import type { Snapshot, SnapshotNode } from "../../src/engine/snapshot.js";

export const PHONE_APP = "com.android.phone";

export const silentLogger = pino({ level: "silent" });

export interface DialogOptions {
  /** Include a text field. Default true. */
  input?: boolean;
  /** Whether the text field already has focus. Default true. */
  focused?: boolean;
  buttons?: string[];
}

/** A USSD dialog: message lines, an optional text field, then buttons. */
export function dialog(lines: string | string[], opts: DialogOptions = {}): Snapshot {
  const { input = true, focused = true, buttons = ["Cancel", "Send"] } = opts;
  const messages = (Array.isArray(lines) ? lines : [lines]).map((text) => ({ text }));
  const children: SnapshotNode[] = [...messages];
  if (input) children.push({ className: "android.widget.EditText", editable: true, focused, text: "" });
  for (const label of buttons) children.push({ className: "android.widget.Button", text: label, clickable: true });
  return { className: "android.widget.FrameLayout", children };
}

export class FakeScreen implements SnapshotSource {
  snapshot: Snapshot | null = null;
  private readonly listeners = new Set<(sourceId: string) => void>();

  currentSnapshot(): Snapshot | null {
    return this.snapshot;
  }

  onSnapshotChanged(listener: (sourceId: string) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  emit(sourceId = PHONE_APP): void {
    for (const listener of this.listeners) listener(sourceId);
  }

  /** Replace what is on screen and fire one change event. */
  show(lines: string | string[], opts?: DialogOptions): void {
    this.snapshot = dialog(lines, opts);
    this.emit();
  }
}

export type Action =
  | { type: "setText"; text: string }
  | { type: "activate"; label: string }
  | { type: "focus" };

/** Records actions. With a screen, typed text lands in the field and fires a change event, as on a device. */
export class FakeActuator extends SnapshotActuator {
  readonly actions: Action[] = [];
  failSetText = false;

  constructor(private readonly screen?: FakeScreen) {
    super();
  }

  setText(control: SnapshotNode, text: string): void {
    if (this.failSetText) throw new Error("node went stale");
    this.actions.push({ type: "setText", text });
    control.text = text;
    this.screen?.emit();
  }

  activate(control: SnapshotNode): void {
    this.actions.push({ type: "activate", label: control.text ?? control.description ?? "" });
  }

  requestFocus(control: SnapshotNode): void {
    control.focused = true;
    this.actions.push({ type: "focus" });
  }

  get typed(): string[] {
    return this.actions.flatMap((a) => (a.type === "setText" ? [a.text] : []));
  }
}

export class FakeDialer implements Dialer {
  readonly calls: string[] = [];
  failWith: Error | null = null;

  async dial(shortCode: string): Promise<void> {
    this.calls.push(shortCode);
    if (this.failWith) throw this.failWith;
  }
}
