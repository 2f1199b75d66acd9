import { findInputNode, findNodeByLabel, type Snapshot, type SnapshotNode } from "./snapshot.js";

/**
 * Abstract base for input injection on a platform (accessibility actions on
 * Android, a test double in-process). Lookups walk the snapshot depth-first;
 * subclasses implement the three side-effecting actions.
 */
export abstract class SnapshotActuator {
  findInputField(snapshot: Snapshot | null): SnapshotNode | null {
    return findInputNode(snapshot);
  }

  /** Exact, case-insensitive match on text or accessible description. */
  findControlByLabel(snapshot: Snapshot | null, labels: readonly string[]): SnapshotNode | null {
    return findNodeByLabel(snapshot, labels);
  }

  isFocused(control: SnapshotNode): boolean {
    return control.focused === true;
  }

  /** Replace the control's text with `text`. */
  abstract setText(control: SnapshotNode, text: string): void;

  /** Click / tap the control. */
  abstract activate(control: SnapshotNode): void;

  abstract requestFocus(control: SnapshotNode): void;
}
