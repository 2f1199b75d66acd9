import type { Snapshot } from "./snapshot.js";

/**
 * Read side of the platform's UI-introspection layer.
 */
export interface SnapshotSource {
  /** `null` when no window is available or the tree went stale. */
  currentSnapshot(): Snapshot | null;
  /**
   * Push feed of content changes. `sourceId` identifies the application that owns
   * the changed window. Returns an unsubscribe function.
   */
  onSnapshotChanged(listener: (sourceId: string) => void): () => void;
}

/** Starts the remote session, by placing a call or through a telephony API. */
export interface Dialer {
  dial(shortCode: string): Promise<void>;
}
