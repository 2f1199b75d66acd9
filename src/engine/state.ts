import { createHash } from "node:crypto";

/**
 * Deduplication and timing state of one engine. Reset whenever a session starts
 * or ends; only one session is active at a time.
 */
export interface EngineState {
  /** Fingerprint of the last turn whose answer was injected. */
  lastRespondedFingerprint: string | null;
  /** Fingerprint of the turn currently on screen. */
  currentFingerprint: string | null;
  currentText: string | null;
  lastEventAt: number;
  lastSubmitAt: number;
  isSubmitting: boolean;
  isStabilized: boolean;
}

export function createEngineState(): EngineState {
  return {
    lastRespondedFingerprint: null,
    currentFingerprint: null,
    currentText: null,
    lastEventAt: 0,
    lastSubmitAt: 0,
    isSubmitting: false,
    isStabilized: false,
  };
}

export function resetEngineState(state: EngineState): void {
  Object.assign(state, createEngineState());
}

export function normalizeTurnText(text: string): string {
  return text.trim().normalize("NFC");
}

export function fingerprint(text: string): string {
  return createHash("sha256").update(normalizeTurnText(text)).digest("hex").slice(0, 16);
}
