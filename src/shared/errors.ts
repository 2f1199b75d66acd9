/** The on-screen tree could not be read (stale nodes, no active window). */
export class SnapshotUnavailableError extends Error {
  constructor(message = "Snapshot unavailable") {
    super(message);
    this.name = "SnapshotUnavailableError";
  }
}

/** Thrown when a response cannot be injected or submitted. The session stays active. */
export class ActuationError extends Error {
  constructor(
    message: string,
    readonly stage: "lookup" | "focus" | "inject" | "submit" | "acknowledge" | "dismiss",
  ) {
    super(message);
    this.name = "ActuationError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Caller supplied credentials or transfer parameters that cannot start a session. */
export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestError";
  }
}

export class DialError extends Error {
  constructor(
    message: string,
    readonly shortCode: string,
  ) {
    super(message);
    this.name = "DialError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
