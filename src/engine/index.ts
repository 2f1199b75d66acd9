export { SessionEngine, type SessionEngineOptions } from "./engine.js";
export { SnapshotActuator } from "./actuator.js";
export type { SnapshotSource, Dialer } from "./ports.js";
export type { Snapshot, SnapshotNode } from "./snapshot.js";
export { walk, collectTexts, findInputNode, findNodeByLabel, isInputNode } from "./snapshot.js";
export { classifySnapshot, extractMessage, isProtocolContent, type ClassifiedSnapshot } from "./classifier.js";
export { decideResponse, CASCADES, type CascadeDecision, type CascadeRule } from "./cascade.js";
export { parseMenu, findMenuOption, hasNumberedOptions, type MenuItem } from "./menu.js";
export {
  buildOutcome,
  extractBalance,
  extractReferenceId,
  isErrorMessage,
  isSuccessMessage,
  isTerminalMessage,
  type Outcome,
  type OutcomeReason,
} from "./outcome.js";
export {
  createSession,
  formatAmount,
  type OperationKind,
  type ProgressFlag,
  type ProgressFlags,
  type Session,
  type SessionHandle,
  type SessionSecrets,
  type TransferParams,
} from "./session.js";
export { fingerprint, normalizeTurnText, type EngineState } from "./state.js";
export {
  EngineEventBus,
  isEventOf,
  type EngineEvent,
  type EngineEventType,
  type TurnClassification,
  type TurnEvent,
} from "./events.js";
