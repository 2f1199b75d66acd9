import { ERROR_KEYWORDS, SUCCESS_KEYWORDS, containsAny } from "./vocabulary.js";

export type OutcomeReason = "completed" | "error" | "timeout";

/** Terminal result of one session. */
export interface Outcome {
  success: boolean;
  reason: OutcomeReason;
  /** Terminal turn text exactly as observed. */
  finalMessage: string;
  referenceId: string | null;
  balance: number | null;
}

export function isErrorMessage(text: string): boolean {
  const lower = text.toLowerCase();
  return (
    containsAny(lower, ERROR_KEYWORDS) ||
    lower.includes("payment address incorrect") ||
    (lower.includes("beneficiary") && lower.includes("incorrect"))
  );
}

/** Error keywords win over success keywords on the same text. */
export function isSuccessMessage(text: string): boolean {
  if (isErrorMessage(text)) return false;
  const lower = text.toLowerCase();
  return containsAny(lower, SUCCESS_KEYWORDS) || (/\brs\b/.test(lower) && lower.includes("balance"));
}

export function isTerminalMessage(text: string): boolean {
  return isErrorMessage(text) || isSuccessMessage(text);
}

const REFERENCE_PATTERNS: readonly RegExp[] = [
  /\b(?:reference|transaction|txn|ref)\s*(?:no|id|number)?\.?[:\s]*([A-Z0-9]*\d[A-Z0-9]*)/i,
  /\b(\d{12,})\b/,
];

export function extractReferenceId(text: string): string | null {
  for (const pattern of REFERENCE_PATTERNS) {
    const match = pattern.exec(text);
    if (match?.[1]) return match[1];
  }
  return null;
}

const BALANCE_PATTERNS: readonly RegExp[] = [
  /\b(?:balance|bal)[:\s]*(?:\brs\.?|\binr)?\s*(\d[\d,]*(?:\.\d+)?)/i,
  /(?:\brs\.?|\binr|₹)\s*(\d[\d,]*(?:\.\d+)?)/i,
  /\bavailable[:\s]*(?:\brs\.?|\binr)?\s*(\d[\d,]*(?:\.\d+)?)/i,
];

export function extractBalance(text: string): number | null {
  for (const pattern of BALANCE_PATTERNS) {
    const match = pattern.exec(text);
    if (!match?.[1]) continue;
    const value = Number.parseFloat(match[1].replace(/,/g, ""));
    if (Number.isFinite(value)) return value;
  }
  return null;
}

export function buildOutcome(finalMessage: string, success: boolean, reason?: OutcomeReason): Outcome {
  return {
    success,
    reason: reason ?? (success ? "completed" : "error"),
    finalMessage,
    referenceId: extractReferenceId(finalMessage),
    balance: success ? extractBalance(finalMessage) : null,
  };
}
