import { collectTexts, type Snapshot } from "./snapshot.js";
import { PROTOCOL_INDICATORS } from "./vocabulary.js";

/** Button captions that belong to the dialog chrome, never to the message. */
const BUTTON_LABELS = new Set(["ok", "cancel", "send", "reply"]);

const GENERIC_WORDS = new Set(["call", "chat", "video", "info", "back", "next", "done"]);

const NUMBERED_ITEM = /^\d+[.)]/;
const DATE_STAMP = /^[a-z]{3} \d{1,2}$/;
const BARE_PHONE_NUMBER = /^\+?\d{2}\s?\d{4,5}\s?\d{4,5}$/;

export interface ClassifiedSnapshot {
  /** Newline-joined message fragments in traversal order, "" when nothing survived filtering. */
  rawText: string;
  isProtocolContent: boolean;
}

/** Strings visible around the dialog (dialer search, contact chips, timestamps). */
export function isUiChrome(fragment: string): boolean {
  const lower = fragment.toLowerCase();
  if (
    lower === "search contacts" ||
    lower === "contacts" ||
    lower.startsWith("search ") ||
    lower === "india" ||
    DATE_STAMP.test(lower)
  ) {
    return true;
  }
  if (BARE_PHONE_NUMBER.test(fragment.trim())) return true;
  if (fragment.length < 5 && !NUMBERED_ITEM.test(fragment) && GENERIC_WORDS.has(lower)) return true;
  return false;
}

export function isMessageFragment(fragment: string): boolean {
  const trimmed = fragment.trim();
  if (!trimmed) return false;
  if (BUTTON_LABELS.has(trimmed.toLowerCase())) return false;
  if (trimmed.length < 3 && !NUMBERED_ITEM.test(trimmed)) return false;
  return !isUiChrome(fragment);
}

export function extractMessage(snapshot: Snapshot | null | undefined): string {
  return collectTexts(snapshot).filter(isMessageFragment).join("\n");
}

export function isProtocolContent(text: string): boolean {
  const lower = text.toLowerCase();
  return PROTOCOL_INDICATORS.some((indicator) => lower.includes(indicator));
}

export function classifySnapshot(snapshot: Snapshot | null | undefined): ClassifiedSnapshot {
  const rawText = extractMessage(snapshot);
  return { rawText, isProtocolContent: rawText !== "" && isProtocolContent(rawText) };
}
