import { findMenuOption, hasNumberedOptions } from "./menu.js";
import { bankAnswer, markSent, type OperationKind, type ProgressFlag, type Session } from "./session.js";
import { MENU_KEYWORDS, PROMPT_KEYWORDS, containsAny } from "./vocabulary.js";

/** A stabilized turn as the cascade sees it. */
export interface TurnView {
  text: string;
  lower: string;
  isMenu: boolean;
}

export function viewTurn(text: string): TurnView {
  return { text, lower: text.toLowerCase(), isMenu: hasNumberedOptions(text) };
}

/**
 * One row of a cascade: which turn shape it applies to, the progress flag that
 * guards it, when it matches, and what to answer.
 */
export interface CascadeRule {
  readonly flag: ProgressFlag;
  readonly shape: "menu" | "field" | "any";
  /** Flag that must already be set, for second-level menus. */
  readonly after?: ProgressFlag;
  readonly matches: (turn: TurnView, session: Session) => boolean;
  /** `null` means the rule does not apply after all and the cascade continues. */
  readonly value: (turn: TurnView, session: Session) => string | null;
  /** The remote side already echoes the value; answer nothing for this turn. */
  readonly echoed?: (turn: TurnView, session: Session) => boolean;
}

export interface CascadeDecision {
  field: ProgressFlag;
  value: string;
}

export function isAskingForPin(lower: string): boolean {
  // "last 6 digits of debit card" is a card prompt, not a PIN prompt.
  if (!lower.includes("pin") && isAskingForCard(lower)) return false;
  return (
    containsAny(lower, PROMPT_KEYWORDS.pin) ||
    (lower.includes("enter") && lower.includes("pin") && !lower.includes("upi id"))
  );
}

export function isAskingForBank(lower: string): boolean {
  return containsAny(lower, PROMPT_KEYWORDS.bank);
}

export function isAskingForCard(lower: string): boolean {
  return containsAny(lower, PROMPT_KEYWORDS.card);
}

export function isAskingForRecipient(lower: string): boolean {
  return containsAny(lower, PROMPT_KEYWORDS.recipient);
}

export function isAskingForAmount(lower: string): boolean {
  return containsAny(lower, PROMPT_KEYWORDS.amount);
}

export function isAskingForRemarks(lower: string): boolean {
  return containsAny(lower, PROMPT_KEYWORDS.remarks);
}

export function isMobileNumber(recipient: string): boolean {
  return /^\d{10}$/.test(recipient);
}

export function isUpiId(recipient: string): boolean {
  return recipient.includes("@");
}

/** Payment-method submenu: pick the branch matching the recipient's shape. */
function paymentMethodOption(turn: TurnView, session: Session): string {
  const recipient = session.transfer?.recipient ?? "";
  if (isUpiId(recipient)) return findMenuOption(turn.text, MENU_KEYWORDS.upiId) ?? "3";
  if (isMobileNumber(recipient)) return findMenuOption(turn.text, MENU_KEYWORDS.mobileNumber) ?? "1";
  return "1";
}

const always = (): boolean => true;

const pinRule: CascadeRule = {
  flag: "pinSent",
  shape: "field",
  matches: (turn) => isAskingForPin(turn.lower),
  value: (_turn, session) => session.secrets.pin ?? null,
};

const bankRule = (shape: CascadeRule["shape"]): CascadeRule => ({
  flag: "bankSent",
  shape,
  matches: (turn) => isAskingForBank(turn.lower),
  value: (_turn, session) => bankAnswer(session.secrets),
});

const cardRule = (shape: CascadeRule["shape"]): CascadeRule => ({
  flag: "cardSent",
  shape,
  matches: (turn) => isAskingForCard(turn.lower),
  value: (_turn, session) => session.secrets.cardVerification,
});

const menuRule = (keywords: readonly string[], flag: ProgressFlag = "menuSelected", after?: ProgressFlag): CascadeRule => ({
  flag,
  shape: "menu",
  after,
  matches: always,
  value: (turn) => findMenuOption(turn.text, keywords),
});

export const CASCADES: Readonly<Record<OperationKind, readonly CascadeRule[]>> = {
  balance_check: [menuRule(MENU_KEYWORDS.balance), pinRule, bankRule("field"), cardRule("field")],
  send_money: [
    menuRule(MENU_KEYWORDS.sendMoney),
    {
      flag: "paymentMethodSelected",
      shape: "menu",
      after: "menuSelected",
      matches: (turn) => containsAny(turn.lower, MENU_KEYWORDS.paymentMethodPrompt),
      value: paymentMethodOption,
    },
    pinRule,
    bankRule("field"),
    cardRule("field"),
    {
      flag: "recipientSent",
      shape: "field",
      matches: (turn) => isAskingForRecipient(turn.lower),
      value: (_turn, session) => session.transfer?.recipient ?? null,
      echoed: (turn, session) => !!session.transfer && turn.text.includes(session.transfer.recipient),
    },
    {
      flag: "amountSent",
      shape: "field",
      matches: (turn) => isAskingForAmount(turn.lower),
      value: (_turn, session) => session.transfer?.amount ?? null,
      echoed: (turn, session) => !!session.transfer && turn.text.includes(session.transfer.amount),
    },
    {
      flag: "remarksSent",
      shape: "field",
      matches: (turn) => isAskingForRemarks(turn.lower),
      value: (_turn, session) => session.transfer?.remarks ?? null,
    },
  ],
  link_bank: [
    bankRule("any"),
    cardRule("any"),
    menuRule(MENU_KEYWORDS.profile),
    menuRule(MENU_KEYWORDS.changeBank, "paymentMethodSelected", "menuSelected"),
  ],
};

function shapeFits(rule: CascadeRule, turn: TurnView): boolean {
  if (rule.shape === "any") return true;
  return rule.shape === "menu" ? turn.isMenu : !turn.isMenu;
}

/**
 * Decide what to answer for a stabilized turn. Rules are tried in table order and
 * each fires at most once per session. Sets the matching progress flag.
 */
export function decideResponse(session: Session, text: string): CascadeDecision | null {
  const turn = viewTurn(text);
  for (const rule of CASCADES[session.kind]) {
    if (session.progress[rule.flag]) continue;
    if (rule.after && !session.progress[rule.after]) continue;
    if (!shapeFits(rule, turn) || !rule.matches(turn, session)) continue;
    if (rule.echoed?.(turn, session)) return null;
    const value = rule.value(turn, session);
    if (value === null || value === "") continue;
    markSent(session, rule.flag);
    return { field: rule.flag, value };
  }
  return null;
}
