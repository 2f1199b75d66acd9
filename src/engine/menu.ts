export interface MenuItem {
  number: string;
  label: string;
}

const ITEM = /^(\d{1,2})[.)]\s*(.*)$/;
/** Splits "1. Send Money 2. Check Balance" rendered on a single line. */
const INLINE_ITEM_BOUNDARY = /\s+(?=\d{1,2}[.)]\s)/;

/** Numbered options in the order they appear. Non-numbered lines are skipped. */
export function parseMenu(text: string): MenuItem[] {
  const items: MenuItem[] = [];
  for (const line of text.split("\n")) {
    for (const segment of line.trim().split(INLINE_ITEM_BOUNDARY)) {
      const match = ITEM.exec(segment.trim());
      if (match) items.push({ number: match[1], label: match[2].trim() });
    }
  }
  return items;
}

export function hasNumberedOptions(text: string): boolean {
  return parseMenu(text).length >= 2;
}

/** Number of the first option whose label contains one of `keywords`, in option order. */
export function findMenuOption(text: string, keywords: readonly string[]): string | null {
  for (const item of parseMenu(text)) {
    const label = item.label.toLowerCase();
    if (keywords.some((k) => label.includes(k))) return item.number;
  }
  return null;
}
