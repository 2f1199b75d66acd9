import { type } from "arktype";
import { ConfigError } from "../shared/errors.js";
import { readDataFile } from "../shared/data.js";

const CategorySchema = type({
  id: "string > 0",
  label: "string > 0",
  keywords: "string[]",
});

export type SpendingCategory = typeof CategorySchema.infer;

/** Fallback for payments whose note names no known merchant or purpose. */
export const PERSONAL_TRANSFER: SpendingCategory = {
  id: "personal_transfer",
  label: "Personal Transfer",
  keywords: [],
};

/** Records without any message at all. */
export const OTHER: SpendingCategory = { id: "other", label: "Other", keywords: [] };

let categories: readonly SpendingCategory[] | null = null;

/** Keyword categories in priority order, loaded once from data/categories.json. */
export function spendingCategories(): readonly SpendingCategory[] {
  if (categories) return categories;
  const out = CategorySchema.array()(readDataFile("categories.json"));
  if (out instanceof type.errors) throw new ConfigError(`Invalid category table: ${out.summary}`);
  categories = out;
  return out;
}

/** First category with a keyword contained in `message`, case-insensitively. */
export function categorize(message: string | null | undefined): SpendingCategory {
  if (!message || !message.trim()) return OTHER;
  const lower = message.toLowerCase();
  return spendingCategories().find((c) => c.keywords.some((k) => lower.includes(k))) ?? PERSONAL_TRANSFER;
}
