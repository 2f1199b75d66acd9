import { isValidUpiId } from "./credentials.js";

/** Payee details carried by a `upi://pay?...` link (QR codes). */
export interface UpiPaymentInfo {
  upiId: string;
  name: string;
  amount: number | null;
  note: string;
}

/**
 * Parse `upi://pay?pa=<id>&pn=<name>&am=<amount>&tn=<note>`.
 * Returns null for other schemes or when the payee address is missing or malformed.
 */
export function parseUpiPaymentUrl(url: string): UpiPaymentInfo | null {
  if (!url.startsWith("upi://pay")) return null;
  const query = url.includes("?") ? url.slice(url.indexOf("?") + 1) : "";
  const params = new URLSearchParams(query);
  const upiId = params.get("pa");
  if (!upiId || !isValidUpiId(upiId)) return null;
  const rawAmount = params.get("am");
  const amount = rawAmount ? Number(rawAmount) : NaN;
  return {
    upiId,
    name: params.get("pn") ?? "",
    amount: Number.isFinite(amount) ? amount : null,
    note: params.get("tn") ?? "",
  };
}
