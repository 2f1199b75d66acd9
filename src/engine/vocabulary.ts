/** Lowercase keyword sets matched against the carrier's free-text dialog. */

export const PROTOCOL_INDICATORS: readonly string[] = [
  "1.",
  "2.",
  "3.",
  "select option",
  "bank",
  "upi",
  "pin",
  "account",
  "balance",
  "send money",
  "transfer",
  "request money",
  "enter amount",
  "amount",
  "mobile",
  "vpa",
  "success",
  "fail",
  "completed",
  "carrier info",
  "enter your",
  "enter the",
  "debit card",
  "last 6",
  "ifsc",
  "incorrect",
  "invalid",
  "declined",
  "beneficiary",
  "payment address",
];

export const ERROR_KEYWORDS: readonly string[] = [
  "incorrect",
  "invalid",
  "failed",
  "declined",
  "not registered",
  "connection problem",
  "try again",
  "unable to",
  "could not",
  "cannot",
  "blocked",
  "expired",
  "insufficient",
];

export const SUCCESS_KEYWORDS: readonly string[] = ["success", "completed", "balance is", "available balance"];

export const PROMPT_KEYWORDS = {
  pin: ["upi pin", "enter pin", "enter your pin", "m-pin", "mpin", "4 digit", "6 digit"],
  bank: ["enter your bank", "bank's name", "bank ifsc", "first 4 letters"],
  card: ["last 6", "debit card", "card number", "card details"],
  recipient: ["mobile", "vpa", "upi id", "beneficiary", "payee", "enter number", "recipient"],
  amount: ["enter amount", "amount to", "how much"],
  remarks: ["remark", "comment", "note"],
} as const;

export const MENU_KEYWORDS = {
  balance: ["check balance", "bal enq", "balance enquiry", "know balance"],
  sendMoney: ["send money", "transfer", "pay"],
  paymentMethodPrompt: ["send money to", "mobile no", "upi id"],
  upiId: ["upi id", "vpa"],
  mobileNumber: ["mobile no", "mobile number"],
  profile: ["my profile", "profile", "settings", "my account"],
  changeBank: ["change bank", "link bank", "bank account"],
} as const;

export const CONTROL_LABELS = {
  submit: ["Send", "Reply", "OK", "Submit", "Confirm"],
  acknowledge: ["OK", "Dismiss", "Close"],
  dismiss: ["Cancel", "OK", "Close", "Dismiss", "Done"],
} as const;

export function containsAny(lowerText: string, keywords: readonly string[]): boolean {
  return keywords.some((k) => lowerText.includes(k));
}
