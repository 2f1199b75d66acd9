import { type } from "arktype";
import type { SessionSecrets } from "../engine/session.js";
import { InvalidRequestError } from "../shared/errors.js";

/**
 * What the user sets up once. Stored by the caller (keychain, encrypted file);
 * this package only validates and reads it.
 */
export const UserCredentialsSchema = type({
  upiPin: /^\d{4,6}$/,
  mobileNumber: /^[6-9]\d{9}$/,
  bankName: "string > 0",
  bankIfsc: /^[A-Za-z0-9]{11}$/,
  cardLastSix: /^\d{6}$/,
  cardExpiryMonth: /^\d{2}$/,
  cardExpiryYear: /^\d{2}$/,
});

export type UserCredentials = typeof UserCredentialsSchema.infer;

/** Throws InvalidRequestError naming the first bad field; secrets never appear in the message. */
export function validateCredentials(input: unknown): UserCredentials {
  const out = UserCredentialsSchema(input);
  if (out instanceof type.errors) {
    const fields = [...new Set(out.map((e) => e.path.join(".") || "credentials"))];
    throw new InvalidRequestError(`Invalid credentials: ${fields.join(", ")}`);
  }
  if (!out.bankName.trim()) throw new InvalidRequestError("Invalid credentials: bankName");
  return out;
}

export function isValidCredentials(input: unknown): boolean {
  try {
    validateCredentials(input);
    return true;
  } catch {
    return false;
  }
}

/** Card verification answer: last six digits, then expiry MM and YY. */
export function formatCardDetails(creds: UserCredentials): string {
  return `${creds.cardLastSix}${creds.cardExpiryMonth}${creds.cardExpiryYear}`;
}

export function toSessionSecrets(creds: UserCredentials, opts: { withPin?: boolean } = {}): SessionSecrets {
  const secrets: SessionSecrets = {
    bankIfsc: creds.bankIfsc,
    bankName: creds.bankName,
    cardVerification: formatCardDetails(creds),
  };
  if (opts.withPin !== false) secrets.pin = creds.upiPin;
  return secrets;
}

const UPI_ID = /^[a-zA-Z0-9._-]+@[a-zA-Z0-9]+$/;

export function isValidUpiId(value: string): boolean {
  return UPI_ID.test(value);
}

export function isValidMobileNumber(value: string): boolean {
  return /^[6-9]\d{9}$/.test(value);
}

export function isValidRecipient(value: string): boolean {
  return isValidUpiId(value) || isValidMobileNumber(value);
}
