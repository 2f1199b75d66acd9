import { type } from "arktype";
import { ConfigError } from "../shared/errors.js";
import { readDataFile } from "../shared/data.js";

export const BankSchema = type({
  name: "string > 0",
  ifscPrefix: "string == 4",
  shortCode: "string > 0",
});

export type Bank = typeof BankSchema.infer;

const BankListSchema = BankSchema.array();

let banks: readonly Bank[] | null = null;

/** Banks reachable through the USSD service, loaded once from data/banks.json. */
export function supportedBanks(): readonly Bank[] {
  if (banks) return banks;
  const out = BankListSchema(readDataFile("banks.json"));
  if (out instanceof type.errors) throw new ConfigError(`Invalid bank list: ${out.summary}`);
  banks = out;
  return out;
}

/** Bank whose routing prefix matches the first four characters of `ifsc`. */
export function findBankByIfsc(ifsc: string): Bank | undefined {
  const prefix = ifsc.trim().slice(0, 4).toUpperCase();
  if (prefix.length < 4) return undefined;
  return supportedBanks().find((bank) => bank.ifscPrefix === prefix);
}
