export {
  UserCredentialsSchema,
  validateCredentials,
  isValidCredentials,
  formatCardDetails,
  toSessionSecrets,
  isValidUpiId,
  isValidMobileNumber,
  isValidRecipient,
  type UserCredentials,
} from "./credentials.js";
export { supportedBanks, findBankByIfsc, BankSchema, type Bank } from "./banks.js";
export { parseUpiPaymentUrl, type UpiPaymentInfo } from "./upi-url.js";
export { PaymentService, type PaymentServiceOptions, type PaymentState } from "./service.js";
