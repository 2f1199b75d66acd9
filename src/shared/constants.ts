/** Short code that opens the carrier's UPI banking menu. */
export const DEFAULT_SHORT_CODE = "*99#";

/** Applications that host the carrier's USSD dialog. */
export const DEFAULT_SOURCE_IDS = [
  "com.android.phone",
  "com.samsung.android.phone",
  "com.google.android.dialer",
  "com.android.server.telecom",
] as const;

export const DEFAULT_REMARKS = "payment";
