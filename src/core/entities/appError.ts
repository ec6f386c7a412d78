/**
 * Describes canonical failure categories raised at the bronze ingestion boundary.
 */
export type BronzeErrorCode =
  | "missing_credential"
  | "transport_failure"
  | "source_error"
  | "source_throttled"
  | "download_failure"
  | "config_invalid";

export type BronzeSource = "alphavantage" | "fred" | "sec-edgar";

/**
 * Describes a normalized boundary failure while preserving source provenance.
 */
export type BronzeError = {
  source: BronzeSource;
  code: BronzeErrorCode;
  message: string;
  variable?: string;
  httpStatus?: number;
  cause?: unknown;
};

export type MissingCredentialError = BronzeError & {
  code: "missing_credential";
  variable: string;
};

export type ConfigInvalidError = BronzeError & { code: "config_invalid" };

export const missingCredential = (
  source: BronzeSource,
  variable: string,
): MissingCredentialError => ({
  source,
  code: "missing_credential",
  variable,
  message: `${variable} is missing. Please check your environment variables.`,
});
