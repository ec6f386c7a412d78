import { mkdir } from "node:fs/promises";
import { err, ok, type Result } from "neverthrow";
import type { Logger } from "pino";
import { z } from "zod";
import type {
  BronzeError,
  ConfigInvalidError,
} from "../../../core/entities/appError";
import type {
  EdgarIdentity,
  FilingDownloadOutcome,
} from "../../../core/entities/filing";
import type {
  FilingsDownloadPort,
  FilingsDownloadRequest,
} from "../../../core/ports/inboundPorts";
import type {
  FilingDownloaderFactory,
  FilingDownloaderPort,
} from "../../../core/ports/outboundPorts";
import type { SecEdgarSourceConfig } from "../../../shared/config/env";
import { getBronzeLogger } from "../../../shared/logger/logger";

export const SEC_EDGAR_NAME_VARIABLE = "SEC_EDGAR_NAME";
export const SEC_EDGAR_EMAIL_VARIABLE = "SEC_EDGAR_EMAIL";

const emailSchema = z.string().trim().email();

const configInvalid = (
  variable: string,
  message: string,
): ConfigInvalidError => ({
  source: "sec-edgar",
  code: "config_invalid",
  variable,
  message,
});

export const validateCompanyName = (
  name: string,
): Result<string, ConfigInvalidError> => {
  if (!name) {
    return err(
      configInvalid(
        SEC_EDGAR_NAME_VARIABLE,
        `${SEC_EDGAR_NAME_VARIABLE} environment variable required`,
      ),
    );
  }

  const trimmed = name.trim();
  if (!trimmed) {
    return err(
      configInvalid(SEC_EDGAR_NAME_VARIABLE, "Company name cannot be empty"),
    );
  }

  return ok(trimmed);
};

export const validateEmailAddress = (
  email: string,
): Result<string, ConfigInvalidError> => {
  if (!email) {
    return err(
      configInvalid(
        SEC_EDGAR_EMAIL_VARIABLE,
        `${SEC_EDGAR_EMAIL_VARIABLE} environment variable required`,
      ),
    );
  }

  const parsed = emailSchema.safeParse(email);
  if (!parsed.success) {
    return err(
      configInvalid(SEC_EDGAR_EMAIL_VARIABLE, `Invalid email address: ${email}`),
    );
  }

  return ok(parsed.data);
};

export type SecEdgarFilingsConfig = Pick<
  SecEdgarSourceConfig,
  "companyName" | "email" | "downloadDir"
>;

/**
 * Validates the EDGAR identity, then hands every (ticker, form) pair to the
 * downloader collaborator. Per-pair failures are logged and absorbed.
 */
export class SecEdgarFilings implements FilingsDownloadPort {
  constructor(
    private readonly config: SecEdgarFilingsConfig,
    private readonly createDownloader: FilingDownloaderFactory,
    private readonly logger: Logger = getBronzeLogger(),
  ) {}

  async getDownloader(): Promise<Result<FilingDownloaderPort, BronzeError>> {
    const identity = validateCompanyName(this.config.companyName).andThen(
      (companyName) =>
        validateEmailAddress(this.config.email).map(
          (email): EdgarIdentity => ({ companyName, email }),
        ),
    );

    if (identity.isErr()) {
      this.logger.fatal(
        { variable: identity.error.variable },
        `Configuration error: ${identity.error.message}`,
      );
      return err(identity.error);
    }

    try {
      await mkdir(this.config.downloadDir, { recursive: true });
    } catch (error) {
      const failure: ConfigInvalidError = {
        source: "sec-edgar",
        code: "config_invalid",
        message: `Could not create download directory ${this.config.downloadDir}`,
        cause: error,
      };
      this.logger.fatal({ error }, failure.message);
      return err(failure);
    }

    this.logger.info("Creating SEC downloader with valid credentials");
    return ok(this.createDownloader(identity.value, this.config.downloadDir));
  }

  async downloadFilings(
    request: FilingsDownloadRequest,
  ): Promise<Result<FilingDownloadOutcome[], BronzeError>> {
    const downloader = await this.getDownloader();
    if (downloader.isErr()) {
      return err(downloader.error);
    }

    const limit = request.filingsPerTicker;
    const outcomes: FilingDownloadOutcome[] = [];

    for (const ticker of request.tickers) {
      this.logger.info({ ticker }, `Processing ticker: ${ticker}`);

      for (const [description, formType] of Object.entries(
        request.filingTypes,
      )) {
        this.logger.info(
          { ticker, formType, limit },
          `Downloading ${description} filings for ${ticker} (limit: ${limit})...`,
        );

        try {
          const fileCount = await downloader.value.get(formType, ticker, {
            limit,
          });
          this.logger.info(
            { ticker, formType, fileCount },
            `Successfully downloaded ${fileCount} ${description} filings for ${ticker}.`,
          );
          outcomes.push({
            ticker,
            description,
            formType,
            status: "downloaded",
            fileCount,
          });
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          this.logger.error(
            { ticker, formType, code: "download_failure" },
            `Error downloading ${description} filings for ${ticker}: ${reason}`,
          );
          outcomes.push({
            ticker,
            description,
            formType,
            status: "failed",
            fileCount: 0,
            reason,
          });
        }
      }
    }

    return ok(outcomes);
  }
}
