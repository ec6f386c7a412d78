import type { EdgarIdentity } from "../entities/filing";

export type FilingDownloadOptions = {
  limit: number;
};

/**
 * Downloads filings for one ticker and form type. Resolves to the number of
 * files written and rejects on any failure.
 */
export interface FilingDownloaderPort {
  get(
    formType: string,
    ticker: string,
    options: FilingDownloadOptions,
  ): Promise<number>;
}

export type FilingDownloaderFactory = (
  identity: EdgarIdentity,
  downloadDir: string,
) => FilingDownloaderPort;
