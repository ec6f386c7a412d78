/**
 * Maps a descriptive filing label to its SEC form code, e.g. `"Proxy Statements (DEF 14A)" -> "DEF 14A"`.
 */
export type FilingTypeMap = Record<string, string>;

export type FilingDownloadStatus = "downloaded" | "failed";

export type FilingDownloadOutcome = {
  ticker: string;
  description: string;
  formType: string;
  status: FilingDownloadStatus;
  fileCount: number;
  reason?: string;
};

export type EdgarIdentity = {
  companyName: string;
  email: string;
};
