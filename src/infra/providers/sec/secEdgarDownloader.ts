import { mkdir, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { z } from "zod";
import type { EdgarIdentity } from "../../../core/entities/filing";
import type {
  FilingDownloadOptions,
  FilingDownloaderPort,
} from "../../../core/ports/outboundPorts";
import type { SecEdgarSourceConfig } from "../../../shared/config/env";
import { HttpJsonClient } from "../../http/httpJsonClient";

const tickerRecordSchema = z.object({
  ticker: z.string(),
  cik_str: z.number().int(),
});

const tickersResponseSchema = z.record(z.string(), z.unknown());

const submissionSchema = z.object({
  filings: z
    .object({
      recent: z
        .object({
          form: z.array(z.string()).default([]),
          accessionNumber: z.array(z.string()).default([]),
          primaryDocument: z.array(z.string()).default([]),
        })
        .optional(),
    })
    .optional(),
});

export type EdgarEndpoints = Pick<
  SecEdgarSourceConfig,
  "baseUrl" | "archivesBaseUrl" | "tickersUrl" | "timeoutMs"
>;

type RecentFiling = {
  accessionNo: string;
  primaryDocument: string;
};

export const DOWNLOAD_ROOT_FOLDER = "sec-edgar-filings";

const asAccessionPathPart = (accessionNo: string): string =>
  accessionNo.replaceAll("-", "");

/**
 * Downloads primary filing documents from EDGAR into
 * `<downloadDir>/sec-edgar-filings/<TICKER>/<FORM>/<accession>/<document>`.
 * Rejects on any failure so the caller decides how to absorb it.
 */
export class SecEdgarDownloader implements FilingDownloaderPort {
  private readonly tickerToCik = new Map<string, string>();
  private readonly userAgent: string;

  constructor(
    identity: EdgarIdentity,
    private readonly downloadDir: string,
    private readonly endpoints: EdgarEndpoints,
    private readonly httpClient = new HttpJsonClient(),
  ) {
    this.userAgent = `${identity.companyName} ${identity.email}`;
  }

  async get(
    formType: string,
    ticker: string,
    options: FilingDownloadOptions,
  ): Promise<number> {
    const symbol = ticker.trim().toUpperCase();
    const form = formType.trim().toUpperCase();

    const cik = await this.resolveCik(symbol);
    const filings = await this.recentFilings(cik, form, options.limit);

    for (const filing of filings) {
      const document = await this.fetchDocument(cik, filing);
      const folder = join(
        this.downloadDir,
        DOWNLOAD_ROOT_FOLDER,
        symbol,
        form,
        filing.accessionNo,
      );
      await mkdir(folder, { recursive: true });
      await writeFile(join(folder, basename(filing.primaryDocument)), document);
    }

    return filings.length;
  }

  /**
   * Caches the ticker map so one downloader run reads it at most once.
   */
  private async resolveCik(symbol: string): Promise<string> {
    const cached = this.tickerToCik.get(symbol);
    if (cached) {
      return cached;
    }

    if (this.tickerToCik.size === 0) {
      const parsed = tickersResponseSchema.safeParse(
        await this.fetchJson(this.endpoints.tickersUrl),
      );
      if (!parsed.success) {
        throw new Error("SEC ticker mapping payload was malformed.");
      }

      for (const value of Object.values(parsed.data)) {
        const record = tickerRecordSchema.safeParse(value);
        if (!record.success) {
          continue;
        }

        const recordTicker = record.data.ticker.trim().toUpperCase();
        if (recordTicker) {
          this.tickerToCik.set(
            recordTicker,
            String(record.data.cik_str).padStart(10, "0"),
          );
        }
      }
    }

    const cik = this.tickerToCik.get(symbol);
    if (!cik) {
      throw new Error(`Ticker ${symbol} was not found in the SEC ticker map.`);
    }

    return cik;
  }

  private async recentFilings(
    cik: string,
    form: string,
    limit: number,
  ): Promise<RecentFiling[]> {
    const url = new URL(`/submissions/CIK${cik}.json`, this.endpoints.baseUrl);
    const parsed = submissionSchema.safeParse(
      await this.fetchJson(url.toString()),
    );
    if (!parsed.success) {
      throw new Error(`SEC submissions payload for CIK ${cik} was malformed.`);
    }

    const recent = parsed.data.filings?.recent;
    const forms = recent?.form ?? [];
    const accessionNumbers = recent?.accessionNumber ?? [];
    const primaryDocuments = recent?.primaryDocument ?? [];

    const results: RecentFiling[] = [];
    for (let index = 0; index < forms.length; index += 1) {
      if (results.length >= limit) {
        break;
      }

      if (forms[index]?.trim().toUpperCase() !== form) {
        continue;
      }

      const accessionNo = accessionNumbers[index]?.trim();
      const primaryDocument = primaryDocuments[index]?.trim();
      if (!accessionNo || !primaryDocument) {
        continue;
      }

      results.push({ accessionNo, primaryDocument });
    }

    return results;
  }

  private async fetchDocument(
    cik: string,
    filing: RecentFiling,
  ): Promise<Uint8Array> {
    const url = `${this.endpoints.archivesBaseUrl}/${Number.parseInt(cik, 10)}/${asAccessionPathPart(filing.accessionNo)}/${filing.primaryDocument}`;
    const response = await this.httpClient.getBytes({
      url,
      timeoutMs: this.endpoints.timeoutMs,
      headers: { "User-Agent": this.userAgent },
    });

    if (response.isErr()) {
      throw new Error(
        `Failed to download ${filing.primaryDocument}: ${response.error.message}`,
      );
    }

    return response.value;
  }

  /**
   * Applies SEC-required headers and timeout handling consistently for all EDGAR requests.
   */
  private async fetchJson(url: string): Promise<unknown> {
    const response = await this.httpClient.getJson({
      url,
      timeoutMs: this.endpoints.timeoutMs,
      headers: {
        "User-Agent": this.userAgent,
        Accept: "application/json",
      },
    });

    if (response.isErr()) {
      throw new Error(`SEC request to ${url} failed: ${response.error.message}`);
    }

    return response.value;
  }
}
