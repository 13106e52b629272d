import { CrawlProgressCallback } from '../types/tasks';
import {
  DEFAULT_FILTER,
  GUARANTEED_FIELDS,
  SearchFilter,
  StandardDetail,
  StandardRecord,
} from '../types/standard';
import { PolitenessDelay } from '../utils/politeness';
import { logger } from '../utils/logger';

const log = logger.child('batch');

export const DEFAULT_ENRICH_LIMIT = 20;
export const DEFAULT_RETRY_BUDGET = 2;

const LISTING_FIELDS = new Set<string>(GUARANTEED_FIELDS);

export interface RecordSearcher {
  search(keyword: string, maxPages: number, filter?: SearchFilter): Promise<StandardRecord[]>;
}

export interface DetailFetcher {
  fetchDetail(url: string, retryBudget: number): Promise<StandardDetail>;
}

export interface BatchCrawlerOptions {
  enrichLimit?: number;
  retryBudget?: number;
  /** Extra jitter added to the delay after each detail fetch. */
  detailJitterMs?: number;
}

export interface KeywordCrawlOptions {
  maxPages: number;
  filter?: SearchFilter;
  fetchDetails: boolean;
}

export function mergeDetail(record: StandardRecord, detail: StandardDetail): StandardRecord {
  const merged: StandardRecord = { ...record };
  for (const [key, value] of Object.entries(detail)) {
    if (value === undefined || LISTING_FIELDS.has(key)) {
      continue;
    }
    merged[key] = value;
  }
  return merged;
}

export class BatchCrawler {
  private readonly enrichLimit: number;
  private readonly retryBudget: number;
  private readonly detailJitterMs: number;

  constructor(
    private readonly searcher: RecordSearcher,
    private readonly detailFetcher: DetailFetcher,
    private readonly politeness: PolitenessDelay,
    options: BatchCrawlerOptions = {},
  ) {
    this.enrichLimit = options.enrichLimit ?? DEFAULT_ENRICH_LIMIT;
    this.retryBudget = options.retryBudget ?? DEFAULT_RETRY_BUDGET;
    this.detailJitterMs = options.detailJitterMs ?? 1000;
  }

  /** Search one keyword and, when asked, enrich its leading records. */
  async collectKeyword(keyword: string, options: KeywordCrawlOptions): Promise<StandardRecord[]> {
    const records = await this.searcher.search(
      keyword,
      options.maxPages,
      options.filter ?? DEFAULT_FILTER,
    );
    if (!options.fetchDetails) {
      return records;
    }
    return this.enrich(keyword, records);
  }

  async batchSearch(
    keywords: string[],
    options: KeywordCrawlOptions,
    onProgress?: CrawlProgressCallback,
  ): Promise<StandardRecord[]> {
    const aggregate: StandardRecord[] = [];

    for (let i = 0; i < keywords.length; i++) {
      const keyword = keywords[i];
      onProgress?.({
        keyword,
        keywordIndex: i,
        keywordCount: keywords.length,
        message: `Searching '${keyword}' (${i + 1}/${keywords.length})`,
      });

      const records = await this.collectKeyword(keyword, options);
      for (const record of records) {
        aggregate.push({ ...record, search_keyword: keyword });
      }
      log.info(`Collected ${records.length} records for '${keyword}'`, {
        aggregate: aggregate.length,
      });

      if (i < keywords.length - 1) {
        await this.politeness.wait();
      }
    }

    return aggregate;
  }

  private async enrich(keyword: string, records: StandardRecord[]): Promise<StandardRecord[]> {
    const limit = Math.min(records.length, this.enrichLimit);
    const enriched = [...records];

    for (let i = 0; i < limit; i++) {
      const record = enriched[i];
      log.info(`Fetching detail ${i + 1}/${limit} for '${keyword}'`, { url: record.url });
      const detail = await this.detailFetcher.fetchDetail(record.url, this.retryBudget);
      enriched[i] = mergeDetail(record, detail);
      await this.politeness.wait(this.detailJitterMs);
    }

    return enriched;
  }
}
