import { PageDriver } from '../types/page-driver';
import { DEFAULT_FILTER, SearchFilter, StandardRecord } from '../types/standard';
import { PolitenessDelay } from '../utils/politeness';
import { attempt } from '../utils/result';
import { logger } from '../utils/logger';
import {
  STATUS_LABELS,
  TYPE_LABELS,
  buildSearchUrl,
  findNextPage,
  parseResultPage,
  readTotalCount,
  selectFilter,
} from '../sites/standards/samr.site';

const log = logger.child('search');

const RESULTS_SETTLE_MS = 2000;
const FILTER_SETTLE_MS = 1000;
const PAGE_SETTLE_MS = 1000;
const UNKNOWN_TOTAL = '未知';

export interface SearchCrawlerOptions {
  navigationTimeout?: number;
}

/**
 * Walks the result pages of one keyword search. The loop is bounded by
 * `maxPages`; an empty page or a missing next link ends it early.
 */
export class SearchCrawler {
  constructor(
    private readonly driver: PageDriver,
    private readonly politeness: PolitenessDelay,
    private readonly options: SearchCrawlerOptions = {},
  ) {}

  async search(
    keyword: string,
    maxPages: number,
    filter: SearchFilter = DEFAULT_FILTER,
  ): Promise<StandardRecord[]> {
    const records: StandardRecord[] = [];
    if (maxPages < 1) {
      return records;
    }

    const url = buildSearchUrl(keyword);
    log.info(`Searching standards for '${keyword}'`, { url, maxPages, filter });

    await this.driver.navigate(url, { timeout: this.options.navigationTimeout });
    await this.driver.waitForNetworkIdle(this.options.navigationTimeout);
    // results render inside an iframe after the shell page settles
    await this.politeness.settle(RESULTS_SETTLE_MS);

    await this.applyFilter(filter);

    const total = await readTotalCount(this.driver);
    log.info(`Reported result count for '${keyword}'`, {
      total: total.ok ? total.value : UNKNOWN_TOTAL,
    });

    for (let page = 1; page <= maxPages; page++) {
      const pageRecords = await parseResultPage(this.driver);
      if (pageRecords.length === 0) {
        log.info(`No more results for '${keyword}'`, { page });
        break;
      }

      records.push(...pageRecords);
      log.info(`Parsed page ${page} for '${keyword}'`, { count: pageRecords.length });

      if (page >= maxPages) {
        break;
      }

      const next = await findNextPage(this.driver);
      if (!next) {
        break;
      }

      const advanced = await attempt('next-page', async () => {
        await next.click();
        await this.driver.waitForNetworkIdle(this.options.navigationTimeout);
        await this.politeness.settle(PAGE_SETTLE_MS);
      });
      if (!advanced.ok) {
        log.warn(`Failed to open page ${page + 1} for '${keyword}'`, {
          reason: advanced.error.reason,
        });
        break;
      }

      await this.politeness.wait();
    }

    log.info(`Search finished for '${keyword}'`, { records: records.length });
    return records;
  }

  private async applyFilter(filter: SearchFilter): Promise<void> {
    const labels: string[] = [];
    if (filter.type !== 'all') {
      labels.push(TYPE_LABELS[filter.type]);
    }
    if (filter.status !== 'all') {
      labels.push(STATUS_LABELS[filter.status]);
    }

    for (const label of labels) {
      const selected = await selectFilter(this.driver, label);
      if (!selected.ok) {
        log.warn('Failed to apply search filter, continuing unfiltered', {
          label,
          reason: selected.error.reason,
        });
        continue;
      }
      await this.politeness.settle(FILTER_SETTLE_MS);
    }
  }
}
