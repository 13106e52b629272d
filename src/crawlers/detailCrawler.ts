import { PageDriver } from '../types/page-driver';
import { StandardDetail } from '../types/standard';
import { PolitenessDelay } from '../utils/politeness';
import { Result, attempt, unwrapOr } from '../utils/result';
import { logger } from '../utils/logger';
import {
  PHRASE_FIELDS,
  SELECTORS,
  buildDownloadUrl,
  extractContentHandle,
  hasAffordance,
  readLabelledValues,
  readPhraseField,
  readPrimaryTitle,
  readSecondaryTitle,
} from '../sites/standards/samr.site';

const log = logger.child('detail');

const DETAIL_TIMEOUT = 60_000;
const DETAIL_SETTLE_MS = 2000;

export interface DetailCrawlerOptions {
  timeout?: number;
}

export class DetailCrawler {
  constructor(
    private readonly driver: PageDriver,
    private readonly politeness: PolitenessDelay,
    private readonly options: DetailCrawlerOptions = {},
  ) {}

  /**
   * Reads the detail page at `url`, retrying up to `retryBudget` times while
   * an attempt yields nothing. Resolves with an empty map when every attempt
   * comes back empty; never rejects.
   */
  async fetchDetail(url: string, retryBudget: number): Promise<StandardDetail> {
    const attempts = Math.max(0, Math.floor(retryBudget)) + 1;

    for (let attemptNo = 1; attemptNo <= attempts; attemptNo++) {
      const detail = await this.readDetail(url);
      if (Object.keys(detail).length > 0) {
        return detail;
      }

      if (attemptNo < attempts) {
        const waited = await this.politeness.backoff(attemptNo);
        log.warn('Detail page yielded no data, retrying', { url, attempt: attemptNo, waited });
      }
    }

    log.warn('Giving up on detail page', { url, attempts });
    return {};
  }

  private async readDetail(url: string): Promise<StandardDetail> {
    const loaded = await attempt('navigate', async () => {
      await this.driver.navigate(url, {
        waitUntil: 'networkidle',
        timeout: this.options.timeout ?? DETAIL_TIMEOUT,
      });
      await this.politeness.settle(DETAIL_SETTLE_MS);
    });
    if (!loaded.ok) {
      log.warn('Failed to load detail page', { url, reason: loaded.error.reason });
      return {};
    }

    const detail: StandardDetail = {};

    const primary = await readPrimaryTitle(this.driver);
    assign(detail, 'cn_title', primary);
    assign(detail, 'en_title', await readSecondaryTitle(this.driver));

    const pairs = await readLabelledValues(this.driver);
    Object.assign(detail, unwrapOr(pairs, {}));

    for (const { key, phrase } of PHRASE_FIELDS) {
      assign(detail, key, await readPhraseField(this.driver, phrase));
    }

    if (primary.ok) {
      const links = await this.readDocumentLinks();
      if (links.ok) {
        Object.assign(detail, links.value);
      } else {
        log.debug('No document links on detail page', { url, reason: links.error.reason });
      }
    }

    return detail;
  }

  /** Follows the document viewer link and derives the download URL from its token. */
  private async readDocumentLinks(): Promise<Result<StandardDetail>> {
    return attempt('document-links', async () => {
      const [trigger] = await this.driver.findAll(SELECTORS.documentLink);
      if (!trigger) {
        throw new Error('Document link not found');
      }

      const view = await this.driver.openAuxiliary(trigger, this.options.timeout ?? DETAIL_TIMEOUT);
      try {
        const pageUrl = view.url();
        const links: StandardDetail = { pdf_page_url: pageUrl };
        const hcno = extractContentHandle(pageUrl);
        if (hcno) {
          links.hcno = hcno;
          links.pdf_download_url = buildDownloadUrl(hcno);
        }
        links.has_pdf_download = String(await hasAffordance(view, SELECTORS.downloadAffordance));
        links.has_online_preview = String(await hasAffordance(view, SELECTORS.previewAffordance));
        return links;
      } finally {
        const closed = await attempt('close-view', () => view.close());
        if (!closed.ok) {
          log.warn('Failed to close document tab', { reason: closed.error.reason });
        }
      }
    });
  }
}

function assign(detail: StandardDetail, key: string, result: Result<string>) {
  const value = unwrapOr(result, '');
  if (value) {
    detail[key] = value;
  }
}
