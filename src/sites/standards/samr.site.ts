import { PageDriver, PageElement, PageView } from '../../types/page-driver';
import { StandardStatus, StandardRecord, StandardType } from '../../types/standard';
import { parseStandardTitle, normalizeWhitespace } from '../../utils/standard-title';
import { Result, attempt, fail, ok, describeError } from '../../utils/result';
import { logger } from '../../utils/logger';

const log = logger.child('samr');

export const BASE_URL = 'https://std.samr.gov.cn';
export const SEARCH_URL = `${BASE_URL}/search/std`;
export const DOWNLOAD_URL_TEMPLATE = 'http://c.gb688.cn/bzgk/gb/showGb?type=download&hcno=';

export const RESULTS_FRAME = 'iframe';

export const SELECTORS = {
  resultItem: 'table:has(a[href*="Detailed"])',
  resultLink: 'a[href*="Detailed"]',
  resultCell: 'td',
  totalCount: 'text=为您找到相关结果约',
  nextPage: 'text=下一页',
  primaryTitle: '.page-header h4',
  secondaryTitle: '.page-header h5',
  detailTerm: 'dl dt',
  detailDefinition: 'dl dd',
  documentLink: 'a:has-text("查看文本"), a[href*="hcno"]',
  downloadAffordance: 'text=下载标准',
  previewAffordance: 'text=在线预览',
} as const;

/** Labelled free-text blocks on the detail page and the keys they map to. */
export const PHRASE_FIELDS: ReadonlyArray<{ key: string; phrase: string }> = [
  { key: 'drafting_units', phrase: '起草单位' },
  { key: 'drafters', phrase: '起草人' },
];

export const TYPE_LABELS: Record<Exclude<StandardType, 'all'>, string> = {
  'national-plan': '国家标准计划',
  national: '国家标准',
  industry: '行业标准',
  local: '地方标准',
};

export const STATUS_LABELS: Record<Exclude<StandardStatus, 'all'>, string> = {
  current: '现行',
  withdrawn: '废止',
};

const HCNO_PATTERN = /hcno=([0-9A-F]{32})/i;

export function buildSearchUrl(keyword: string): string {
  return `${SEARCH_URL}?q=${encodeURIComponent(keyword)}`;
}

export function toAbsoluteUrl(href: string): string {
  return href.startsWith('http') ? href : `${BASE_URL}${href.startsWith('/') ? '' : '/'}${href}`;
}

export function extractContentHandle(url: string): string | undefined {
  return url.match(HCNO_PATTERN)?.[1];
}

export function buildDownloadUrl(hcno: string): string {
  return `${DOWNLOAD_URL_TEMPLATE}${hcno}`;
}

export function stripLabel(text: string, phrase: string): string {
  const normalized = normalizeWhitespace(text);
  const index = normalized.indexOf(phrase);
  const rest = index === -1 ? normalized : normalized.slice(index + phrase.length);
  return rest.replace(/^[\s：:]+/, '').trim();
}

export function cleanLabel(text: string): string {
  return normalizeWhitespace(text).replace(/[：:]+$/, '').trim();
}

async function firstText(view: PageView, selector: string, frame?: string): Promise<string> {
  const [element] = await view.findAll(selector, frame ? { frame } : undefined);
  if (!element) {
    throw new Error(`No element matches ${selector}`);
  }
  const text = normalizeWhitespace((await element.text()) ?? '');
  if (!text) {
    throw new Error(`Element ${selector} has no text`);
  }
  return text;
}

/** Clicks the filter option with the given label on the search page. */
export async function selectFilter(driver: PageDriver, label: string): Promise<Result<string>> {
  return attempt(`filter:${label}`, async () => {
    const [option] = await driver.findAll(`text="${label}"`);
    if (!option) {
      throw new Error(`Filter option '${label}' not found`);
    }
    await option.click();
    return label;
  });
}

export async function readTotalCount(driver: PageDriver): Promise<Result<string>> {
  return attempt('total-count', () => firstText(driver, SELECTORS.totalCount, RESULTS_FRAME));
}

export async function parseResultItem(item: PageElement): Promise<Result<StandardRecord>> {
  try {
    const [link] = await item.find(SELECTORS.resultLink);
    if (!link) {
      return fail('result-item', 'missing detail link');
    }

    const rawTitle = (await link.text()) ?? '';
    const href = (await link.attribute('href')) ?? '';
    const title = normalizeWhitespace(rawTitle);
    if (!title || !href) {
      return fail('result-item', 'missing title or href');
    }

    const statusResult = await attempt('result-status', async () => {
      const cells = await item.find(SELECTORS.resultCell);
      const last = cells[cells.length - 1];
      return last ? normalizeWhitespace((await last.text()) ?? '') : '';
    });

    return ok({
      ...parseStandardTitle(title),
      title,
      url: toAbsoluteUrl(href.trim()),
      status: statusResult.ok ? statusResult.value : '',
    });
  } catch (error) {
    return fail('result-item', describeError(error));
  }
}

/** Parses every result entry on the current page, skipping broken ones. */
export async function parseResultPage(driver: PageDriver): Promise<StandardRecord[]> {
  const items = await attempt('result-items', () =>
    driver.findAll(SELECTORS.resultItem, { frame: RESULTS_FRAME }),
  );
  if (!items.ok) {
    log.warn('Failed to read search results', { reason: items.error.reason });
    return [];
  }

  const records: StandardRecord[] = [];
  for (const item of items.value) {
    const parsed = await parseResultItem(item);
    if (parsed.ok) {
      records.push(parsed.value);
    } else {
      log.debug('Skipping result item', { reason: parsed.error.reason });
    }
  }
  return records;
}

export async function findNextPage(driver: PageDriver): Promise<PageElement | undefined> {
  const result = await attempt('next-page', () =>
    driver.findAll(SELECTORS.nextPage, { frame: RESULTS_FRAME }),
  );
  return result.ok ? result.value[0] : undefined;
}

export async function readPrimaryTitle(view: PageView): Promise<Result<string>> {
  return attempt('primary-title', () => firstText(view, SELECTORS.primaryTitle));
}

export async function readSecondaryTitle(view: PageView): Promise<Result<string>> {
  return attempt('secondary-title', () => firstText(view, SELECTORS.secondaryTitle));
}

/** Zips `dt`/`dd` pairs by position; surplus entries on either side are dropped. */
export async function readLabelledValues(view: PageView): Promise<Result<Record<string, string>>> {
  return attempt('labelled-values', async () => {
    const terms = await view.findAll(SELECTORS.detailTerm);
    const definitions = await view.findAll(SELECTORS.detailDefinition);
    const pairs: Record<string, string> = {};
    const count = Math.min(terms.length, definitions.length);

    for (let i = 0; i < count; i++) {
      const label = cleanLabel((await terms[i].text()) ?? '');
      const value = normalizeWhitespace((await definitions[i].text()) ?? '');
      if (label && value) {
        pairs[label] = value;
      }
    }

    return pairs;
  });
}

export async function readPhraseField(view: PageView, phrase: string): Promise<Result<string>> {
  return attempt(`phrase:${phrase}`, async () => {
    const [block] = await view.findAll(`p:has-text("${phrase}")`);
    if (!block) {
      throw new Error(`No block mentions ${phrase}`);
    }
    const value = stripLabel((await block.text()) ?? '', phrase);
    if (!value) {
      throw new Error(`Block for ${phrase} is empty`);
    }
    return value;
  });
}

export async function hasAffordance(view: PageView, selector: string): Promise<boolean> {
  const matches = await attempt(`affordance:${selector}`, () => view.findAll(selector));
  return matches.ok && matches.value.length > 0;
}
