export type StandardType = 'all' | 'national-plan' | 'national' | 'industry' | 'local';

export type StandardStatus = 'all' | 'current' | 'withdrawn';

export interface SearchFilter {
  type: StandardType;
  status: StandardStatus;
}

export const DEFAULT_FILTER: SearchFilter = { type: 'all', status: 'all' };

export type GuaranteedField = 'std_code' | 'std_name' | 'title' | 'url' | 'status';

export const GUARANTEED_FIELDS: readonly GuaranteedField[] = [
  'std_code',
  'std_name',
  'title',
  'url',
  'status',
];

/**
 * Extended metadata read from a detail page. Besides the named fields it
 * carries whatever label/value pairs the page lists, so the key set differs
 * between records.
 */
export interface StandardDetail {
  cn_title?: string;
  en_title?: string;
  drafting_units?: string;
  drafters?: string;
  pdf_page_url?: string;
  pdf_download_url?: string;
  has_pdf_download?: string;
  has_online_preview?: string;
  hcno?: string;
  [field: string]: string | undefined;
}

/**
 * One standard entry from the search results, optionally merged with its
 * detail metadata. `search_keyword` is only set by batch crawls.
 */
export interface StandardRecord extends StandardDetail {
  std_code: string;
  std_name: string;
  title: string;
  url: string;
  status: string;
  search_keyword?: string;
}

export interface ParsedTitle {
  std_code: string;
  std_name: string;
}
