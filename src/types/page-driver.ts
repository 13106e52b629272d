export type WaitPolicy = 'load' | 'domcontentloaded' | 'networkidle';

export interface NavigateOptions {
  waitUntil?: WaitPolicy;
  timeout?: number;
}

export interface FindOptions {
  /** Selector of the iframe the lookup runs in; the first match is used. */
  frame?: string;
}

export interface PageElement {
  text(): Promise<string | null>;
  attribute(name: string): Promise<string | null>;
  click(): Promise<void>;
  find(selector: string): Promise<PageElement[]>;
}

/** A tab that can be read but not driven, e.g. one spawned by a click. */
export interface PageView {
  url(): string;
  findAll(selector: string, options?: FindOptions): Promise<PageElement[]>;
  close(): Promise<void>;
}

/**
 * Browser capability consumed by the crawlers. One driver wraps one session
 * and must only be used by one crawl at a time.
 */
export interface PageDriver extends PageView {
  navigate(url: string, options?: NavigateOptions): Promise<void>;
  waitForNetworkIdle(timeout?: number): Promise<void>;
  /** Clicks `trigger` and resolves with the tab the click opened. */
  openAuxiliary(trigger: PageElement, timeout?: number): Promise<PageView>;
}

export type SessionFactory = () => Promise<PageDriver>;
