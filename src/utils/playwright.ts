import { chromium, Browser, BrowserContext, Locator, Page } from 'playwright-core';
import { BrowserConfig } from './config';
import {
  FindOptions,
  NavigateOptions,
  PageDriver,
  PageElement,
  PageView,
} from '../types/page-driver';

export interface BrowserArtifacts {
  browser: Browser;
  context: BrowserContext;
  page: Page;
}

const DEFAULT_TIMEOUT = 30_000;
const DEFAULT_LOCALE = 'zh-CN';
const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export async function createBrowser(config?: Partial<BrowserConfig>): Promise<BrowserArtifacts> {
  const browser = await chromium.launch({
    headless: config?.headless ?? true,
    executablePath: config?.executablePath,
    channel: config?.channel,
  });

  try {
    const context = await browser.newContext({
      userAgent: config?.userAgent ?? DEFAULT_USER_AGENT,
      locale: DEFAULT_LOCALE,
    });

    const page = await context.newPage();
    page.setDefaultTimeout(config?.timeout ?? DEFAULT_TIMEOUT);

    return { browser, context, page };
  } catch (error) {
    await browser.close();
    throw error;
  }
}

class LocatorElement implements PageElement {
  constructor(private readonly locator: Locator) {}

  text(): Promise<string | null> {
    return this.locator.textContent();
  }

  attribute(name: string): Promise<string | null> {
    return this.locator.getAttribute(name);
  }

  click(): Promise<void> {
    return this.locator.click();
  }

  async find(selector: string): Promise<PageElement[]> {
    const matches = await this.locator.locator(selector).all();
    return matches.map((match) => new LocatorElement(match));
  }
}

class PlaywrightPageView implements PageView {
  constructor(protected readonly page: Page) {}

  url(): string {
    return this.page.url();
  }

  async findAll(selector: string, options?: FindOptions): Promise<PageElement[]> {
    const locator = options?.frame
      ? this.page.locator(options.frame).first().contentFrame().locator(selector)
      : this.page.locator(selector);
    const matches = await locator.all();
    return matches.map((match) => new LocatorElement(match));
  }

  async close(): Promise<void> {
    await this.page.close();
  }
}

class PlaywrightPageDriver extends PlaywrightPageView implements PageDriver {
  constructor(private readonly artifacts: BrowserArtifacts) {
    super(artifacts.page);
  }

  async navigate(url: string, options?: NavigateOptions): Promise<void> {
    await this.page.goto(url, {
      waitUntil: options?.waitUntil ?? 'domcontentloaded',
      timeout: options?.timeout,
    });
  }

  async waitForNetworkIdle(timeout?: number): Promise<void> {
    await this.page.waitForLoadState('networkidle', { timeout });
  }

  async openAuxiliary(trigger: PageElement, timeout?: number): Promise<PageView> {
    const [popup] = await Promise.all([
      this.page.waitForEvent('popup', { timeout }),
      trigger.click(),
    ]);
    await popup.waitForLoadState('domcontentloaded', { timeout });
    return new PlaywrightPageView(popup);
  }

  async close(): Promise<void> {
    const { browser, context, page } = this.artifacts;
    try {
      await page.close();
      await context.close();
    } finally {
      await browser.close();
    }
  }
}

export async function launchPageDriver(config?: Partial<BrowserConfig>): Promise<PageDriver> {
  const artifacts = await createBrowser(config);
  return new PlaywrightPageDriver(artifacts);
}
