import { PageDriver, SessionFactory } from '../types/page-driver';
import { SearchFilter, DEFAULT_FILTER, StandardRecord } from '../types/standard';
import {
  CrawlHistoryEntry,
  CrawlProgressEvent,
  CrawlResultsPage,
  CrawlTaskMode,
  CrawlTaskParams,
  CrawlTaskRecord,
  CrawlTaskSnapshot,
  ExportPayload,
} from '../types/tasks';
import { BatchCrawler } from '../crawlers/batchCrawler';
import { SearchCrawler } from '../crawlers/searchCrawler';
import { DetailCrawler } from '../crawlers/detailCrawler';
import { ExportService } from './export.service';
import { TaskNotCompletedError, TaskNotFoundError } from '../errors/http-error';
import { CrawlerConfig, getConfig } from '../utils/config';
import { PolitenessDelay } from '../utils/politeness';
import { launchPageDriver } from '../utils/playwright';
import { attempt, describeError } from '../utils/result';
import { logger } from '../utils/logger';

const log = logger.child('tasks');

export type BatchRunner = Pick<BatchCrawler, 'collectKeyword' | 'batchSearch'>;

export type CrawlerFactory = (driver: PageDriver, politeness: PolitenessDelay) => BatchRunner;

export interface CrawlTaskServiceDeps {
  openSession?: SessionFactory;
  createCrawler?: CrawlerFactory;
  exporter?: ExportService;
  politeness?: PolitenessDelay;
  now?: () => Date;
}

export interface SearchSubmission {
  keyword: string;
  maxPages: number;
  filter?: SearchFilter;
  fetchDetails?: boolean;
}

export interface BatchSubmission {
  keywords: string[];
  maxPages: number;
  filter?: SearchFilter;
  fetchDetails?: boolean;
}

interface Completion {
  promise: Promise<void>;
  resolve: () => void;
}

const pad = (value: number) => String(value).padStart(2, '0');

export function formatTaskId(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function createCrawlerFactory(config: CrawlerConfig): CrawlerFactory {
  return (driver, politeness) =>
    new BatchCrawler(
      new SearchCrawler(driver, politeness, { navigationTimeout: config.browser.timeout }),
      new DetailCrawler(driver, politeness, { timeout: config.detail.timeout }),
      politeness,
      {
        enrichLimit: config.detail.enrichLimit,
        retryBudget: config.detail.retryBudget,
        detailJitterMs: config.detail.jitterMs,
      },
    );
}

/**
 * In-memory registry of crawl tasks. Each task runs in the background on its
 * own browser session and is only ever written by its own execution.
 */
export class CrawlTaskService {
  private static instance: CrawlTaskService;

  private readonly tasks = new Map<string, CrawlTaskRecord>();
  private readonly completions = new Map<string, Completion>();
  private readonly queue: string[] = [];
  private active = 0;

  private readonly openSession: SessionFactory;
  private readonly createCrawler: CrawlerFactory;
  private readonly exporter: ExportService;
  private readonly politeness: PolitenessDelay;
  private readonly now: () => Date;

  constructor(private readonly config: CrawlerConfig, deps: CrawlTaskServiceDeps = {}) {
    this.openSession = deps.openSession ?? (() => launchPageDriver(config.browser));
    this.createCrawler = deps.createCrawler ?? createCrawlerFactory(config);
    this.exporter = deps.exporter ?? new ExportService(config.dataDir);
    this.politeness = deps.politeness ?? new PolitenessDelay(config.politeness);
    this.now = deps.now ?? (() => new Date());
  }

  static getInstance(): CrawlTaskService {
    if (!CrawlTaskService.instance) {
      CrawlTaskService.instance = new CrawlTaskService(getConfig());
    }

    return CrawlTaskService.instance;
  }

  submitSearch(submission: SearchSubmission): CrawlTaskSnapshot {
    return this.createTask('single', {
      keywords: [submission.keyword],
      maxPages: submission.maxPages,
      filter: submission.filter ?? DEFAULT_FILTER,
      fetchDetails: submission.fetchDetails ?? false,
    });
  }

  submitBatchSearch(submission: BatchSubmission): CrawlTaskSnapshot {
    return this.createTask('batch', {
      keywords: [...submission.keywords],
      maxPages: submission.maxPages,
      filter: submission.filter ?? DEFAULT_FILTER,
      fetchDetails: submission.fetchDetails ?? false,
    });
  }

  getStatus(taskId: string): CrawlTaskSnapshot {
    return this.snapshot(this.requireTask(taskId));
  }

  getResults(taskId: string, page: number, pageSize: number): CrawlResultsPage {
    const task = this.requireTask(taskId);
    const safePage = Math.max(1, Math.floor(page));
    const safeSize = Math.max(1, Math.floor(pageSize));
    const total = task.results.length;
    const start = (safePage - 1) * safeSize;

    return {
      taskId,
      status: task.status,
      total,
      page: safePage,
      pageSize: safeSize,
      totalPages: Math.ceil(total / safeSize),
      results: task.results.slice(start, start + safeSize),
    };
  }

  exportResults(taskId: string, format: string): ExportPayload {
    const task = this.requireTask(taskId);
    if (task.status !== 'completed') {
      throw new TaskNotCompletedError(taskId, task.status);
    }

    return this.exporter.serialize(taskId, task.results, format);
  }

  listHistory(): CrawlHistoryEntry[] {
    return Array.from(this.tasks.values())
      .reverse()
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .map((task) => ({
        taskId: task.taskId,
        keyword: task.keywords.join(', '),
        keywords: [...task.keywords],
        status: task.status,
        total: task.total,
        createdAt: task.createdAt,
      }));
  }

  /** Resolves with the task's snapshot once it has reached a terminal state. */
  async waitForTask(taskId: string): Promise<CrawlTaskSnapshot> {
    const task = this.requireTask(taskId);
    await this.completions.get(taskId)?.promise;
    return this.snapshot(task);
  }

  private createTask(mode: CrawlTaskMode, params: CrawlTaskParams): CrawlTaskSnapshot {
    const taskId = this.generateTaskId();
    const task: CrawlTaskRecord = {
      ...params,
      taskId,
      mode,
      status: 'running',
      progress: 0,
      message: 'Starting crawler...',
      results: [],
      total: 0,
      createdAt: this.now().toISOString(),
    };

    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((done) => {
      resolve = done;
    });

    this.tasks.set(taskId, task);
    this.completions.set(taskId, { promise, resolve });
    this.queue.push(taskId);
    if (this.active + this.queue.length > this.config.maxConcurrentTasks) {
      task.message = 'Waiting for a browser session';
    }

    log.info('Crawl task created', { taskId, mode, keywords: params.keywords });
    setImmediate(() => this.drain());

    return this.snapshot(task);
  }

  private generateTaskId(): string {
    const base = formatTaskId(this.now());
    let taskId = base;
    for (let suffix = 2; this.tasks.has(taskId); suffix++) {
      taskId = `${base}_${suffix}`;
    }
    return taskId;
  }

  private drain(): void {
    while (this.active < this.config.maxConcurrentTasks && this.queue.length > 0) {
      const taskId = this.queue.shift();
      if (!taskId) {
        continue;
      }
      this.active++;
      void this.execute(taskId);
    }
  }

  private async execute(taskId: string): Promise<void> {
    try {
      await this.runTask(taskId);
    } catch (error) {
      log.error('Task execution failed', { taskId, error });
    } finally {
      this.active--;
      this.completions.get(taskId)?.resolve();
      this.drain();
    }
  }

  private async runTask(taskId: string): Promise<void> {
    const task = this.tasks.get(taskId);
    if (!task) {
      return;
    }

    let session: PageDriver | undefined;
    try {
      task.message = 'Starting browser...';
      session = await this.openSession();

      const crawler = this.createCrawler(session, this.politeness);
      const options = {
        maxPages: task.maxPages,
        filter: task.filter,
        fetchDetails: task.fetchDetails,
      };

      let records: StandardRecord[];
      if (task.mode === 'single') {
        const [keyword] = task.keywords;
        task.message = `Searching: ${keyword}`;
        records = await crawler.collectKeyword(keyword, options);
      } else {
        records = await crawler.batchSearch(task.keywords, options, (event) =>
          this.handleProgress(task, event),
        );
      }

      const file = await this.exporter.saveSnapshot(taskId, records);

      if (task.status === 'running') {
        task.status = 'completed';
        task.progress = 100;
        task.total = records.length;
        task.results = records;
        task.message = `Crawl finished, ${records.length} records collected`;
        task.file = file;
        task.finishedAt = this.now().toISOString();
      }

      log.info('Crawl task completed', { taskId, total: records.length });
    } catch (error) {
      const reason = describeError(error);
      if (task.status === 'running') {
        task.status = 'failed';
        task.message = `Crawl failed: ${reason}`;
        task.errorMessage = reason;
        task.finishedAt = this.now().toISOString();
      }

      log.error('Crawl task failed', { taskId, error: reason });
    } finally {
      if (session) {
        const active = session;
        const closed = await attempt('close-session', () => active.close());
        if (!closed.ok) {
          log.warn('Failed to close browser session', { taskId, reason: closed.error.reason });
        }
      }
    }
  }

  private handleProgress(task: CrawlTaskRecord, event: CrawlProgressEvent): void {
    if (task.status !== 'running') {
      return;
    }
    task.progress = Math.min(99, Math.floor((event.keywordIndex / event.keywordCount) * 100));
    task.message = event.message;
  }

  private requireTask(taskId: string): CrawlTaskRecord {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    return task;
  }

  private snapshot(task: CrawlTaskRecord): CrawlTaskSnapshot {
    const { results: _results, ...rest } = task;
    return {
      ...rest,
      keywords: [...task.keywords],
      filter: { ...task.filter },
    };
  }
}
