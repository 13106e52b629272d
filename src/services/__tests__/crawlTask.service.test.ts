import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { BatchRunner, CrawlTaskService, formatTaskId } from '../crawlTask.service';
import { ExportService } from '../export.service';
import { TaskNotCompletedError, TaskNotFoundError, UnsupportedFormatError } from '../../errors/http-error';
import { StandardRecord } from '../../types/standard';
import { getConfig } from '../../utils/config';
import { FakePageDriver } from '../../__tests__/helpers/fake-driver';
import { createInstantPoliteness } from '../../__tests__/helpers/politeness';
import { createGate } from '../../__tests__/helpers/gate';

function record(code: string, extra: Partial<StandardRecord> = {}): StandardRecord {
  return {
    std_code: code,
    std_name: '名称',
    title: `${code} 名称`,
    url: `https://std.samr.gov.cn/gb/search/gbDetailed?id=${code}`,
    status: '现行',
    ...extra,
  };
}

describe('CrawlTaskService', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'std-tasks-'));
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  function setup(runner: Partial<BatchRunner> = {}, options: { maxConcurrentTasks?: number; now?: () => Date } = {}) {
    const driver = new FakePageDriver();
    const openSession = jest.fn(async () => driver);
    const exporter = new ExportService(dataDir);
    const crawler: BatchRunner = {
      collectKeyword: runner.collectKeyword ?? (async () => []),
      batchSearch: runner.batchSearch ?? (async () => []),
    };
    const config = getConfig({
      DATA_DIR: dataDir,
      MAX_CONCURRENT_TASKS: String(options.maxConcurrentTasks ?? 2),
    });
    const service = new CrawlTaskService(config, {
      openSession,
      createCrawler: () => crawler,
      exporter,
      politeness: createInstantPoliteness().politeness,
      now: options.now,
    });
    return { service, driver, openSession, exporter };
  }

  it('runs a single-keyword task to completion and stores a snapshot', async () => {
    const collectKeyword = jest.fn(async () => [record('GB 1'), record('GB 2')]);
    const { service, driver } = setup({ collectKeyword });

    const submitted = service.submitSearch({
      keyword: '食品',
      maxPages: 3,
      filter: { type: 'national', status: 'all' },
      fetchDetails: true,
    });
    expect(submitted.status).toBe('running');
    expect(submitted.progress).toBe(0);

    const done = await service.waitForTask(submitted.taskId);

    expect(collectKeyword).toHaveBeenCalledWith('食品', {
      maxPages: 3,
      filter: { type: 'national', status: 'all' },
      fetchDetails: true,
    });
    expect(done.status).toBe('completed');
    expect(done.progress).toBe(100);
    expect(done.total).toBe(2);
    expect(done.message).toBe('Crawl finished, 2 records collected');
    expect(done.file).toBe(path.join(dataDir, `results_${submitted.taskId}.json`));
    expect(done.finishedAt).toBeDefined();
    expect(driver.closed).toBe(true);

    const saved: unknown = JSON.parse(await fs.readFile(path.join(dataDir, `results_${submitted.taskId}.json`), 'utf-8'));
    expect(saved).toEqual([record('GB 1'), record('GB 2')]);
    expect(service.getResults(submitted.taskId, 1, 20).results).toEqual([record('GB 1'), record('GB 2')]);
  });

  it('marks the task failed and keeps no results when the crawl throws', async () => {
    const { service, driver } = setup({
      collectKeyword: async () => {
        throw new Error('browser crashed');
      },
    });

    const { taskId } = service.submitSearch({ keyword: '食品', maxPages: 1 });
    const done = await service.waitForTask(taskId);

    expect(done.status).toBe('failed');
    expect(done.message).toBe('Crawl failed: browser crashed');
    expect(done.errorMessage).toBe('browser crashed');
    expect(done.total).toBe(0);
    expect(service.getResults(taskId, 1, 20).results).toEqual([]);
    expect(driver.closed).toBe(true);
  });

  it('fails the task when no browser session can be opened', async () => {
    const { service, openSession } = setup();
    openSession.mockRejectedValueOnce(new Error('Executable not found'));

    const { taskId } = service.submitSearch({ keyword: '食品', maxPages: 1 });
    const done = await service.waitForTask(taskId);

    expect(done.status).toBe('failed');
    expect(done.errorMessage).toBe('Executable not found');
  });

  it('fails the task when the snapshot cannot be written', async () => {
    const { service, exporter } = setup({ collectKeyword: async () => [record('GB 1')] });
    jest.spyOn(exporter, 'saveSnapshot').mockRejectedValueOnce(new Error('disk full'));

    const { taskId } = service.submitSearch({ keyword: '食品', maxPages: 1 });
    const done = await service.waitForTask(taskId);

    expect(done.status).toBe('failed');
    expect(done.total).toBe(0);
    expect(service.getResults(taskId, 1, 20).total).toBe(0);
  });

  it('reports keyword progress while a batch runs', async () => {
    const checkpoint = createGate();
    const batchSearch = jest.fn<ReturnType<BatchRunner['batchSearch']>, Parameters<BatchRunner['batchSearch']>>(
      async (_keywords, _options, onProgress) => {
        onProgress?.({ keyword: '饮料', keywordIndex: 1, keywordCount: 2, message: "Searching '饮料' (2/2)" });
        await checkpoint.pass();
        return [record('GB 1', { search_keyword: '食品' }), record('GB 2', { search_keyword: '饮料' })];
      },
    );
    const { service } = setup({ batchSearch });

    const { taskId } = service.submitBatchSearch({ keywords: ['食品', '饮料'], maxPages: 2 });
    await checkpoint.arrived;

    const running = service.getStatus(taskId);
    expect(running.progress).toBe(50);
    expect(running.message).toBe("Searching '饮料' (2/2)");
    expect(() => service.exportResults(taskId, 'json')).toThrow(TaskNotCompletedError);

    checkpoint.release();
    const done = await service.waitForTask(taskId);

    expect(done.status).toBe('completed');
    expect(done.total).toBe(2);
    expect(batchSearch.mock.calls[0][0]).toEqual(['食品', '饮料']);
  });

  it('pages through the results of a task', async () => {
    const listing = Array.from({ length: 45 }, (_, i) => record(`GB ${i + 1}`));
    const { service } = setup({ collectKeyword: async () => listing });

    const { taskId } = service.submitSearch({ keyword: '食品', maxPages: 5 });
    await service.waitForTask(taskId);

    const page = service.getResults(taskId, 2, 20);
    expect(page).toEqual({
      taskId,
      status: 'completed',
      total: 45,
      page: 2,
      pageSize: 20,
      totalPages: 3,
      results: listing.slice(20, 40),
    });
    expect(service.getResults(taskId, 0, 20).page).toBe(1);
    expect(service.getResults(taskId, 9, 20).results).toEqual([]);
  });

  it('exports completed results as CSV over the union of fields', async () => {
    const { service } = setup({
      collectKeyword: async () => [record('GB 1'), record('GB 2', { cn_title: '中文' })],
    });

    const { taskId } = service.submitSearch({ keyword: '食品', maxPages: 1 });
    await service.waitForTask(taskId);
    const payload = service.exportResults(taskId, 'csv');

    expect(payload.filename).toBe(`standards_${taskId}.csv`);
    expect(payload.content.split('\n')[0]).toBe('\ufeffcn_title,status,std_code,std_name,title,url');
    expect(() => service.exportResults(taskId, 'xlsx')).toThrow(UnsupportedFormatError);
  });

  it('rejects lookups of unknown tasks', () => {
    const { service } = setup();

    expect(() => service.getStatus('20200101_000000')).toThrow(TaskNotFoundError);
    expect(() => service.getResults('20200101_000000', 1, 20)).toThrow(TaskNotFoundError);
    expect(() => service.exportResults('20200101_000000', 'json')).toThrow(TaskNotFoundError);
  });

  it('derives task ids from the submission time and keeps them unique', async () => {
    const at = new Date(2026, 9, 18, 10, 15, 0);
    const { service } = setup({}, { now: () => at });

    const first = service.submitSearch({ keyword: 'a', maxPages: 1 });
    const second = service.submitSearch({ keyword: 'b', maxPages: 1 });
    await Promise.all([service.waitForTask(first.taskId), service.waitForTask(second.taskId)]);

    expect(formatTaskId(at)).toBe('20261018_101500');
    expect(first.taskId).toBe('20261018_101500');
    expect(second.taskId).toBe('20261018_101500_2');
    expect(service.listHistory().map((entry) => entry.taskId)).toEqual(['20261018_101500_2', '20261018_101500']);
  });

  it('lists history newest first', async () => {
    let tick = 0;
    const { service } = setup({ collectKeyword: async () => [record('GB 1')] }, {
      now: () => new Date(2026, 9, 18, 9, 0, tick++),
    });

    const older = service.submitSearch({ keyword: '食品', maxPages: 1 });
    const newer = service.submitBatchSearch({ keywords: ['饮料', '乳品'], maxPages: 1 });
    await Promise.all([service.waitForTask(older.taskId), service.waitForTask(newer.taskId)]);

    const history = service.listHistory();
    expect(history.map((entry) => entry.taskId)).toEqual([newer.taskId, older.taskId]);
    expect(history[0].keyword).toBe('饮料, 乳品');
    expect(history[1]).toMatchObject({ keyword: '食品', status: 'completed', total: 1 });
  });

  it('queues tasks beyond the concurrency limit', async () => {
    const checkpoint = createGate();
    const { service, openSession } = setup(
      {
        collectKeyword: async () => {
          await checkpoint.pass();
          return [];
        },
      },
      { maxConcurrentTasks: 1 },
    );

    const first = service.submitSearch({ keyword: 'a', maxPages: 1 });
    const second = service.submitSearch({ keyword: 'b', maxPages: 1 });

    expect(first.message).toBe('Starting crawler...');
    expect(second.message).toBe('Waiting for a browser session');

    await checkpoint.arrived;
    expect(openSession).toHaveBeenCalledTimes(1);
    expect(service.getStatus(second.taskId).message).toBe('Waiting for a browser session');

    checkpoint.release();
    await Promise.all([service.waitForTask(first.taskId), service.waitForTask(second.taskId)]);

    expect(openSession).toHaveBeenCalledTimes(2);
    expect(service.getStatus(second.taskId).status).toBe('completed');
  });
});
