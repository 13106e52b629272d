import { Request, Response } from 'express';
import { z } from 'zod';
import { CrawlTaskService } from '../services/crawlTask.service';
import { STATUS_LABELS, TYPE_LABELS } from '../sites/standards/samr.site';
import { getErrorStatus } from '../errors/http-error';
import { logger } from '../utils/logger';

const ALL_LABEL = '全部';

function labelLookup(labels: Record<string, string>): Record<string, string> {
  const lookup: Record<string, string> = { [ALL_LABEL]: 'all' };
  for (const [key, label] of Object.entries(labels)) {
    lookup[label] = key;
  }
  return lookup;
}

const TYPE_BY_LABEL = labelLookup(TYPE_LABELS);
const STATUS_BY_LABEL = labelLookup(STATUS_LABELS);

const fromLabel = (lookup: Record<string, string>) => (value: unknown) =>
  typeof value === 'string' && value in lookup ? lookup[value] : value;

const typeSchema = z.preprocess(
  fromLabel(TYPE_BY_LABEL),
  z.enum(['all', 'national-plan', 'national', 'industry', 'local']),
);

const statusSchema = z.preprocess(
  fromLabel(STATUS_BY_LABEL),
  z.enum(['all', 'current', 'withdrawn']),
);

const crawlOptionsSchema = z.object({
  maxPages: z.number().int().min(1).max(50).default(3),
  type: typeSchema.default('all'),
  status: statusSchema.default('all'),
  fetchDetails: z.boolean().default(false),
});

const keywordSchema = z.string().trim().min(1).max(100);

const searchBodySchema = crawlOptionsSchema.extend({
  keyword: keywordSchema,
});

const batchBodySchema = crawlOptionsSchema.extend({
  keywords: z.array(keywordSchema).min(1).max(50),
});

const resultsQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(100).default(20),
});

const downloadQuerySchema = z.object({
  format: z.string().default('json'),
});

export class StandardController {
  constructor(private readonly crawlTaskService: CrawlTaskService = CrawlTaskService.getInstance()) {}

  getInfo(_req: Request, res: Response) {
    return res.json({
      name: 'Standards crawl API',
      version: '1.0.0',
      endpoints: {
        search: '/api/search',
        batchSearch: '/api/batch-search',
        status: '/api/status/{taskId}',
        results: '/api/results/{taskId}',
        download: '/api/download/{taskId}',
        history: '/api/history',
      },
    });
  }

  async handleSearch(req: Request, res: Response) {
    try {
      const parsed = searchBodySchema.parse(req.body);
      const task = this.crawlTaskService.submitSearch({
        keyword: parsed.keyword,
        maxPages: parsed.maxPages,
        filter: { type: parsed.type, status: parsed.status },
        fetchDetails: parsed.fetchDetails,
      });

      return res.status(202).json({
        taskId: task.taskId,
        status: task.status,
        message: `Crawl task started for keyword: ${parsed.keyword}`,
      });
    } catch (error) {
      return this.handleError(res, error, 'Failed to start crawl task');
    }
  }

  async handleBatchSearch(req: Request, res: Response) {
    try {
      const parsed = batchBodySchema.parse(req.body);
      const task = this.crawlTaskService.submitBatchSearch({
        keywords: parsed.keywords,
        maxPages: parsed.maxPages,
        filter: { type: parsed.type, status: parsed.status },
        fetchDetails: parsed.fetchDetails,
      });

      return res.status(202).json({
        taskId: task.taskId,
        status: task.status,
        message: `Batch crawl task started for ${parsed.keywords.length} keywords`,
      });
    } catch (error) {
      return this.handleError(res, error, 'Failed to start batch crawl task');
    }
  }

  async getStatus(req: Request, res: Response) {
    try {
      const task = this.crawlTaskService.getStatus(req.params.taskId);

      return res.json({
        taskId: task.taskId,
        status: task.status,
        progress: task.progress,
        message: task.message,
        total: task.total,
        keyword: task.keywords.join(', '),
        keywords: task.keywords,
        fetchDetails: task.fetchDetails,
        createdAt: task.createdAt,
        finishedAt: task.finishedAt ?? null,
      });
    } catch (error) {
      return this.handleError(res, error, 'Failed to fetch task status');
    }
  }

  async getResults(req: Request, res: Response) {
    try {
      const query = resultsQuerySchema.parse(req.query);
      return res.json(
        this.crawlTaskService.getResults(req.params.taskId, query.page, query.pageSize),
      );
    } catch (error) {
      return this.handleError(res, error, 'Failed to fetch task results');
    }
  }

  async download(req: Request, res: Response) {
    try {
      const query = downloadQuerySchema.parse(req.query);
      const payload = this.crawlTaskService.exportResults(req.params.taskId, query.format);

      res.attachment(payload.filename);
      res.type(payload.contentType);
      return res.send(payload.content);
    } catch (error) {
      return this.handleError(res, error, 'Failed to export task results');
    }
  }

  async getHistory(_req: Request, res: Response) {
    try {
      return res.json({ history: this.crawlTaskService.listHistory() });
    } catch (error) {
      return this.handleError(res, error, 'Failed to fetch task history');
    }
  }

  private handleError(res: Response, error: unknown, fallback: string) {
    if (error instanceof z.ZodError) {
      return res.status(400).json({
        success: false,
        error: 'Invalid request payload',
        details: error.flatten(),
      });
    }

    const status = getErrorStatus(error);
    if (status) {
      return res.status(status).json({
        success: false,
        error: error instanceof Error ? error.message : fallback,
      });
    }

    logger.error(fallback, error);
    return res.status(500).json({ success: false, error: fallback });
  }
}
