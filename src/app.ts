import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { createStandardRouter } from './routes/standard.route';
import { StandardController } from './controllers/standard.controller';
import { CrawlTaskService } from './services/crawlTask.service';
import { getErrorStatus } from './errors/http-error';
import { logger } from './utils/logger';

export function createServer(crawlTaskService: CrawlTaskService = CrawlTaskService.getInstance()) {
  const app = express();
  const controller = new StandardController(crawlTaskService);

  app.use(cors({
    origin: true,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));

  app.use(express.json({ limit: '1mb' }));

  app.get('/', controller.getInfo.bind(controller));

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', uptime: process.uptime() });
  });

  app.use('/api', createStandardRouter(controller));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = getErrorStatus(err);
    if (status && status < 500) {
      res.status(status).json({ success: false, error: 'Malformed request' });
      return;
    }
    logger.error('Unhandled error', err);
    res.status(500).json({ success: false, error: 'Internal server error' });
  });

  return app;
}
