import { createServer } from './app';
import { CrawlTaskService } from './services/crawlTask.service';
import { loadEnv } from './utils/env';
import { getConfig } from './utils/config';
import { logger } from './utils/logger';

async function bootstrap() {
  loadEnv();
  const config = getConfig();
  const app = createServer(CrawlTaskService.getInstance());

  app.listen(config.port, () => {
    logger.info(`Standards crawl service listening on port ${config.port}`, {
      dataDir: config.dataDir,
      maxConcurrentTasks: config.maxConcurrentTasks,
    });
  });
}

bootstrap().catch((error) => {
  logger.error('Failed to bootstrap application', { error });
  process.exit(1);
});
