import { Router } from 'express';
import { StandardController } from '../controllers/standard.controller';

export function createStandardRouter(controller = new StandardController()): Router {
  const router = Router();

  router.post('/search', controller.handleSearch.bind(controller));
  router.post('/batch-search', controller.handleBatchSearch.bind(controller));
  router.get('/status/:taskId', controller.getStatus.bind(controller));
  router.get('/results/:taskId', controller.getResults.bind(controller));
  router.get('/download/:taskId', controller.download.bind(controller));
  router.get('/history', controller.getHistory.bind(controller));

  return router;
}
