import { Router } from 'express';

import {
  getAnalysisDetail,
  getReport,
  postAnalysis,
  postRecalculation,
} from './analysis.controller';

export const createAnalysisRouter = () => {
  const router = Router();

  router.post('/analyses', postAnalysis);
  router.get('/analyses/:id', getAnalysisDetail);
  router.post('/analyses/:id/recalculate', postRecalculation);
  router.get('/analyses/:id/report', getReport);

  return router;
};
