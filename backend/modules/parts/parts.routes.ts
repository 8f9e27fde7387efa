import { Router } from 'express';

import {
  getPartAnalyses,
  getPartDetail,
  postCadPart,
  postManualPart,
} from './parts.controller';

export const createPartsRouter = () => {
  const router = Router();

  router.post('/parts', postCadPart);
  router.post('/parts/manual', postManualPart);
  router.get('/parts/:id', getPartDetail);
  router.get('/parts/:id/analyses', getPartAnalyses);

  return router;
};
