import { Router } from 'express';

import {
  createMachine,
  createMaterial,
  getMachineDetail,
  getMachineRecommendations,
  getMaterialDetail,
  listCategories,
  listMachines,
  listMaterials,
} from './catalog.controller';

export const createCatalogRouter = () => {
  const router = Router();

  router.get('/materials', listMaterials);
  router.get('/materials/categories', listCategories);
  router.get('/materials/:id', getMaterialDetail);
  router.post('/materials', createMaterial);

  router.get('/machines', listMachines);
  router.get('/machines/recommend', getMachineRecommendations);
  router.get('/machines/:id', getMachineDetail);
  router.post('/machines', createMachine);

  return router;
};
