import { Router } from 'express';

import {
  getProjectDetail,
  getProjectParts,
  getProjects,
  postProject,
  putProject,
  removeProject,
} from './projects.controller';

export const createProjectsRouter = () => {
  const router = Router();

  router.get('/projects', getProjects);
  router.post('/projects', postProject);
  router.get('/projects/:id', getProjectDetail);
  router.put('/projects/:id', putProject);
  router.delete('/projects/:id', removeProject);
  router.get('/projects/:id/parts', getProjectParts);

  return router;
};
