/**
 * Main router index - aggregates the route modules into one API router.
 */

import { Router } from 'express';
import { createTailorRouter, TailorRouteDependencies } from './tailor';
import { createResumeRouter } from './resume';
import type { FileExtractor } from '../../main/fileExtractor';

export interface ApiDependencies extends TailorRouteDependencies {
  fileExtractor?: FileExtractor;
}

export function createApiRouter(deps: ApiDependencies): Router {
  const router = Router();

  router.use('/tailor', createTailorRouter(deps));
  router.use('/resume', createResumeRouter(deps.fileExtractor));

  return router;
}

export { createTailorRouter, createResumeRouter };
