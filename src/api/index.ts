import { Router } from 'express';
import { createDiscoveryRouter } from './discoveryRoutes.js';
import type { DiscoveryRouterOptions } from './discoveryRoutes.js';
import type { JobService } from '../services/JobService.js';

/**
 * Main API router - composes all route handlers
 * Dependencies injected from the container
 */
export function createApiRouter(deps: {
  jobService: JobService;
  options: DiscoveryRouterOptions;
}): Router {
  const router = Router();

  router.use('/discoveries', createDiscoveryRouter(deps.jobService, deps.options));

  return router;
}
