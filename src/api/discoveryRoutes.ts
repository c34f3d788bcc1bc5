import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import type { JobService, UploadedFile } from '../services/JobService.js';
import { isJobStatus } from '../domain/entities/Job.js';
import type { JobStatus } from '../domain/entities/Job.js';
import { NotSupportedError, ValidationError } from '../domain/errors.js';
import { mapEventToResponse, mapJobToResponse, statusUrlFor } from './jobMapper.js';

export interface DiscoveryRouterOptions {
  maxUploadBytes: number;
  /** Absolute base for links in responses; derived from the request when unset */
  publicBaseUrl?: string;
}

function pickFile(req: Request, field: string): UploadedFile | null {
  const files = req.files;
  if (!files || Array.isArray(files)) {
    return null;
  }
  const file = files[field]?.[0];
  if (!file) {
    return null;
  }
  return { fileName: file.originalname, mediaType: file.mimetype, content: file.buffer };
}

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${name} query parameter must be given once`);
  }
  return value;
}

function parseStatus(value: string | undefined): JobStatus | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  if (!isJobStatus(value)) {
    throw new ValidationError(`Unknown status: ${value}`);
  }
  return value;
}

function parseLimit(value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError('limit must be a positive integer');
  }
  return limit;
}

function attachmentDisposition(fileName: string): string {
  return `attachment; filename="${fileName.replace(/["\\]/g, '_')}"`;
}

/**
 * Discoveries route handler
 * HTTP layer only: validation of request shape, delegation to JobService
 */
export function createDiscoveryRouter(jobService: JobService, options: DiscoveryRouterOptions): Router {
  const router = Router();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.maxUploadBytes, files: 2 },
  }).fields([
    { name: 'event_log', maxCount: 1 },
    { name: 'configuration', maxCount: 1 },
  ]);

  const baseUrlOf = (req: Request): string =>
    options.publicBaseUrl?.replace(/\/+$/, '') ?? `${req.protocol}://${req.get('host') ?? 'localhost'}`;

  /**
   * POST /discoveries?callback_url=...
   * multipart/form-data: event_log (required), configuration (optional)
   */
  router.post('/', upload, async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (queryString(req, 'email') !== undefined) {
        throw new NotSupportedError('E-mail notifications are not supported; use callback_url');
      }

      const job = await jobService.submit({
        eventLog: pickFile(req, 'event_log'),
        configuration: pickFile(req, 'configuration'),
        callbackUrl: queryString(req, 'callback_url'),
      });

      const statusUrl = statusUrlFor(job, baseUrlOf(req));
      res.status(202).location(statusUrl).json({
        discoveryId: job.id,
        status: job.status,
        statusUrl,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /discoveries?status=...&limit=...
   */
  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const jobs = jobService.listJobs({
        status: parseStatus(queryString(req, 'status')),
        limit: parseLimit(queryString(req, 'limit')),
      });
      const baseUrl = baseUrlOf(req);
      res.json({ discoveries: jobs.map((job) => mapJobToResponse(job, baseUrl)) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /discoveries
   */
  router.delete('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const deletedAmount = await jobService.deleteAllJobs();
      res.json({ deletedAmount });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /discoveries/:id
   */
  router.get('/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      const job = jobService.getJob(req.params.id);
      res.json(mapJobToResponse(job, baseUrlOf(req)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /discoveries/:id/result
   */
  router.get('/:id/result', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const artifact = await jobService.readResult(req.params.id);
      res.setHeader('Content-Disposition', attachmentDisposition(artifact.fileName));
      res.status(200).type(artifact.mediaType).send(artifact.content);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /discoveries/:id/configuration
   */
  router.get('/:id/configuration', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const artifact = await jobService.readConfiguration(req.params.id);
      res.status(200).type(artifact.mediaType).send(artifact.content);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /discoveries/:id/events
   */
  router.get('/:id/events', (req: Request, res: Response, next: NextFunction) => {
    try {
      const events = jobService.listEvents(req.params.id);
      res.json({ discoveryId: req.params.id, events: events.map(mapEventToResponse) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /discoveries/:id
   */
  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await jobService.deleteJob(req.params.id);
      res.json({ discoveryId: req.params.id, status: 'deleted' });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
