import { Router } from 'express';
import { z } from 'zod';
import { asyncHandler, sendAccepted, sendSuccess, validateInput } from '@songharvest/platform-core';
import type { ScrapeJobManager } from '../../application/services/ScrapeJobManager';
import type { ScrapeJob } from '../../domains/jobs/ScrapeJob';

const ScrapeRequestSchema = z.object({
  userId: z.string().min(1),
  songs: z.array(
    z.object({
      title: z.string(),
      artist: z.string(),
      url: z.string(),
      event: z.string().nullish(),
    })
  ),
});

const JobParamsSchema = z.object({ jobId: z.string().min(1) });
const UserParamsSchema = z.object({ userId: z.string().min(1) });

function jobSummary(job: ScrapeJob) {
  return {
    jobId: job.jobId,
    state: job.status,
    totalSongs: job.totalSongs,
    completedSongs: job.completedSongs,
    failedSongs: job.failedSongs,
    downloadUrl: job.status === 'completed' ? job.bundleUri : null,
    error: job.status === 'failed' ? job.errorMessage : null,
    createdAt: job.createdAt.toISOString(),
    completedAt: job.completedAt ? job.completedAt.toISOString() : null,
  };
}

export function createJobRoutes(jobs: ScrapeJobManager): Router {
  const router = Router();

  router.post(
    '/scrape',
    asyncHandler(async (req, res) => {
      const body = validateInput(ScrapeRequestSchema, req.body);
      const result = await jobs.submit(body.userId, body.songs);
      sendAccepted(res, result);
    })
  );

  router.get(
    '/jobs/:jobId',
    asyncHandler(async (req, res) => {
      const { jobId } = validateInput(JobParamsSchema, req.params, 'Path');
      sendSuccess(res, await jobs.publicStatus(jobId));
    })
  );

  router.post(
    '/jobs/:jobId/cancel',
    asyncHandler(async (req, res) => {
      const { jobId } = validateInput(JobParamsSchema, req.params, 'Path');
      sendAccepted(res, await jobs.cancel(jobId));
    })
  );

  router.get(
    '/users/:userId/jobs',
    asyncHandler(async (req, res) => {
      const { userId } = validateInput(UserParamsSchema, req.params, 'Path');
      const list = await jobs.listForUser(userId);
      sendSuccess(res, list.map(jobSummary));
    })
  );

  return router;
}
