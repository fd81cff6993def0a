import { Router } from 'express';
import { z } from 'zod';
import { asyncHandler, sendAccepted, sendSuccess, validateInput } from '@songharvest/platform-core';
import type { SongListSessionService } from '../../application/services/SongListSessionService';
import type { SongListSession } from '../../domains/sessions/SongListSession';

const SessionParamsSchema = z.object({ userId: z.string().min(1) });
const FieldRequestSchema = z.object({ value: z.string() });

function sessionView(session: SongListSession) {
  return {
    userId: session.userId,
    sessionType: session.sessionType,
    state: session.state,
    isActive: session.isActive,
    draft: session.draft,
    queue: session.queue,
    updatedAt: session.updatedAt.toISOString(),
  };
}

export function createSessionRoutes(sessions: SongListSessionService): Router {
  const router = Router();
  const userOf = (params: unknown) => validateInput(SessionParamsSchema, params, 'Path').userId;

  router.post(
    '/sessions/:userId/start',
    asyncHandler(async (req, res) => {
      sendSuccess(res, sessionView(await sessions.start(userOf(req.params))), 201);
    })
  );

  router.post(
    '/sessions/:userId/field',
    asyncHandler(async (req, res) => {
      const { value } = validateInput(FieldRequestSchema, req.body);
      sendSuccess(res, sessionView(await sessions.submitField(userOf(req.params), value)));
    })
  );

  router.post(
    '/sessions/:userId/event',
    asyncHandler(async (req, res) => {
      sendSuccess(res, sessionView(await sessions.requestEvent(userOf(req.params))));
    })
  );

  router.post(
    '/sessions/:userId/confirm',
    asyncHandler(async (req, res) => {
      sendSuccess(res, sessionView(await sessions.confirm(userOf(req.params))));
    })
  );

  router.post(
    '/sessions/:userId/cancel',
    asyncHandler(async (req, res) => {
      sendSuccess(res, sessionView(await sessions.cancel(userOf(req.params))));
    })
  );

  router.get(
    '/sessions/:userId/queue',
    asyncHandler(async (req, res) => {
      const queue = await sessions.queue(userOf(req.params));
      sendSuccess(res, { queue, count: queue.length });
    })
  );

  router.delete(
    '/sessions/:userId/queue',
    asyncHandler(async (req, res) => {
      sendSuccess(res, sessionView(await sessions.clear(userOf(req.params))));
    })
  );

  router.post(
    '/sessions/:userId/submit',
    asyncHandler(async (req, res) => {
      sendAccepted(res, await sessions.submitQueue(userOf(req.params)));
    })
  );

  return router;
}
