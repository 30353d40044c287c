import { randomUUID } from 'node:crypto';
import { Router } from 'express';
import type { Config } from '../config.js';
import type { SessionStore } from '../db/session-store.js';
import { NotFoundError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { asyncRoute } from './async-route.js';
import { toPageResponse, toSessionResponse } from './serializers.js';
import { createSessionQuerySchema, createSessionSchema, paginationSchema, updateSessionSchema } from './validation.js';

/**
 * Session management:
 *   POST  /sessions             - create (201); user_id in the body or the query
 *   GET   /sessions             - paginated list, newest first
 *   GET   /sessions/:sessionId  - one active session
 *   PATCH /sessions/:sessionId  - update user id / active flag of an active session
 */
export function createSessionRouter(sessions: SessionStore, pagination: Config['pagination']): Router {
  const router = Router();
  const pageQuery = paginationSchema(pagination);

  router.post(
    '/sessions',
    asyncRoute(async (req, res) => {
      const body = createSessionSchema.parse(req.body ?? {});
      const query = createSessionQuerySchema.parse(req.query);
      const session = await sessions.create({
        sessionId: body.session_id ?? randomUUID(),
        userId: body.user_id ?? query.user_id ?? null,
        isActive: true,
      });

      logger.info(`Session created: ${session.sessionId}`, { userId: session.userId });
      res.status(201).json(toSessionResponse(session));
    }),
  );

  router.get(
    '/sessions',
    asyncRoute(async (req, res) => {
      const { limit, offset } = pageQuery.parse(req.query);
      const page = await sessions.list(limit, offset);
      res.json(toPageResponse(page, toSessionResponse));
    }),
  );

  router.get(
    '/sessions/:sessionId',
    asyncRoute(async (req, res) => {
      const session = await sessions.getBySessionId(req.params.sessionId);
      if (!session) {
        throw new NotFoundError('Session not found');
      }
      res.json(toSessionResponse(session));
    }),
  );

  router.patch(
    '/sessions/:sessionId',
    asyncRoute(async (req, res) => {
      const body = updateSessionSchema.parse(req.body ?? {});
      const session = await sessions.getBySessionId(req.params.sessionId);
      if (!session) {
        throw new NotFoundError('Session not found');
      }

      const updated = await sessions.update(session.id, {
        userId: body.user_id,
        isActive: body.is_active,
      });
      if (!updated) {
        throw new NotFoundError('Session not found');
      }
      res.json(toSessionResponse(updated));
    }),
  );

  return router;
}
