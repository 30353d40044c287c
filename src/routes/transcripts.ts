import { Router } from 'express';
import type { Config } from '../config.js';
import type { SessionStore } from '../db/session-store.js';
import type { TranscriptStore } from '../db/transcript-store.js';
import { NotFoundError } from '../utils/errors.js';
import { asyncRoute } from './async-route.js';
import { toPageResponse, toTranscriptResponse } from './serializers.js';
import { paginationSchema, transcriptFilterSchema } from './validation.js';

/**
 * GET /transcripts - paginated list, or with ?session_id the newest
 * transcripts of that session up to `limit`
 */
export function createTranscriptRouter(
  sessions: SessionStore,
  transcripts: TranscriptStore,
  pagination: Config['pagination'],
): Router {
  const router = Router();
  const pageQuery = paginationSchema(pagination);

  router.get(
    '/transcripts',
    asyncRoute(async (req, res) => {
      const { limit, offset } = pageQuery.parse(req.query);
      const filter = transcriptFilterSchema.parse(req.query);

      if (filter.session_id) {
        const session = await sessions.getBySessionId(filter.session_id);
        if (!session) {
          throw new NotFoundError('Session not found');
        }

        const items = await transcripts.listBySession(session.id, limit);
        res.json(toPageResponse({ total: items.length, items }, toTranscriptResponse));
        return;
      }

      const page = await transcripts.list(limit, offset);
      res.json(toPageResponse(page, toTranscriptResponse));
    }),
  );

  return router;
}
