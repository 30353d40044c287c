import { pipeline } from 'node:stream/promises';
import { Router } from 'express';
import multer from 'multer';
import type { InteractionPipeline } from '../services/interaction-pipeline.js';
import { ValidationError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { asyncRoute } from './async-route.js';
import { interactionFieldsSchema } from './validation.js';

/**
 * POST /interaction - multipart `session_id` + `audio_file`, answered with
 * an audio/mpeg stream (empty when the wake word was not heard)
 */
export function createInteractionRouter(interactions: InteractionPipeline, maxUploadBytes: number): Router {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes, files: 1 },
  });

  router.post(
    '/interaction',
    upload.single('audio_file'),
    asyncRoute(async (req, res) => {
      const { session_id: sessionId } = interactionFieldsSchema.parse(req.body ?? {});
      if (!req.file) {
        throw new ValidationError('audio_file is required');
      }

      // Stop speech download when the caller goes away
      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableFinished) controller.abort();
      });

      const result = await interactions.process(
        sessionId,
        {
          data: req.file.buffer,
          filename: req.file.originalname,
          contentType: req.file.mimetype,
        },
        { signal: controller.signal },
      );

      res.status(200);
      res.setHeader('Content-Type', 'audio/mpeg');
      res.setHeader('X-Transcript-Id', String(result.transcript.id));

      try {
        await pipeline(result.audio, res);
      } catch (error) {
        logger.warn(`Audio stream for transcript ${result.transcript.id} ended early: ${errorMessage(error)}`);
      }
    }),
  );

  return router;
}
