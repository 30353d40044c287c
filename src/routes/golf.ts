import { Router } from 'express';
import { getWindConditions, suggestClub } from '../services/golf-advice.js';
import { distanceSchema } from './validation.js';

export function createGolfRouter(): Router {
  const router = Router();

  router.get('/suggest-club/:distance', (req, res) => {
    const { distance } = distanceSchema.parse(req.params);
    res.json(suggestClub(distance));
  });

  router.get('/wind-conditions', (_req, res) => {
    res.json(getWindConditions());
  });

  return router;
}
