import { z } from 'zod';
import type { Config } from '../config.js';

export function paginationSchema(pagination: Config['pagination']) {
  return z.object({
    limit: z.coerce.number().int().min(1).max(pagination.maxLimit).default(pagination.defaultLimit),
    offset: z.coerce.number().int().min(0).default(0),
  });
}

export const createSessionSchema = z.object({
  session_id: z.string().trim().min(1).max(255).optional(),
  user_id: z.string().max(255).nullish(),
});

export const createSessionQuerySchema = z.object({
  user_id: z.string().max(255).optional(),
});

export const updateSessionSchema = z.object({
  user_id: z.string().max(255).nullish(),
  is_active: z.boolean().optional(),
});

export const interactionFieldsSchema = z.object({
  session_id: z.string().trim().min(1, 'session_id is required'),
});

export const transcriptFilterSchema = z.object({
  session_id: z.string().trim().min(1).optional(),
});

export const distanceSchema = z.object({
  distance: z.coerce.number().finite(),
});

export const createRoomSchema = z.object({
  room_name: z.string().trim().min(1).max(255),
  empty_timeout: z.number().int().min(0).default(300),
});

export const tokenRequestSchema = z.object({
  room_name: z.string().trim().min(1).max(255),
  participant_name: z.string().min(1).max(255),
  participant_identity: z.string().min(1).max(255).optional(),
  ttl: z.number().int().positive().default(3600),
  metadata: z.string().optional(),
});
