import express, { Router, type RequestHandler } from 'express';
import type { RoomService } from '../services/room-service.js';
import { asyncRoute } from './async-route.js';
import { toParticipantResponse, toRoomResponse, toTokenResponse, toWebhookResponse } from './serializers.js';
import { createRoomSchema, tokenRequestSchema } from './validation.js';

/**
 * LiveKit room endpoints:
 *   POST   /livekit/rooms                         - create a room
 *   GET    /livekit/rooms                         - list rooms
 *   DELETE /livekit/rooms/:roomName               - delete a room
 *   GET    /livekit/rooms/:roomName/participants  - list participants
 *   POST   /livekit/token                         - issue an access token
 *
 * 503 when LiveKit is not configured, 500 when LiveKit fails.
 */
export function createLiveKitRouter(rooms: RoomService): Router {
  const router = Router();

  router.post(
    '/livekit/rooms',
    asyncRoute(async (req, res) => {
      const body = createRoomSchema.parse(req.body ?? {});
      const room = await rooms.createRoom(body.room_name, body.empty_timeout);
      res.json(toRoomResponse(room));
    }),
  );

  router.get(
    '/livekit/rooms',
    asyncRoute(async (_req, res) => {
      const list = await rooms.listRooms();
      res.json(list.map(toRoomResponse));
    }),
  );

  router.delete(
    '/livekit/rooms/:roomName',
    asyncRoute(async (req, res) => {
      await rooms.deleteRoom(req.params.roomName);
      res.status(204).end();
    }),
  );

  router.get(
    '/livekit/rooms/:roomName/participants',
    asyncRoute(async (req, res) => {
      const participants = await rooms.listParticipants(req.params.roomName);
      res.json(participants.map(toParticipantResponse));
    }),
  );

  router.post(
    '/livekit/token',
    asyncRoute(async (req, res) => {
      const body = tokenRequestSchema.parse(req.body ?? {});
      const issued = await rooms.createAccessToken({
        roomName: body.room_name,
        participantName: body.participant_name,
        participantIdentity: body.participant_identity,
        ttl: body.ttl,
        metadata: body.metadata,
      });
      res.json(toTokenResponse(issued));
    }),
  );

  return router;
}

/**
 * POST /livekit/webhook. LiveKit signs the raw body, so this handler reads
 * it unparsed and must be mounted ahead of the JSON body parser.
 */
export function createLiveKitWebhookHandlers(rooms: RoomService): RequestHandler[] {
  return [
    express.raw({ type: () => true, limit: '1mb' }),
    asyncRoute(async (req, res) => {
      const body: unknown = req.body;
      const raw = Buffer.isBuffer(body) ? body.toString('utf8') : '';
      const notice = await rooms.receiveWebhook(raw, req.get('authorization'));
      res.json(toWebhookResponse(notice));
    }),
  ];
}
