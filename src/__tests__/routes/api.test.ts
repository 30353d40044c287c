import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import type { Application } from 'express';
import { ApiServer } from '../../services/api-server.js';
import { InteractionPipeline } from '../../services/interaction-pipeline.js';
import { Transcriber } from '../../services/transcriber.js';
import { AssistantService } from '../../services/assistant-service.js';
import { SpeechSynthesizer } from '../../services/speech-synthesizer.js';
import { RoomService, type RoomApi } from '../../services/room-service.js';
import { TextWakeWordDetector } from '../../providers/wakeword/index.js';
import { createTestStores, fakeAssistant, fakeTTS, type TestStores } from '../helpers.js';

const PREFIX = '/v1/golf-assistant';

const roomApi: RoomApi = {
  createRoom: vi.fn(async ({ name }: { name: string }) => ({
    name,
    sid: 'RM_1',
    emptyTimeout: 300,
    maxParticipants: 0,
    creationTime: BigInt(1700000000),
    metadata: '',
  })),
  deleteRoom: vi.fn(async () => undefined),
  listRooms: vi.fn(async () => []),
  listParticipants: vi.fn(async () => []),
};

describe('golf assistant API', () => {
  let stores: TestStores;
  let app: Application;
  let transcript: string;

  function buildApp(rooms: RoomService): Application {
    const interactions = new InteractionPipeline({
      sessions: stores.sessions,
      transcripts: stores.transcripts,
      transcriber: new Transcriber({
        name: 'fake-stt',
        transcribe: async () => transcript,
        isAvailable: async () => true,
      }),
      wakeWord: new TextWakeWordDetector({ phrase: 'Hey Ceddy' }),
      assistant: new AssistantService(fakeAssistant('Use a 7 iron.')),
      synthesizer: new SpeechSynthesizer(fakeTTS('primary', 'primary-mp3'), fakeTTS('fallback', 'fallback-mp3')),
    });
    const server = new ApiServer(
      { sessions: stores.sessions, transcripts: stores.transcripts, interactions, rooms },
      { port: 0, apiPrefix: '/v1', maxUploadBytes: 1024, pagination: { defaultLimit: 20, maxLimit: 100 } },
    );
    return server.handler;
  }

  beforeEach(() => {
    stores = createTestStores();
    transcript = 'Hey Ceddy, what club for 160 yards?';
    app = buildApp(new RoomService({}));
  });

  afterEach(() => {
    stores.database.close();
  });

  it('reports health', async () => {
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok' });
  });

  it('answers unknown routes with 404', async () => {
    const res = await request(app).get(`${PREFIX}/nowhere`);

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ detail: 'Not found' });
  });

  describe('sessions', () => {
    it('creates a session with a generated id', async () => {
      const res = await request(app).post(`${PREFIX}/sessions`).send({ user_id: 'golfer-1' });

      expect(res.status).toBe(201);
      expect(res.body.session_id).toMatch(/^[0-9a-f-]{36}$/);
      expect(res.body.user_id).toBe('golfer-1');
      expect(res.body.is_active).toBe(true);
    });

    it('takes the user id from the query string', async () => {
      const res = await request(app).post(`${PREFIX}/sessions?user_id=golfer-2`).send({ session_id: 'round-q' });

      expect(res.status).toBe(201);
      expect(res.body.user_id).toBe('golfer-2');
    });

    it('prefers the body user id over the query string', async () => {
      const res = await request(app).post(`${PREFIX}/sessions?user_id=golfer-2`).send({ user_id: 'golfer-1' });

      expect(res.body.user_id).toBe('golfer-1');
    });

    it('rejects a duplicate session id', async () => {
      await request(app).post(`${PREFIX}/sessions`).send({ session_id: 'round-1' });
      const res = await request(app).post(`${PREFIX}/sessions`).send({ session_id: 'round-1' });

      expect(res.status).toBe(409);
      expect(res.body).toEqual({ detail: 'Session round-1 already exists' });
    });

    it('gets and deactivates a session', async () => {
      await request(app).post(`${PREFIX}/sessions`).send({ session_id: 'round-1' });

      const found = await request(app).get(`${PREFIX}/sessions/round-1`);
      const patched = await request(app).patch(`${PREFIX}/sessions/round-1`).send({ is_active: false });
      const gone = await request(app).get(`${PREFIX}/sessions/round-1`);

      expect(found.status).toBe(200);
      expect(found.body.session_id).toBe('round-1');
      expect(patched.status).toBe(200);
      expect(patched.body.is_active).toBe(false);
      expect(gone.status).toBe(404);
      expect(gone.body).toEqual({ detail: 'Session not found' });
    });

    it('does not update an inactive session', async () => {
      await stores.sessions.create({ sessionId: 'old', isActive: false });

      const patched = await request(app).patch(`${PREFIX}/sessions/old`).send({ is_active: true });
      const fetched = await request(app).get(`${PREFIX}/sessions/old`);

      expect(patched.status).toBe(404);
      expect(patched.body).toEqual({ detail: 'Session not found' });
      expect(fetched.status).toBe(404);
      expect((await stores.sessions.getBySessionId('old', { activeOnly: false }))?.isActive).toBe(false);
    });

    it('lists sessions with paging', async () => {
      await request(app).post(`${PREFIX}/sessions`).send({ session_id: 'a' });
      await request(app).post(`${PREFIX}/sessions`).send({ session_id: 'b' });

      const res = await request(app).get(`${PREFIX}/sessions?limit=1&offset=1`);

      expect(res.status).toBe(200);
      expect(res.body.total).toBe(2);
      expect(res.body.items.map((s: { session_id: string }) => s.session_id)).toEqual(['a']);
    });

    it('rejects an out of range limit', async () => {
      const res = await request(app).get(`${PREFIX}/sessions?limit=0`);

      expect(res.status).toBe(400);
      expect(res.body.detail).toBe('Validation failed');
      expect(res.body.errors[0].path).toBe('limit');
    });

    it('rejects malformed JSON', async () => {
      const res = await request(app)
        .post(`${PREFIX}/sessions`)
        .set('Content-Type', 'application/json')
        .send('{"session_id":');

      expect(res.status).toBe(400);
    });
  });

  describe('interaction', () => {
    beforeEach(async () => {
      await request(app).post(`${PREFIX}/sessions`).send({ session_id: 'round-1' });
    });

    it('streams the spoken reply and records the turn', async () => {
      const res = await request(app)
        .post(`${PREFIX}/interaction`)
        .field('session_id', 'round-1')
        .attach('audio_file', Buffer.from('fake-wav'), 'turn.wav')
        .responseType('blob');

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toBe('audio/mpeg');
      expect(res.body.toString()).toBe('primary-mp3');

      const transcripts = await request(app).get(`${PREFIX}/transcripts?session_id=round-1`);
      expect(transcripts.body.total).toBe(1);
      expect(transcripts.body.items[0]).toMatchObject({
        id: Number(res.headers['x-transcript-id']),
        user_query: 'Hey Ceddy, what club for 160 yards?',
        assistant_response: 'Use a 7 iron.',
        contains_wake_word: true,
      });
    });

    it('records a turn without the wake word and sends no reply', async () => {
      transcript = 'nice putt';

      const res = await request(app)
        .post(`${PREFIX}/interaction`)
        .field('session_id', 'round-1')
        .attach('audio_file', Buffer.from('fake-wav'), 'turn.wav');

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toBe('audio/mpeg');

      const transcripts = await request(app).get(`${PREFIX}/transcripts`);
      expect(transcripts.body.items[0]).toMatchObject({
        user_query: 'nice putt',
        assistant_response: null,
        contains_wake_word: false,
      });
    });

    it('returns 404 for an unknown session', async () => {
      const res = await request(app)
        .post(`${PREFIX}/interaction`)
        .field('session_id', 'missing')
        .attach('audio_file', Buffer.from('fake-wav'), 'turn.wav');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ detail: 'Session not found' });
    });

    it('requires an audio file', async () => {
      const res = await request(app).post(`${PREFIX}/interaction`).field('session_id', 'round-1');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ detail: 'audio_file is required' });
    });

    it('rejects oversized uploads', async () => {
      const res = await request(app)
        .post(`${PREFIX}/interaction`)
        .field('session_id', 'round-1')
        .attach('audio_file', Buffer.alloc(2048), 'turn.wav');

      expect(res.status).toBe(413);
    });
  });

  describe('transcripts', () => {
    it('returns 404 when filtering by an unknown session', async () => {
      const res = await request(app).get(`${PREFIX}/transcripts?session_id=missing`);

      expect(res.status).toBe(404);
    });
  });

  describe('golf advice', () => {
    it('suggests a club for a distance', async () => {
      const res = await request(app).get(`${PREFIX}/suggest-club/160`);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        club: '7 Iron',
        explanation: 'For distances between 150-180 yards, a 7 iron is recommended.',
      });
    });

    it('rejects a non-numeric distance', async () => {
      const res = await request(app).get(`${PREFIX}/suggest-club/far`);

      expect(res.status).toBe(400);
    });

    it('reports wind conditions', async () => {
      const res = await request(app).get(`${PREFIX}/wind-conditions`);

      expect(res.body).toEqual({
        speed: '10 mph',
        direction: 'North-East',
        recommendation: 'Adjust your aim slightly to the left to account for the crosswind.',
      });
    });
  });

  describe('livekit', () => {
    it('answers 503 when LiveKit is not configured', async () => {
      const res = await request(app).get(`${PREFIX}/livekit/rooms`);

      expect(res.status).toBe(503);
      expect(res.body).toEqual({ detail: 'LiveKit is not configured' });
    });

    it('creates a room through the room API', async () => {
      app = buildApp(new RoomService({ apiKey: 'test-key', apiSecret: 'test-secret', url: 'wss://livekit.test', api: roomApi }));

      const res = await request(app).post(`${PREFIX}/livekit/rooms`).send({ room_name: 'green-1' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        name: 'green-1',
        sid: 'RM_1',
        empty_timeout: 300,
        max_participants: 0,
        created_at: '2023-11-14T22:13:20.000Z',
        turn_password: null,
        enabled_codecs: null,
        metadata: null,
      });
    });

    it('deletes a room', async () => {
      app = buildApp(new RoomService({ apiKey: 'test-key', apiSecret: 'test-secret', url: 'wss://livekit.test', api: roomApi }));

      const res = await request(app).delete(`${PREFIX}/livekit/rooms/green-1`);

      expect(res.status).toBe(204);
      expect(roomApi.deleteRoom).toHaveBeenCalledWith('green-1');
    });

    it('rejects an unsigned webhook', async () => {
      app = buildApp(new RoomService({ apiKey: 'test-key', apiSecret: 'test-secret', url: 'wss://livekit.test', api: roomApi }));

      const res = await request(app)
        .post(`${PREFIX}/livekit/webhook`)
        .set('Content-Type', 'application/webhook+json')
        .send('{"event":"room_started"}');

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ detail: 'Missing authorization header' });
    });
  });
});
