import express, { type Request, type Response } from 'express';
import { createServer, type Server } from 'node:http';
import { logger } from '../utils/logger.js';
import type { SessionStore } from '../db/session-store.js';
import type { TranscriptStore } from '../db/transcript-store.js';
import type { InteractionPipeline } from './interaction-pipeline.js';
import type { RoomService } from './room-service.js';
import { createSessionRouter } from '../routes/sessions.js';
import { createTranscriptRouter } from '../routes/transcripts.js';
import { createInteractionRouter } from '../routes/interaction.js';
import { createGolfRouter } from '../routes/golf.js';
import { createLiveKitRouter, createLiveKitWebhookHandlers } from '../routes/livekit.js';
import { errorHandler } from '../middleware/error-handler.js';

export interface ApiServerConfig {
  port: number;
  apiPrefix: string;
  maxUploadBytes: number;
  pagination: {
    defaultLimit: number;
    maxLimit: number;
  };
}

export interface ApiServerDeps {
  sessions: SessionStore;
  transcripts: TranscriptStore;
  interactions: InteractionPipeline;
  rooms: RoomService;
}

/**
 * REST API server for the golf assistant
 *
 * Endpoints (under `${apiPrefix}/golf-assistant`):
 *   POST/GET/PATCH /sessions...      - session records
 *   POST /interaction                - audio in, audio/mpeg stream out
 *   GET  /transcripts                - transcript records
 *   GET  /suggest-club/:distance     - club for a distance in yards
 *   GET  /wind-conditions            - current wind
 *   /livekit/...                     - rooms, tokens, webhooks
 *
 *   GET /health                      - Health check
 */
export class ApiServer {
  private app: express.Application;
  private server: Server | null = null;
  private deps: ApiServerDeps;
  private config: ApiServerConfig;

  constructor(deps: ApiServerDeps, config: ApiServerConfig) {
    this.deps = deps;
    this.config = config;
    this.app = express();
    this.setupRoutes();
  }

  /**
   * The Express application, for mounting in tests or another server
   */
  get handler(): express.Application {
    return this.app;
  }

  /**
   * Start the API server
   */
  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server = createServer(this.app);
      this.server.once('error', reject);

      this.server.listen(this.config.port, () => {
        logger.info(`API server listening on port ${this.config.port}`);
        resolve();
      });
    });
  }

  /**
   * Stop the API server
   */
  async stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.server) {
        this.server.close(() => {
          logger.info('API server stopped');
          resolve();
        });
        this.server = null;
      } else {
        resolve();
      }
    });
  }

  private setupRoutes(): void {
    const { sessions, transcripts, interactions, rooms } = this.deps;
    const base = `${this.config.apiPrefix}/golf-assistant`;

    // Health check
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok' });
    });

    // Signed over the raw body, so registered ahead of JSON parsing
    this.app.post(`${base}/livekit/webhook`, ...createLiveKitWebhookHandlers(rooms));

    this.app.use(express.json());

    this.app.use(base, createSessionRouter(sessions, this.config.pagination));
    this.app.use(base, createTranscriptRouter(sessions, transcripts, this.config.pagination));
    this.app.use(base, createInteractionRouter(interactions, this.config.maxUploadBytes));
    this.app.use(base, createGolfRouter());
    this.app.use(base, createLiveKitRouter(rooms));

    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({ detail: 'Not found' });
    });
    this.app.use(errorHandler);
  }
}
