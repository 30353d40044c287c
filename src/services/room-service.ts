import { randomUUID } from 'node:crypto';
import { AccessToken, RoomServiceClient, WebhookReceiver } from 'livekit-server-sdk';
import { logger } from '../utils/logger.js';
import { ProviderError, ServiceUnavailableError, UnauthorizedError, errorMessage } from '../utils/errors.js';

/**
 * Room fields read from LiveKit
 */
export interface RoomRecord {
  name: string;
  sid: string;
  emptyTimeout: number;
  maxParticipants: number;
  /** Seconds since epoch */
  creationTime: bigint | number;
  turnPassword?: string;
  enabledCodecs?: Array<{ mime: string }>;
  metadata: string;
}

/**
 * Participant fields read from LiveKit
 */
export interface ParticipantRecord {
  identity: string;
  name: string;
  state: number;
  metadata: string;
  /** Seconds since epoch */
  joinedAt: bigint | number;
}

/**
 * The part of LiveKit's RoomServiceClient this facade calls
 */
export interface RoomApi {
  createRoom(options: { name: string; emptyTimeout?: number }): Promise<RoomRecord>;
  deleteRoom(room: string): Promise<void>;
  listRooms(names?: string[]): Promise<RoomRecord[]>;
  listParticipants(room: string): Promise<ParticipantRecord[]>;
}

export interface RoomInfo {
  name: string;
  sid: string;
  emptyTimeout: number;
  maxParticipants: number;
  createdAt: Date;
  turnPassword: string | null;
  enabledCodecs: string[] | null;
  metadata: string | null;
}

export interface ParticipantInfo {
  identity: string;
  name: string | null;
  state: string | null;
  metadata: string | null;
  joinedAt: Date | null;
}

export interface TokenRequest {
  roomName: string;
  participantName: string;
  participantIdentity?: string;
  /** Seconds */
  ttl?: number;
  metadata?: string;
}

export interface IssuedToken {
  token: string;
  roomName: string;
  participantIdentity: string;
}

export interface WebhookNotice {
  event: string;
  id: string;
  room: string | null;
  participant: string | null;
  createdAt: Date | null;
}

export interface RoomServiceOptions {
  apiKey?: string;
  apiSecret?: string;
  url?: string;
  /** Room API client; built from the credentials when omitted */
  api?: RoomApi;
}

const PARTICIPANT_STATES: Record<number, string> = {
  0: 'JOINING',
  1: 'JOINED',
  2: 'ACTIVE',
  3: 'DISCONNECTED',
};

const NOT_CONFIGURED = 'LiveKit is not configured';

function fromEpochSeconds(value: bigint | number): Date | null {
  const seconds = Number(value);
  return seconds > 0 ? new Date(seconds * 1000) : null;
}

function toRoomInfo(room: RoomRecord): RoomInfo {
  return {
    name: room.name,
    sid: room.sid,
    emptyTimeout: room.emptyTimeout,
    maxParticipants: room.maxParticipants,
    createdAt: new Date(Number(room.creationTime) * 1000),
    turnPassword: room.turnPassword || null,
    enabledCodecs: room.enabledCodecs?.map((codec) => codec.mime) ?? null,
    metadata: room.metadata || null,
  };
}

function toParticipantInfo(participant: ParticipantRecord): ParticipantInfo {
  return {
    identity: participant.identity,
    name: participant.name || null,
    state: PARTICIPANT_STATES[participant.state] ?? null,
    metadata: participant.metadata || null,
    joinedAt: fromEpochSeconds(participant.joinedAt),
  };
}

/**
 * Facade over LiveKit rooms, access tokens and webhooks.
 *
 * Room calls need key, secret and URL; tokens and webhooks need key and
 * secret. Without them every call fails with ServiceUnavailableError.
 */
export class RoomService {
  private apiKey?: string;
  private apiSecret?: string;
  private api: RoomApi | null;

  constructor(options: RoomServiceOptions) {
    this.apiKey = options.apiKey;
    this.apiSecret = options.apiSecret;

    if (options.api) {
      this.api = options.api;
    } else if (options.apiKey && options.apiSecret && options.url) {
      this.api = new RoomServiceClient(options.url, options.apiKey, options.apiSecret);
    } else {
      this.api = null;
    }
  }

  get roomsEnabled(): boolean {
    return this.api !== null && this.hasCredentials();
  }

  async createRoom(name: string, emptyTimeout = 300): Promise<RoomInfo> {
    const api = this.requireRoomApi();
    try {
      const room = await api.createRoom({ name, emptyTimeout });
      logger.info(`Created LiveKit room ${room.name}`, { sid: room.sid });
      return toRoomInfo(room);
    } catch (error) {
      throw this.failure('Failed to create LiveKit room', error);
    }
  }

  async deleteRoom(name: string): Promise<void> {
    const api = this.requireRoomApi();
    try {
      await api.deleteRoom(name);
      logger.info(`Deleted LiveKit room ${name}`);
    } catch (error) {
      throw this.failure('Failed to delete LiveKit room', error);
    }
  }

  async listRooms(): Promise<RoomInfo[]> {
    const api = this.requireRoomApi();
    try {
      const rooms = await api.listRooms();
      return rooms.map(toRoomInfo);
    } catch (error) {
      throw this.failure('Failed to list LiveKit rooms', error);
    }
  }

  async listParticipants(roomName: string): Promise<ParticipantInfo[]> {
    const api = this.requireRoomApi();
    try {
      const participants = await api.listParticipants(roomName);
      return participants.map(toParticipantInfo);
    } catch (error) {
      throw this.failure('Failed to get LiveKit room participants', error);
    }
  }

  /**
   * Issue a join token for one room. The identity defaults to a random UUID.
   */
  async createAccessToken(request: TokenRequest): Promise<IssuedToken> {
    const { apiKey, apiSecret } = this.requireCredentials();
    const participantIdentity = request.participantIdentity || randomUUID();

    try {
      const token = new AccessToken(apiKey, apiSecret, {
        identity: participantIdentity,
        name: request.participantName,
        ttl: request.ttl ?? 3600,
        metadata: request.metadata,
      });
      token.addGrant({
        roomJoin: true,
        room: request.roomName,
        canPublish: true,
        canSubscribe: true,
        canPublishData: true,
      });

      return {
        token: await token.toJwt(),
        roomName: request.roomName,
        participantIdentity,
      };
    } catch (error) {
      throw this.failure('Failed to create LiveKit access token', error);
    }
  }

  /**
   * Verify a webhook's signature against its raw body and decode the event
   */
  async receiveWebhook(body: string, authorization: string | undefined): Promise<WebhookNotice> {
    const { apiKey, apiSecret } = this.requireCredentials();
    if (!authorization) {
      throw new UnauthorizedError('Missing authorization header');
    }

    const receiver = new WebhookReceiver(apiKey, apiSecret);
    try {
      const event = await receiver.receive(body, authorization);
      logger.info(`LiveKit webhook: ${event.event}`, { id: event.id, room: event.room?.name });
      return {
        event: event.event,
        id: event.id,
        room: event.room?.name ?? null,
        participant: event.participant?.identity ?? null,
        createdAt: fromEpochSeconds(event.createdAt),
      };
    } catch (error) {
      logger.warn(`Rejected LiveKit webhook: ${errorMessage(error)}`);
      throw new UnauthorizedError('Invalid webhook signature');
    }
  }

  private hasCredentials(): boolean {
    return Boolean(this.apiKey && this.apiSecret);
  }

  private requireCredentials(): { apiKey: string; apiSecret: string } {
    if (!this.apiKey || !this.apiSecret) {
      throw new ServiceUnavailableError(NOT_CONFIGURED);
    }
    return { apiKey: this.apiKey, apiSecret: this.apiSecret };
  }

  private requireRoomApi(): RoomApi {
    if (!this.api || !this.hasCredentials()) {
      throw new ServiceUnavailableError(NOT_CONFIGURED);
    }
    return this.api;
  }

  private failure(message: string, error: unknown): ProviderError {
    logger.error(`${message}: ${errorMessage(error)}`);
    return new ProviderError('livekit', 'request', message, { cause: error });
  }
}
