import type { GolfSession, GolfTranscript, Page } from '../db/schema.js';
import type { IssuedToken, ParticipantInfo, RoomInfo, WebhookNotice } from '../services/room-service.js';

export function toSessionResponse(session: GolfSession) {
  return {
    id: session.id,
    session_id: session.sessionId,
    user_id: session.userId,
    is_active: session.isActive,
    created_at: session.createdAt.toISOString(),
    updated_at: session.updatedAt.toISOString(),
  };
}

export function toTranscriptResponse(transcript: GolfTranscript) {
  return {
    id: transcript.id,
    session_id: transcript.sessionId,
    user_query: transcript.userQuery,
    assistant_response: transcript.assistantResponse,
    audio_file_path: transcript.audioFilePath,
    contains_wake_word: transcript.containsWakeWord,
    created_at: transcript.createdAt.toISOString(),
    updated_at: transcript.updatedAt.toISOString(),
  };
}

export function toPageResponse<T, R>(page: Page<T>, serialize: (item: T) => R) {
  return {
    total: page.total,
    items: page.items.map(serialize),
  };
}

export function toRoomResponse(room: RoomInfo) {
  return {
    name: room.name,
    sid: room.sid,
    empty_timeout: room.emptyTimeout,
    max_participants: room.maxParticipants,
    created_at: room.createdAt.toISOString(),
    turn_password: room.turnPassword,
    enabled_codecs: room.enabledCodecs,
    metadata: room.metadata,
  };
}

export function toParticipantResponse(participant: ParticipantInfo) {
  return {
    identity: participant.identity,
    name: participant.name,
    state: participant.state,
    metadata: participant.metadata,
    joined_at: participant.joinedAt?.toISOString() ?? null,
  };
}

export function toTokenResponse(issued: IssuedToken) {
  return {
    token: issued.token,
    room_name: issued.roomName,
    participant_identity: issued.participantIdentity,
  };
}

export function toWebhookResponse(notice: WebhookNotice) {
  return {
    event: notice.event,
    id: notice.id,
    room: notice.room,
    participant: notice.participant,
    created_at: notice.createdAt?.toISOString() ?? null,
  };
}
