import { Readable } from 'node:stream';
import { logger } from '../utils/logger.js';
import { NotFoundError } from '../utils/errors.js';
import type { AudioClip } from '../providers/stt/index.js';
import type { WakeWordDetector } from '../providers/wakeword/index.js';
import type { SessionStore } from '../db/session-store.js';
import type { TranscriptStore } from '../db/transcript-store.js';
import type { GolfTranscript } from '../db/schema.js';
import type { Transcriber } from './transcriber.js';
import { ERROR_REPLY_MESSAGE, type AssistantService } from './assistant-service.js';
import type { SpeechSynthesizer } from './speech-synthesizer.js';
import { SessionQueue } from './session-queue.js';

export interface InteractionPipelineDeps {
  sessions: SessionStore;
  transcripts: TranscriptStore;
  transcriber: Transcriber;
  wakeWord: WakeWordDetector;
  assistant: AssistantService;
  synthesizer: SpeechSynthesizer;
  queue?: SessionQueue;
}

export interface InteractionOptions {
  /** Aborts an in-flight speech download, e.g. when the caller disconnects */
  signal?: AbortSignal;
}

export interface InteractionResult {
  /** The turn's transcript as last written */
  transcript: GolfTranscript;
  /** Whether the assistant was asked (wake word heard) */
  replied: boolean;
  /** MP3 audio, read lazily; empty when there is nothing to say */
  audio: Readable;
}

export function emptyAudio(): Readable {
  return Readable.from([]);
}

/**
 * Processes one user utterance:
 * session lookup -> transcription -> wake word check -> transcript commit
 * -> (wake word only) assistant -> speech synthesis -> transcript update -> audio.
 *
 * The transcript is committed before the assistant is asked, so a turn is
 * recorded even when everything after it fails. Turns of the same session
 * are serialized up to the transcript update; streaming happens outside.
 */
export class InteractionPipeline {
  private deps: InteractionPipelineDeps;
  private queue: SessionQueue;

  constructor(deps: InteractionPipelineDeps) {
    this.deps = deps;
    this.queue = deps.queue ?? new SessionQueue();
  }

  process(sessionId: string, audio: AudioClip, options: InteractionOptions = {}): Promise<InteractionResult> {
    return this.queue.run(sessionId, () => this.runTurn(sessionId, audio, options));
  }

  private async runTurn(sessionId: string, audio: AudioClip, { signal }: InteractionOptions): Promise<InteractionResult> {
    const { sessions, transcripts, transcriber, wakeWord, assistant, synthesizer } = this.deps;

    const session = await sessions.getBySessionId(sessionId);
    if (!session) {
      throw new NotFoundError('Session not found');
    }

    const transcription = await transcriber.transcribe(audio);
    const query = transcription.ok ? transcription.value : '';
    logger.debug(`Transcribed turn`, { sessionId, bytes: audio.data.length, chars: query.length, ok: transcription.ok });

    const heard = wakeWord.detect(query);

    const transcript = await transcripts.create({
      sessionId: session.id,
      userQuery: query,
      containsWakeWord: heard,
    });
    logger.debug(`Transcript ${transcript.id} committed`, { sessionId, containsWakeWord: heard });

    if (!heard) {
      return { transcript, replied: false, audio: emptyAudio() };
    }

    const reply = await assistant.getResponse(query);
    const replyText = reply.ok ? reply.value : ERROR_REPLY_MESSAGE;

    const speech = await synthesizer.synthesize(replyText, signal);
    const stream = speech.ok ? speech.value : emptyAudio();
    if (!speech.ok) {
      logger.warn(`No audio available for transcript ${transcript.id}`, { sessionId });
    }

    let updated: GolfTranscript | null;
    try {
      updated = await transcripts.update(transcript.id, { assistantResponse: replyText });
    } catch (error) {
      stream.destroy();
      throw error;
    }
    if (!updated) {
      stream.destroy();
      throw new NotFoundError(`Transcript ${transcript.id} no longer exists`);
    }
    logger.debug(`Transcript ${transcript.id} updated with reply`, { sessionId });

    return { transcript: updated, replied: true, audio: stream };
  }
}
