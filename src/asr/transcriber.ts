import { TranscriptionFailed } from '../core/errors';
import { logger } from '../observability/logger';
import { WhisperEngine } from './whisper-engine';
import type { TranscriptionEngine } from './types';
export type { TranscriptionEngine } from './types';

/** Normalizes engine output: a thrown error or an empty transcript becomes TranscriptionFailed. */
export class Transcriber {
  private engine: TranscriptionEngine;

  constructor(engine?: TranscriptionEngine) {
    this.engine = engine ?? new WhisperEngine();
  }

  async transcribe(audio: Buffer, format: string): Promise<string> {
    if (audio.length === 0) {
      throw new TranscriptionFailed('voice payload is empty');
    }
    const startedAt = Date.now();
    let raw: string;
    try {
      raw = await this.engine.transcribe(audio, format);
    } catch (err) {
      logger.error('transcription failed', { engine: this.engine.name, bytes: audio.length, error: err });
      throw new TranscriptionFailed(`${this.engine.name} could not transcribe audio`, { cause: err });
    }
    const text = raw.trim();
    if (!text) {
      logger.warn('transcription returned empty text', { engine: this.engine.name, bytes: audio.length });
      throw new TranscriptionFailed('transcript is empty');
    }
    logger.info('transcription done', {
      engine: this.engine.name,
      chars: text.length,
      elapsed_ms: Date.now() - startedAt
    });
    return text;
  }
}
