import OpenAI, { toFile } from 'openai';
import { config } from '../config';
import type { TranscriptionEngine } from './types';

type WhisperEngineOpts = {
  client?: OpenAI;
  model?: string;
  language?: string;
};

export class WhisperEngine implements TranscriptionEngine {
  readonly name = 'openai-whisper';
  private client: OpenAI;
  private model: string;
  private language?: string;

  constructor(opts: WhisperEngineOpts = {}) {
    this.client =
      opts.client ??
      new OpenAI({
        apiKey: config.openaiApiKey,
        baseURL: config.openaiBaseUrl
      });
    this.model = opts.model ?? config.transcribeModel;
    this.language = opts.language ?? config.transcribeLanguage;
  }

  async transcribe(audio: Buffer, format: string): Promise<string> {
    const file = await toFile(audio, `voice.${format}`);
    const res = await this.client.audio.transcriptions.create({
      file,
      model: this.model,
      language: this.language
    });
    return res.text;
  }
}
