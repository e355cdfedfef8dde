/** Speech-to-text backend. Returns the raw transcript, possibly empty. */
export interface TranscriptionEngine {
  readonly name: string;
  transcribe(audio: Buffer, format: string): Promise<string>;
}
