import fs from 'node:fs/promises';
import { decodeDocument } from './document-decoder';
import type { KnowledgeSource } from './types';

export class FileKnowledgeSource implements KnowledgeSource {
  readonly name: string;

  constructor(private readonly filePath: string) {
    this.name = `file:${filePath}`;
  }

  async fetch(): Promise<string> {
    return decodeDocument(await fs.readFile(this.filePath));
  }
}
