import { google, type drive_v3 } from 'googleapis';
import { logger, errorMessage } from '../observability/logger';
import { decodeDocument } from './document-decoder';
import type { KnowledgeSource } from './types';

const SCOPES = ['https://www.googleapis.com/auth/drive.readonly'];

type DriveKnowledgeSourceOpts = {
  fileId: string;
  serviceAccountJson: string;
  drive?: drive_v3.Drive;
};

/**
 * Reads the knowledge document from Google Drive. Google Docs are exported as
 * plain text; any other file is downloaded as-is and must be UTF-8 text or .docx.
 */
export class DriveKnowledgeSource implements KnowledgeSource {
  readonly name: string;
  private fileId: string;
  private serviceAccountJson: string;
  private drive: drive_v3.Drive | null;

  constructor(opts: DriveKnowledgeSourceOpts) {
    this.fileId = opts.fileId;
    this.serviceAccountJson = opts.serviceAccountJson;
    this.drive = opts.drive ?? null;
    this.name = `drive:${opts.fileId}`;
  }

  async fetch(): Promise<string> {
    const drive = this.client();
    let bytes: Buffer;
    try {
      const res = await drive.files.export(
        { fileId: this.fileId, mimeType: 'text/plain' },
        { responseType: 'arraybuffer' }
      );
      bytes = toBuffer(res.data);
    } catch (err) {
      logger.info('drive export failed, trying direct download', { fileId: this.fileId, error: errorMessage(err) });
      const res = await drive.files.get({ fileId: this.fileId, alt: 'media' }, { responseType: 'arraybuffer' });
      bytes = toBuffer(res.data);
    }
    return decodeDocument(bytes);
  }

  private client(): drive_v3.Drive {
    if (!this.drive) {
      const auth = new google.auth.GoogleAuth({ keyFile: this.serviceAccountJson, scopes: SCOPES });
      this.drive = google.drive({ version: 'v3', auth });
    }
    return this.drive;
  }
}

export function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (ArrayBuffer.isView(data)) return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  if (typeof data === 'string') return Buffer.from(data, 'utf8');
  throw new Error(`unexpected drive payload: ${typeof data}`);
}

