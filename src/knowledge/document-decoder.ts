import { extractRawText } from 'mammoth';
import { logger, errorMessage } from '../observability/logger';

// Drive exports start with a BOM, which the decoder drops. Invalid UTF-8 throws.
export function decodeUtf8(bytes: Buffer): string {
  return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
}

/**
 * Text of a knowledge document: UTF-8 text as-is; bytes that are not UTF-8
 * are read as a Word (.docx) file, one paragraph per line.
 */
export async function decodeDocument(bytes: Buffer): Promise<string> {
  try {
    return decodeUtf8(bytes);
  } catch (err) {
    logger.info('knowledge document is not UTF-8, reading it as .docx', {
      bytes: bytes.length,
      error: errorMessage(err)
    });
  }
  try {
    const result = await extractRawText({ buffer: bytes });
    return result.value.replace(/\n{2,}/g, '\n').trim();
  } catch (err) {
    throw new Error(`not UTF-8 text and not a readable .docx: ${errorMessage(err)}`);
  }
}
