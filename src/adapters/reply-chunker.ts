// Telegram rejects messages over 4096 characters.
export const TELEGRAM_MAX_CHARS = 4096;

const SENTENCE_END = new Set(['.', '!', '?', '…', ';']);

/**
 * Splits a reply into messages of at most `maxChars`, cutting at the last
 * paragraph break, else sentence end, else space inside the window, else hard.
 */
export function chunkReply(text: string, maxChars = TELEGRAM_MAX_CHARS): string[] {
  const out: string[] = [];
  let buf = text.trim();
  while (buf.length > maxChars) {
    const cut = findCut(buf, maxChars);
    const head = buf.slice(0, cut).trimEnd();
    if (head) out.push(head);
    buf = buf.slice(cut).trimStart();
  }
  if (buf) out.push(buf);
  return out;
}

function findCut(buf: string, maxChars: number): number {
  const window = buf.slice(0, maxChars);
  const paragraph = window.lastIndexOf('\n\n');
  if (paragraph > 0) return paragraph;
  const line = window.lastIndexOf('\n');
  if (line > 0) return line;
  for (let i = window.length - 1; i > 0; i--) {
    if (SENTENCE_END.has(window[i]) && (i + 1 === window.length || /\s/.test(window[i + 1]))) {
      return i + 1;
    }
  }
  const space = window.lastIndexOf(' ');
  if (space > 0) return space;
  return maxChars;
}
