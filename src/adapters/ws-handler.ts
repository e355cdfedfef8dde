import type WebSocket from 'ws';
import type { InboundEvent } from '../core/events';
import type { Orchestrator } from '../core/orchestrator';
import { logger } from '../observability/logger';
import { clientFrameSchema, type ClientFrame } from './schemas';

const nowMs = () => Date.now();

type SendJson = (payload: Record<string, unknown>) => Promise<void>;

type TurnHandler = Pick<Orchestrator, 'handle'>;

export function wsHandler(socket: WebSocket, orchestrator: TurnHandler) {
  let frames = 0;

  const sendJson: SendJson = async (payload) => {
    logger.debug('ws->client', summarizePayload(payload));
    socket.send(JSON.stringify(payload));
  };

  socket.on('message', (data: WebSocket.RawData) => {
    frames += 1;
    handleClientFrame(rawToString(data), orchestrator, sendJson).catch((e: unknown) => {
      logger.error('ws handler error', { frames, error: e });
    });
  });

  socket.on('close', () => {
    logger.info('ws close', { frames });
  });
}

/** Parses one client frame, runs it through the orchestrator and answers on the same socket. */
export async function handleClientFrame(raw: string, orchestrator: TurnHandler, sendJson: SendJson) {
  let frame: ClientFrame;
  try {
    const parsed = clientFrameSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      await sendJson({ type: 'error', code: 'INVALID_FRAME', message: parsed.error.issues[0]?.message ?? 'invalid frame' });
      return;
    }
    frame = parsed.data;
  } catch {
    await sendJson({ type: 'error', code: 'INVALID_JSON', message: 'frame is not valid JSON' });
    return;
  }

  if (frame.type === 'ping') {
    await sendJson({ type: 'pong', ts_ms: nowMs() });
    return;
  }

  const event: InboundEvent =
    frame.type === 'message'
      ? { kind: 'text', userId: frame.user_id, username: frame.username, text: frame.text }
      : {
          kind: 'voice',
          userId: frame.user_id,
          username: frame.username,
          format: frame.format,
          audio: Buffer.from(frame.payload_b64, 'base64')
        };

  const reply = await orchestrator.handle(event);
  if (!reply) return;
  await sendJson({
    type: 'reply',
    user_id: reply.userId,
    text: reply.text,
    status: reply.status,
    error_kind: reply.errorKind,
    ts_ms: nowMs()
  });
}

function rawToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

function summarizePayload(payload: Record<string, unknown>) {
  if (typeof payload.text === 'string' && payload.text.length > 80) {
    return {
      ...payload,
      text: `${payload.text.slice(0, 80)}...`,
      text_len: payload.text.length
    };
  }
  return payload;
}
