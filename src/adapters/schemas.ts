import { z } from 'zod';
import type { InboundEvent } from '../core/events';

const userId = z.union([z.string().trim().min(1), z.number().int()]).transform(String);

export const messageBodySchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('text'),
    userId,
    username: z.string().optional(),
    text: z.string()
  }),
  z.object({
    kind: z.literal('voice'),
    userId,
    username: z.string().optional(),
    audioBase64: z.string().min(1),
    format: z.string().min(1).default('ogg')
  }),
  z.object({
    kind: z.literal('system'),
    userId,
    reason: z.string().default('system')
  })
]);

export type MessageBody = z.infer<typeof messageBodySchema>;

export function toInboundEvent(body: MessageBody): InboundEvent {
  switch (body.kind) {
    case 'text':
      return { kind: 'text', userId: body.userId, username: body.username, text: body.text };
    case 'voice':
      return {
        kind: 'voice',
        userId: body.userId,
        username: body.username,
        format: body.format,
        audio: Buffer.from(body.audioBase64, 'base64')
      };
    case 'system':
      return { kind: 'system', userId: body.userId, reason: body.reason };
  }
}

export const resetBodySchema = z.object({ userId });

export const broadcastBodySchema = z.object({ text: z.string().trim().min(1) });

export const clientFrameSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('message'), user_id: userId, username: z.string().optional(), text: z.string() }),
  z.object({
    type: z.literal('voice'),
    user_id: userId,
    username: z.string().optional(),
    payload_b64: z.string().min(1),
    format: z.string().min(1).default('ogg')
  }),
  z.object({ type: z.literal('ping') })
]);

export type ClientFrame = z.infer<typeof clientFrameSchema>;
