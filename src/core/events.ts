import type { ErrorKind } from './errors';
import type { TurnState } from './fsm';

type EventBase = {
  userId: string;
  username?: string;
};

export type TextEvent = EventBase & { kind: 'text'; text: string };

// Transports that must download the audio pass a loader; it runs inside the user's turn
// so a voice message cannot be overtaken by a later text from the same user.
export type AudioPayload = Buffer | (() => Promise<Buffer>);

export type VoiceEvent = EventBase & { kind: 'voice'; audio: AudioPayload; format: string };

// Non-actionable platform events (joins, edits, service messages) the orchestrator ignores.
export type SystemEvent = EventBase & { kind: 'system'; reason: string };

export type InboundEvent = TextEvent | VoiceEvent | SystemEvent;

export interface OutboundReply {
  userId: string;
  text: string;
  status: 'ok' | 'degraded';
  errorKind?: ErrorKind;
  states: TurnState[];
}
