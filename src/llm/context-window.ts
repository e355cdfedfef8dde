import { getEncoding, type Tiktoken } from 'js-tiktoken';
import type { Role } from '../storage/turn-store';
import { renderSystemMessage } from './prompts';

export type SizeMeter = (text: string) => number;

export type ContextTurn = { role: Role; content: string };

export type ContextBudget = {
  maxInputTokens: number;
  maxKnowledgeTokens: number;
};

export type ContextInput = {
  systemInstructions: string;
  knowledge: string;
  turns: ContextTurn[];
  userMessage: string;
};

export type FittedContext = {
  turns: ContextTurn[];
  knowledge: string;
  droppedTurns: number;
  knowledgeTruncated: boolean;
  size: number;
};

let encoder: Tiktoken | null = null;

// Lazy: building the o200k ranks takes a moment and tests mostly use charMeter.
export const tokenMeter: SizeMeter = (text) => {
  if (!encoder) encoder = getEncoding('o200k_base');
  return text ? encoder.encode(text).length : 0;
};

export const charMeter: SizeMeter = (text) => text.length;

/** Longest prefix of `text` whose measured size is at most `limit`. */
export function cutToFit(text: string, limit: number, measure: SizeMeter): string {
  if (limit <= 0) return '';
  if (measure(text) <= limit) return text;
  let lo = 0;
  let hi = text.length;
  while (lo < hi) {
    const mid = Math.ceil((lo + hi) / 2);
    if (measure(text.slice(0, mid)) <= limit) lo = mid;
    else hi = mid - 1;
  }
  // never end on the first half of a surrogate pair
  const last = text.charCodeAt(lo - 1);
  if (lo > 0 && last >= 0xd800 && last <= 0xdbff) lo -= 1;
  return text.slice(0, lo);
}

/**
 * Fits one request into the input budget, sizing the system message as
 * `renderSystemMessage` lays it out. Priority, highest first: system
 * instructions and the current message (never cut), the knowledge excerpt,
 * then history, which loses its oldest turns first.
 */
export function fitContext(input: ContextInput, budget: ContextBudget, measure: SizeMeter = tokenMeter): FittedContext {
  let knowledge = input.knowledge;
  let knowledgeTruncated = false;
  if (measure(knowledge) > budget.maxKnowledgeTokens) {
    knowledge = cutToFit(knowledge, budget.maxKnowledgeTokens, measure);
    knowledgeTruncated = true;
  }

  // knowledge is sized as part of the rendered system message, heading and placeholder included
  const systemSize: SizeMeter = (excerpt) => measure(renderSystemMessage(input.systemInstructions, excerpt));
  const messageSize = measure(input.userMessage);
  let room = budget.maxInputTokens - systemSize(knowledge) - messageSize;

  if (room < 0) {
    knowledge = cutToFit(knowledge, budget.maxInputTokens - messageSize, systemSize);
    return {
      turns: [],
      knowledge,
      droppedTurns: input.turns.length,
      knowledgeTruncated: true,
      size: systemSize(knowledge) + messageSize
    };
  }

  const kept: ContextTurn[] = [];
  for (let i = input.turns.length - 1; i >= 0; i -= 1) {
    const turn = input.turns[i];
    const size = measure(turn.content);
    if (size > room) break;
    room -= size;
    kept.unshift(turn);
  }

  return {
    turns: kept,
    knowledge,
    droppedTurns: input.turns.length - kept.length,
    knowledgeTruncated,
    size: budget.maxInputTokens - room
  };
}
