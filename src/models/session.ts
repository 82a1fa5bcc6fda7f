/**
 * Session and connection models for DynamoDB persistence.
 */

import { ConversationTurn } from './conversation';

// ─── Session stored in DynamoDB ─────────────────────────────────────────────

export interface SessionRecord {
  sessionId: string;
  conversation: ConversationTurn[];
  createdAt: string;  // ISO-8601
  updatedAt: string;  // ISO-8601
}

// ─── Connection mapping ─────────────────────────────────────────────────────

export interface ConnectionRecord {
  connectionId: string;
  sessionId: string;
  connectedAt: string;  // ISO-8601
}

// ─── Constants ──────────────────────────────────────────────────────────────

/** Maximum number of conversation turns to keep (bounded growth). */
export const MAX_CONVERSATION_TURNS = 50;

export function boundConversation(conversation: ConversationTurn[]): ConversationTurn[] {
  return conversation.length > MAX_CONVERSATION_TURNS
    ? conversation.slice(conversation.length - MAX_CONVERSATION_TURNS)
    : conversation;
}
