/**
 * DynamoDB operations for Connections and Sessions.
 */

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  PutCommand,
  GetCommand,
  DeleteCommand,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import { loadTableConfig } from '../config/env';
import { ConversationTurn, TurnRole } from '../models/conversation';
import { ConnectionRecord, SessionRecord, boundConversation } from '../models/session';
import { logger } from '../utils/logger';

// ─── Client singleton ───────────────────────────────────────────────────────

const ddbClient = new DynamoDBClient({});
const docClient = DynamoDBDocumentClient.from(ddbClient, {
  marshallOptions: { removeUndefinedValues: true },
});

// ─── Table names from env ───────────────────────────────────────────────────

const { connectionsTable: CONNECTIONS_TABLE, sessionsTable: SESSIONS_TABLE } = loadTableConfig();

// ─── Item decoding ──────────────────────────────────────────────────────────

const TURN_ROLES: ReadonlySet<string> = new Set<TurnRole>(['system', 'user', 'assistant']);

function isTurnRole(value: unknown): value is TurnRole {
  return typeof value === 'string' && TURN_ROLES.has(value);
}

function toConversation(value: unknown): ConversationTurn[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const items: unknown[] = value;
  const turns: ConversationTurn[] = [];
  for (const item of items) {
    if (typeof item === 'object' && item !== null && 'role' in item && 'content' in item) {
      const { role, content } = item;
      if (isTurnRole(role) && typeof content === 'string') {
        turns.push({ role, content });
      }
    }
  }
  return turns;
}

function toSessionRecord(item: Record<string, unknown> | undefined): SessionRecord | null {
  if (!item || typeof item.sessionId !== 'string') {
    return null;
  }
  return {
    sessionId: item.sessionId,
    conversation: toConversation(item.conversation),
    createdAt: typeof item.createdAt === 'string' ? item.createdAt : '',
    updatedAt: typeof item.updatedAt === 'string' ? item.updatedAt : '',
  };
}

function toConnectionRecord(item: Record<string, unknown> | undefined): ConnectionRecord | null {
  if (!item || typeof item.connectionId !== 'string' || typeof item.sessionId !== 'string') {
    return null;
  }
  return {
    connectionId: item.connectionId,
    sessionId: item.sessionId,
    connectedAt: typeof item.connectedAt === 'string' ? item.connectedAt : '',
  };
}

// ─── Connections ────────────────────────────────────────────────────────────

export async function putConnection(connectionId: string, sessionId: string): Promise<void> {
  const record: ConnectionRecord = {
    connectionId,
    sessionId,
    connectedAt: new Date().toISOString(),
  };
  await docClient.send(new PutCommand({
    TableName: CONNECTIONS_TABLE,
    Item: record,
  }));
  logger.info('Connection saved', { connectionId, sessionId });
}

export async function getConnection(connectionId: string): Promise<ConnectionRecord | null> {
  const result = await docClient.send(new GetCommand({
    TableName: CONNECTIONS_TABLE,
    Key: { connectionId },
  }));
  return toConnectionRecord(result.Item);
}

export async function deleteConnection(connectionId: string): Promise<void> {
  await docClient.send(new DeleteCommand({
    TableName: CONNECTIONS_TABLE,
    Key: { connectionId },
  }));
  logger.info('Connection deleted', { connectionId });
}

// ─── Sessions ───────────────────────────────────────────────────────────────

export async function getSession(sessionId: string): Promise<SessionRecord | null> {
  const result = await docClient.send(new GetCommand({
    TableName: SESSIONS_TABLE,
    Key: { sessionId },
  }));
  return toSessionRecord(result.Item);
}

export async function getOrCreateSession(sessionId: string): Promise<SessionRecord> {
  const existing = await getSession(sessionId);
  if (existing) {
    return existing;
  }

  const now = new Date().toISOString();
  const session: SessionRecord = {
    sessionId,
    conversation: [],
    createdAt: now,
    updatedAt: now,
  };

  await docClient.send(new PutCommand({
    TableName: SESSIONS_TABLE,
    Item: session,
  }));

  logger.info('Session created', { sessionId });
  return session;
}

/** Replaces the stored conversation, keeping only the most recent turns. */
export async function saveConversation(
  sessionId: string,
  conversation: ConversationTurn[],
): Promise<void> {
  const bounded = boundConversation(conversation);

  await docClient.send(new UpdateCommand({
    TableName: SESSIONS_TABLE,
    Key: { sessionId },
    UpdateExpression: 'SET conversation = :conv, updatedAt = :now',
    ExpressionAttributeValues: {
      ':conv': bounded,
      ':now': new Date().toISOString(),
    },
  }));

  logger.debug('Conversation updated', { sessionId }, {
    turnCount: bounded.length,
  });
}

