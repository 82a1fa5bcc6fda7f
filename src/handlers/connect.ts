/**
 * $connect: binds the new WebSocket connection to the session named in
 * `?sessionId=<uuid>`, so later messages find their conversation.
 */

import { APIGatewayProxyResult } from 'aws-lambda';
import { putConnection } from '../services/dynamodb';
import { errorMessage, logger } from '../utils/logger';

/** The WebSocket $connect event carries the query string the v2 typings leave out. */
export interface ConnectEvent {
  requestContext: { connectionId: string; requestId: string };
  queryStringParameters?: Record<string, string | undefined> | null;
}

export type SessionIdCheck =
  | { ok: true; sessionId: string }
  | { ok: false; reason: string };

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function checkSessionId(raw: string | undefined): SessionIdCheck {
  if (!raw) {
    return { ok: false, reason: 'Missing required query parameter: sessionId' };
  }
  if (!UUID_PATTERN.test(raw)) {
    return { ok: false, reason: 'sessionId must be a valid UUID' };
  }
  return { ok: true, sessionId: raw };
}

export const handler = async (event: ConnectEvent): Promise<APIGatewayProxyResult> => {
  const { connectionId, requestId } = event.requestContext;
  const check = checkSessionId(event.queryStringParameters?.sessionId ?? undefined);

  if (!check.ok) {
    logger.warn('Connection refused', { connectionId, requestId }, { reason: check.reason });
    return { statusCode: 400, body: check.reason };
  }

  const ctx = { connectionId, requestId, sessionId: check.sessionId };
  try {
    await putConnection(connectionId, check.sessionId);
  } catch (err) {
    logger.error('Connection not stored', ctx, { error: errorMessage(err) });
    return { statusCode: 500, body: 'Internal server error' };
  }

  logger.info('Agent client connected', ctx);
  return { statusCode: 200, body: 'Connected' };
};
