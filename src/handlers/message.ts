/**
 * sendMessage handler — processes inbound WebSocket messages from agent clients.
 *
 * Dispatches based on event kind:
 * - initAgent: create the session, report the resolved model
 * - query: run a generation via the conductor
 * - toolResult: feed a client-executed tool result back to the conductor
 */

import { APIGatewayProxyResult } from 'aws-lambda';
import { loadEngineConfig } from '../config/env';
import { EngineError } from '../models/errors';
import {
  eventKindName,
  validateWireEvent,
  isInitAgent,
  isQuery,
  isToolResult,
  makeAgentInitializedEvent,
  makeErrorEvent,
} from '../models/events';
import { getConnection, getOrCreateSession } from '../services/dynamodb';
import { handleQuery, handleToolResult, initConductor } from '../services/conductor';
import { createOrchestrator } from '../services/orchestrator';
import { initApiGwClient, pushEvent } from '../services/websocket';
import { errorMessage, logger } from '../utils/logger';

// ─── WebSocket message event type ───────────────────────────────────────────

export interface WebSocketMessageEvent {
  requestContext: {
    connectionId: string;
    requestId: string;
    domainName: string;
    stage: string;
  };
  body?: string;
}

// ─── Initialize clients once (warm Lambda) ──────────────────────────────────

let endpoint: string | null = null;
let modelId: string | null = null;

function ensureApiGwClient(domainName: string, stage: string): void {
  if (endpoint) return;

  endpoint = `https://${domainName}/${stage}`;
  initApiGwClient(endpoint);
}

/** Builds the orchestrator on first use; returns the resolved model id. */
function ensureAgent(): string {
  if (modelId) return modelId;

  const config = loadEngineConfig();
  const orchestrator = createOrchestrator(config);
  initConductor({ orchestrator, config });
  modelId = orchestrator.modelId;

  logger.info('Agent initialized', { modelId }, { modelName: config.modelName, region: config.region });
  return modelId;
}

// ─── Handler ────────────────────────────────────────────────────────────────

export const handler = async (event: WebSocketMessageEvent): Promise<APIGatewayProxyResult> => {
  const { connectionId, requestId, domainName, stage } = event.requestContext;

  ensureApiGwClient(domainName, stage);

  const ctx = { connectionId, requestId };

  logger.info('WebSocket message received', ctx);

  let body: unknown;
  try {
    body = JSON.parse(event.body || '{}');
  } catch {
    logger.warn('Invalid JSON in message body', ctx);
    await pushEvent(connectionId, makeErrorEvent('invalid_json', 'Message body is not valid JSON'));
    return { statusCode: 400, body: 'Invalid JSON' };
  }

  const validation = validateWireEvent(body);
  if (!validation.valid) {
    logger.warn('Invalid event shape', ctx, { error: validation.error });
    await pushEvent(connectionId, makeErrorEvent('invalid_event', validation.error));
    return { statusCode: 400, body: validation.error };
  }

  const wireEvent = validation.event;
  const kind = wireEvent.kind;

  const connection = await getConnection(connectionId);
  if (!connection) {
    logger.error('No connection record found', ctx);
    await pushEvent(connectionId, makeErrorEvent('no_session', 'Connection not found. Reconnect with sessionId.'));
    return { statusCode: 400, body: 'No connection record' };
  }

  const sessionId = connection.sessionId;
  const sessionCtx = { ...ctx, sessionId };

  logger.info('Processing event', sessionCtx, {
    eventKind: eventKindName(kind),
    eventId: wireEvent.id,
  });

  try {
    // ─── Dispatch by event kind ───────────────────────────────────────

    if (isInitAgent(kind)) {
      const resolved = ensureAgent();
      await getOrCreateSession(sessionId);
      await pushEvent(connectionId, makeAgentInitializedEvent(resolved));
      return { statusCode: 200, body: 'OK' };
    }

    if (isQuery(kind)) {
      const text = kind.query.text;
      if (text.trim().length === 0) {
        logger.warn('Empty query received', sessionCtx);
        await pushEvent(connectionId, makeErrorEvent('empty_query', 'Query text is empty'));
        return { statusCode: 400, body: 'Empty query' };
      }

      ensureAgent();
      await handleQuery(connectionId, sessionId, text);
      return { statusCode: 200, body: 'OK' };
    }

    if (isToolResult(kind)) {
      const { callId, result, error } = kind.toolResult;
      ensureAgent();
      await handleToolResult(connectionId, sessionId, callId, result, error);
      return { statusCode: 200, body: 'OK' };
    }

    logger.warn('Unhandled event kind', sessionCtx, {
      kind: eventKindName(kind),
    });

    return { statusCode: 200, body: 'OK' };

  } catch (err) {
    const code = err instanceof EngineError ? err.code : 'handler_error';
    logger.error('Handler error', sessionCtx, { code, error: errorMessage(err) });
    await pushEvent(connectionId, makeErrorEvent(code, errorMessage(err)));
    return { statusCode: 500, body: 'Internal server error' };
  }
};
