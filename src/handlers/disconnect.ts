/**
 * $disconnect: forgets the connection. The session keeps its conversation,
 * so a client that reconnects with the same sessionId carries on.
 */

import { APIGatewayProxyResult } from 'aws-lambda';
import { deleteConnection } from '../services/dynamodb';
import { errorMessage, logger } from '../utils/logger';

export interface DisconnectEvent {
  requestContext: { connectionId: string; requestId: string };
}

export const handler = async (event: DisconnectEvent): Promise<APIGatewayProxyResult> => {
  const { connectionId, requestId } = event.requestContext;
  const ctx = { connectionId, requestId };

  // API Gateway ignores the status here, so a failed delete is only logged.
  await deleteConnection(connectionId).catch((err: unknown) => {
    logger.warn('Connection record not removed', ctx, { error: errorMessage(err) });
  });

  logger.info('Agent client disconnected', ctx);
  return { statusCode: 200, body: 'Disconnected' };
};
