/**
 * Pushes wire events to agent clients over the API Gateway management API.
 */

import {
  ApiGatewayManagementApiClient,
  GoneException,
  PostToConnectionCommand,
} from '@aws-sdk/client-apigatewaymanagementapi';
import { eventKindName, WireEvent } from '../models/events';
import { logger } from '../utils/logger';

let client: ApiGatewayManagementApiClient | null = null;

/** Points the push client at the WebSocket stage, e.g. https://{api}.execute-api.{region}.amazonaws.com/{stage}. */
export function initApiGwClient(endpoint: string): void {
  client = new ApiGatewayManagementApiClient({ endpoint });
}

/**
 * Posts the events in order. Resolves false once the client has hung up;
 * whatever was still queued is dropped.
 */
export async function pushEvents(connectionId: string, events: readonly WireEvent[]): Promise<boolean> {
  if (!client) {
    throw new Error('Push client has no endpoint; initApiGwClient() runs first');
  }

  for (const [index, event] of events.entries()) {
    try {
      await client.send(new PostToConnectionCommand({
        ConnectionId: connectionId,
        Data: Buffer.from(JSON.stringify(event)),
      }));
    } catch (err) {
      if (!(err instanceof GoneException)) {
        throw err;
      }
      logger.warn('Client gone, dropping events', { connectionId }, {
        undelivered: events.length - index,
      });
      return false;
    }
  }

  logger.debug('Events pushed', { connectionId }, {
    kinds: events.map((event) => eventKindName(event.kind)),
  });
  return true;
}

export function pushEvent(connectionId: string, event: WireEvent): Promise<boolean> {
  return pushEvents(connectionId, [event]);
}
