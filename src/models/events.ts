/**
 * Agent wire protocol — every WebSocket message is a WireEvent whose "kind"
 * object has exactly one key naming the event.
 */

import { randomUUID } from 'crypto';

// ─── Wire format (JSON on WebSocket) ───────────────────────────────────────

export interface WireEvent {
  id: string;           // UUID
  timestamp: string;    // ISO-8601
  kind: WireEventKind;
}

export interface AgentResponsePayload {
  text: string;
  toolCallIds: string[];
  forcedTermination: boolean;
  usageEstimate: number;
}

export type WireEventKind =
  | { initAgent: Record<string, never> }
  | { agentInitialized: { modelId: string } }
  | { query: { text: string } }
  | { agentResponse: AgentResponsePayload }
  | { toolCall: { callId: string; name: string; arguments: string } }
  | { toolResult: { callId: string; result: string | null; error: string | null } }
  | { error: { code: string; message: string } };

// ─── Type guards ────────────────────────────────────────────────────────────

export function isInitAgent(kind: WireEventKind): kind is { initAgent: Record<string, never> } {
  return 'initAgent' in kind;
}

export function isQuery(kind: WireEventKind): kind is { query: { text: string } } {
  return 'query' in kind;
}

export function isToolResult(kind: WireEventKind): kind is { toolResult: { callId: string; result: string | null; error: string | null } } {
  return 'toolResult' in kind;
}

export function isToolCall(kind: WireEventKind): kind is { toolCall: { callId: string; name: string; arguments: string } } {
  return 'toolCall' in kind;
}

export function isAgentResponse(kind: WireEventKind): kind is { agentResponse: AgentResponsePayload } {
  return 'agentResponse' in kind;
}

export function isError(kind: WireEventKind): kind is { error: { code: string; message: string } } {
  return 'error' in kind;
}

/** The single key naming the event, e.g. "toolCall". */
export function eventKindName(kind: WireEventKind): string {
  return Object.keys(kind)[0] ?? 'unknown';
}

// ─── Factories ──────────────────────────────────────────────────────────────

export function makeEvent(kind: WireEventKind, id?: string): WireEvent {
  return {
    id: id ?? randomUUID(),
    timestamp: new Date().toISOString(),
    kind,
  };
}

export function makeAgentInitializedEvent(modelId: string): WireEvent {
  return makeEvent({ agentInitialized: { modelId } });
}

export function makeAgentResponseEvent(payload: AgentResponsePayload): WireEvent {
  return makeEvent({ agentResponse: payload });
}

export function makeToolCallEvent(callId: string, name: string, args: string): WireEvent {
  return makeEvent({ toolCall: { callId, name, arguments: args } });
}

export function makeErrorEvent(code: string, message: string): WireEvent {
  return makeEvent({ error: { code, message } });
}

// ─── Validation ─────────────────────────────────────────────────────────────

/** Kinds a client may send. */
const INBOUND_KIND_KEYS = new Set(['initAgent', 'query', 'toolResult']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

export function validateWireEvent(data: unknown): { valid: true; event: WireEvent } | { valid: false; error: string } {
  if (!isRecord(data)) {
    return { valid: false, error: 'Event must be a non-null object' };
  }

  if (typeof data.id !== 'string' || data.id.length === 0) {
    return { valid: false, error: 'Event must have a non-empty string "id"' };
  }

  if (typeof data.timestamp !== 'string') {
    return { valid: false, error: 'Event must have a string "timestamp"' };
  }

  if (!isRecord(data.kind)) {
    return { valid: false, error: 'Event must have an object "kind"' };
  }

  const kindKeys = Object.keys(data.kind);
  if (kindKeys.length !== 1) {
    return { valid: false, error: `Event kind must have exactly one key, got: ${kindKeys.join(', ')}` };
  }

  const kindKey = kindKeys[0];
  if (!INBOUND_KIND_KEYS.has(kindKey)) {
    return { valid: false, error: `Unknown event kind: ${kindKey}` };
  }

  const payload = data.kind[kindKey];
  if (!isRecord(payload)) {
    return { valid: false, error: `${kindKey} payload must be an object` };
  }

  const base = { id: data.id, timestamp: data.timestamp };

  if (kindKey === 'query') {
    if (typeof payload.text !== 'string') {
      return { valid: false, error: 'query must have string text' };
    }
    return { valid: true, event: { ...base, kind: { query: { text: payload.text } } } };
  }

  if (kindKey === 'toolResult') {
    const { callId, result = null, error = null } = payload;
    if (typeof callId !== 'string' || !isNullableString(result) || !isNullableString(error)) {
      return { valid: false, error: 'toolResult must have string callId and string-or-null result and error' };
    }
    return { valid: true, event: { ...base, kind: { toolResult: { callId, result, error } } } };
  }

  return { valid: true, event: { ...base, kind: { initAgent: {} } } };
}
