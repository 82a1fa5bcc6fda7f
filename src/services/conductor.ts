/**
 * Agent conductor — drives one generate() call per client message.
 *
 * Flow:
 * 1. Receive query (or toolResult) from client
 * 2. Append it to the stored conversation as a user turn
 * 3. Run the invocation orchestrator over the history
 * 4. Forward each parsed tool call as a toolCall event
 * 5. Send the agentResponse and persist the assistant turn
 *
 * Tool execution happens on the client; its toolResult arrives as a new
 * Lambda invocation and re-enters at step 2.
 */

import { EngineConfig } from '../config/env';
import { ConversationTurn, GenerationOutcome, outcomeText, ToolDescriptor } from '../models/conversation';
import { EngineError } from '../models/errors';
import {
  makeAgentResponseEvent,
  makeErrorEvent,
  makeToolCallEvent,
  WireEvent,
} from '../models/events';
import { errorMessage, logger } from '../utils/logger';
import { getOrCreateSession, saveConversation } from './dynamodb';
import { InvocationOrchestrator } from './orchestrator';
import { pushEvent, pushEvents } from './websocket';

export const DEFAULT_TOOL_CATALOG: readonly ToolDescriptor[] = [
  { name: 'web_search', description: 'Search the web for current information' },
  { name: 'str_replace_tool', description: 'Create or edit a file by replacing text' },
  { name: 'bash_tool', description: 'Run a shell command in the workspace' },
  { name: 'sequential_thinking', description: 'Work through a problem step by step' },
];

// ─── Wiring (set once per warm Lambda) ──────────────────────────────────────

export interface ConductorSettings {
  orchestrator: InvocationOrchestrator;
  config: EngineConfig;
  toolCatalog?: readonly ToolDescriptor[];
}

let settings: ConductorSettings | null = null;

export function initConductor(next: ConductorSettings): void {
  settings = next;
}

function getSettings(): ConductorSettings {
  if (!settings) {
    throw new Error('Conductor not initialized. Call initConductor() first.');
  }
  return settings;
}

// ─── Handle query from client ───────────────────────────────────────────────

export async function handleQuery(
  connectionId: string,
  sessionId: string,
  text: string,
): Promise<void> {
  logger.info('Handling query', { sessionId, connectionId }, { length: text.length });

  const session = await getOrCreateSession(sessionId);
  const history: ConversationTurn[] = [...session.conversation, { role: 'user', content: text }];

  await runGeneration(connectionId, sessionId, history);
}

// ─── Handle toolResult from client ──────────────────────────────────────────

export function toolResultContent(callId: string, result: string | null, error: string | null): string {
  if (error) {
    return `Tool ${callId} failed: ${error}`;
  }
  return `Tool ${callId} returned: ${result ?? '{}'}`;
}

export async function handleToolResult(
  connectionId: string,
  sessionId: string,
  callId: string,
  result: string | null,
  error: string | null,
): Promise<void> {
  logger.info('Handling toolResult', { sessionId, connectionId, callId }, {
    hasResult: result !== null,
    hasError: error !== null,
  });

  const session = await getOrCreateSession(sessionId);
  const history: ConversationTurn[] = [
    ...session.conversation,
    { role: 'user', content: toolResultContent(callId, result, error) },
  ];

  await runGeneration(connectionId, sessionId, history);
}

// ─── Generation ─────────────────────────────────────────────────────────────

export function outcomeEvents(outcome: GenerationOutcome): WireEvent[] {
  if (outcome.kind === 'terminated') {
    return [makeAgentResponseEvent({
      text: outcome.response.text,
      toolCallIds: [],
      forcedTermination: true,
      usageEstimate: outcome.response.usageEstimate,
    })];
  }

  const { result } = outcome;
  return [
    ...result.toolCalls.map((call) => makeToolCallEvent(call.callId, call.toolName, JSON.stringify(call.arguments))),
    makeAgentResponseEvent({
      text: outcomeText(outcome),
      toolCallIds: result.toolCalls.map((call) => call.callId),
      forcedTermination: false,
      usageEstimate: result.usageEstimate,
    }),
  ];
}

function assistantContent(outcome: GenerationOutcome): string {
  return outcome.kind === 'terminated' ? outcome.response.text : outcome.result.rawText;
}

async function runGeneration(
  connectionId: string,
  sessionId: string,
  history: ConversationTurn[],
): Promise<void> {
  const ctx = { sessionId, connectionId };
  const { orchestrator, config, toolCatalog = DEFAULT_TOOL_CATALOG } = getSettings();

  let outcome: GenerationOutcome;
  try {
    outcome = await orchestrator.generate({
      messages: history,
      maxTokens: config.maxTokens,
      temperature: config.temperature,
      systemPrompt: config.systemPrompt,
      toolCatalog,
    }, { sessionId });
  } catch (err) {
    const code = err instanceof EngineError ? err.code : 'conductor_error';
    logger.error('Generation error', ctx, { code, error: errorMessage(err) });
    await saveConversation(sessionId, history);
    await pushEvent(connectionId, makeErrorEvent(code, errorMessage(err)));
    return;
  }

  await saveConversation(sessionId, [...history, { role: 'assistant', content: assistantContent(outcome) }]);
  await pushEvents(connectionId, outcomeEvents(outcome));

  logger.info('Agent response sent', ctx, {
    outcome: outcome.kind,
    toolCalls: outcome.kind === 'interpreted' ? outcome.result.toolCalls.length : 0,
  });
}
