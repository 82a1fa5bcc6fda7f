/**
 * Recovers tool invocations embedded in free-form model text.
 *
 * A tool call is a JSON object of the form
 *   {"name": "<tool>", "arguments": {...}}
 * where `arguments` may contain objects nested one level deep. Deeper nesting
 * is not matched.
 */

import { ToolCall } from '../models/conversation';
import { ToolParseError } from '../models/errors';
import { logger } from '../utils/logger';

const TOOL_CALL_PATTERN = /\{\s*"name":\s*"([^"]+)",\s*"arguments":\s*(\{(?:[^{}]|\{[^{}]*\})*\})\s*\}/g;

export interface ParseOptions {
  /** Return false to drop a call by name. Dropped calls stay in the text, like unparseable ones. */
  accept?: (toolName: string) => boolean;
}

export interface ParsedToolCalls {
  toolCalls: ToolCall[];
  remainingText: string;
}

export function parseToolCalls(text: string, options: ParseOptions = {}): ParsedToolCalls {
  const toolCalls: ToolCall[] = [];
  const pieces: string[] = [];
  let cursor = 0;

  for (const match of text.matchAll(TOOL_CALL_PATTERN)) {
    const start = match.index ?? 0;
    const [whole, toolName, argumentsText] = match;

    if (options.accept && !options.accept(toolName)) {
      logger.info('Suppressed tool call left in text', {}, { toolName });
      continue;
    }

    try {
      const args = parseArguments(toolName, argumentsText);
      toolCalls.push({
        callId: `call_${toolCalls.length}`,
        toolName,
        arguments: args,
      });
    } catch (err) {
      if (!(err instanceof ToolParseError)) {
        throw err;
      }
      logger.warn('Skipping unparseable tool call', {}, { toolName, error: err.message });
      continue;
    }

    pieces.push(text.slice(cursor, start));
    cursor = start + whole.length;
  }
  pieces.push(text.slice(cursor));

  const remainingText = pieces
    .map((piece) => piece.trim())
    .filter((piece) => piece.length > 0)
    .join(' ');

  if (toolCalls.length === 0 && remainingText.length === 0) {
    return { toolCalls, remainingText: text };
  }
  return { toolCalls, remainingText };
}

/**
 * Strict JSON first, then one repair pass that swaps single quotes for
 * double quotes.
 */
function parseArguments(toolName: string, argumentsText: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(argumentsText);
  } catch {
    try {
      parsed = JSON.parse(argumentsText.replace(/'/g, '"'));
    } catch (err) {
      throw new ToolParseError(`Invalid arguments for ${toolName}: ${argumentsText}`, toolName, { cause: err });
    }
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ToolParseError(`Arguments for ${toolName} are not an object`, toolName);
  }
  return Object.fromEntries(Object.entries(parsed));
}
