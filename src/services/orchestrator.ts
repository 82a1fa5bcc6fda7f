/**
 * Invocation orchestrator — the single generate() entry point.
 *
 * Flow:
 * 1. Loop guard pre-check; a detected loop is answered locally (no Bedrock call)
 * 2. Format the conversation for the model's provider family
 * 3. Invoke Bedrock (retries and reconnects live in the executor)
 * 4. Extract the answer text
 * 5. Parse embedded tool calls; repeat web searches are left as text
 */

import { EngineConfig } from '../config/env';
import { resolveModelId } from '../config/models';
import {
  ConversationTurn,
  estimateUsage,
  GenerationOutcome,
  GenerationRequest,
  InterpretedResult,
  TerminalResponse,
  ToolDescriptor,
} from '../models/conversation';
import { FormatError, GenerationFailedError, GenerationPhase } from '../models/errors';
import { logger } from '../utils/logger';
import { bedrockConnectionFactory, InvocationExecutor } from './invocationExecutor';
import {
  DEFAULT_LOOP_WINDOW,
  analyzeWindow,
  isPlanningTurn,
  isSearchTurn,
  LoopAnalysis,
  recentTurns,
  shouldForceTerminate,
  shouldSuppressSearch,
} from './loopGuard';
import {
  extractText,
  formatRequest,
  PROVIDER_FAMILIES,
  ProviderEnvelope,
  ProviderFamily,
  resolveProviderFamily,
} from './providerFamilies';
import { parseToolCalls } from './toolCallParser';

export const WEB_SEARCH_TOOL = 'web_search';

export type OrchestratorState =
  | 'start'
  | 'terminated_by_guard'
  | 'formatting'
  | 'invoking'
  | 'extracting'
  | 'parsing'
  | 'done'
  | 'failed';

export interface TerminalContext {
  history: readonly ConversationTurn[];
  analysis: LoopAnalysis;
  window: number;
}

/** Produces the final answer that replaces a model call when the loop guard fires. */
export type TerminalResponder = (context: TerminalContext) => string;

export interface GenerateOptions {
  signal?: AbortSignal;
  sessionId?: string;
}

export interface InvocationOrchestratorOptions {
  executor: InvocationExecutor;
  /** Defaults to the family matching the executor's model id. */
  family?: ProviderFamily;
  terminalResponder?: TerminalResponder;
  loopWindow?: number;
}

// ─── Prompt helpers ─────────────────────────────────────────────────────────

export function buildToolInstructions(tools: readonly ToolDescriptor[]): string {
  const lines = [
    'AVAILABLE TOOLS:',
    ...tools.map((tool) => `- ${tool.name}: ${tool.description}`),
    '',
    'TOOL USAGE INSTRUCTIONS:',
    'When you need to use a tool, format your response as JSON like this:',
    '{"name": "tool_name", "arguments": {"param1": "value1", "param2": "value2"}}',
    'You can use multiple tools in sequence.',
  ];

  if (tools.some((tool) => tool.name === WEB_SEARCH_TOOL)) {
    lines.push(
      '',
      'RULES:',
      `- Use ${WEB_SEARCH_TOOL} ONLY ONCE per task`,
      '- After getting search results, never search again',
      '- Write the final answer immediately with the information obtained',
    );
  }

  return lines.join('\n');
}

export function buildSystemTurn(request: GenerationRequest): ConversationTurn | null {
  const parts: string[] = [];
  if (request.systemPrompt) {
    parts.push(request.systemPrompt);
  }
  if (request.toolCatalog.length > 0) {
    parts.push(buildToolInstructions(request.toolCatalog));
  }
  return parts.length > 0 ? { role: 'system', content: parts.join('\n\n') } : null;
}

/**
 * Default terminal answer: the latest assistant turn in the window that is
 * neither a search nor a planning step, framed as the final result.
 */
export const summarizeFindings: TerminalResponder = ({ history, window }) => {
  const findings = recentTurns(history, window)
    .filter((turn) => turn.role === 'assistant' && !isSearchTurn(turn) && !isPlanningTurn(turn));
  const latest = findings[findings.length - 1];

  if (!latest) {
    return [
      'I have already gathered the available information for this task.',
      'Further searching or planning would not add anything new, so this concludes the task.',
      'Ask a more specific question if you need additional detail.',
    ].join(' ');
  }

  return `Based on the information gathered so far, here is the final answer:\n\n${latest.content.trim()}`;
};

// ─── Orchestrator ───────────────────────────────────────────────────────────

export class InvocationOrchestrator {
  private readonly executor: InvocationExecutor;
  private readonly family: ProviderFamily;
  private readonly terminalResponder: TerminalResponder;
  private readonly loopWindow: number;

  constructor(options: InvocationOrchestratorOptions) {
    this.executor = options.executor;
    this.family = options.family ?? resolveProviderFamily(options.executor.modelId);
    this.terminalResponder = options.terminalResponder ?? summarizeFindings;
    this.loopWindow = options.loopWindow ?? DEFAULT_LOOP_WINDOW;
    if (!Number.isInteger(this.loopWindow) || this.loopWindow < 1) {
      throw new RangeError(`loopWindow must be a positive integer, got ${this.loopWindow}`);
    }
  }

  get modelId(): string {
    return this.executor.modelId;
  }

  async generate(request: GenerationRequest, options: GenerateOptions = {}): Promise<GenerationOutcome> {
    const ctx = { sessionId: options.sessionId, modelId: this.modelId };
    const history = request.messages;
    let state: OrchestratorState = 'start';

    const transition = (next: OrchestratorState): void => {
      logger.debug(`Generation ${state} -> ${next}`, ctx);
      state = next;
    };

    if (shouldForceTerminate(history, this.loopWindow)) {
      transition('terminated_by_guard');
      const response = this.terminate(history);
      logger.info('Loop guard forced a final answer', ctx, {
        searchCount: response.searchCount,
        planningCount: response.planningCount,
      });
      return { kind: 'terminated', response };
    }

    let phase: GenerationPhase = 'formatting';
    let rawText: string;

    try {
      transition('formatting');
      const envelope = this.format(request);

      phase = 'invoking';
      transition('invoking');
      const raw = await this.executor.invoke(envelope, options.signal);

      phase = 'extracting';
      transition('extracting');
      rawText = extractText(raw, PROVIDER_FAMILIES[envelope.family]);
    } catch (err) {
      transition('failed');
      logger.error('Generation failed', ctx, {
        phase,
        error: err instanceof Error ? err.message : String(err),
      });
      throw new GenerationFailedError(phase, err);
    }

    transition('parsing');
    const result = this.interpret(rawText, history);
    transition('done');

    logger.info('Generation complete', ctx, {
      toolCalls: result.toolCalls.map((call) => call.toolName),
      usageEstimate: result.usageEstimate,
    });
    return { kind: 'interpreted', result };
  }

  private terminate(history: readonly ConversationTurn[]): TerminalResponse {
    const analysis = analyzeWindow(history, this.loopWindow);
    const text = this.terminalResponder({ history, analysis, window: this.loopWindow });
    return {
      text,
      usageEstimate: estimateUsage(text),
      searchCount: analysis.searchCount,
      planningCount: analysis.planningCount,
    };
  }

  private format(request: GenerationRequest): ProviderEnvelope {
    if (request.messages.length === 0) {
      throw new FormatError('Conversation history is empty');
    }

    const systemTurn = buildSystemTurn(request);
    const messages = systemTurn ? [systemTurn, ...request.messages] : [...request.messages];

    return formatRequest(messages, {
      maxTokens: request.maxTokens,
      temperature: request.temperature,
    }, this.family);
  }

  private interpret(rawText: string, history: readonly ConversationTurn[]): InterpretedResult {
    const suppressSearch = shouldSuppressSearch(history, this.loopWindow);
    const { toolCalls, remainingText } = parseToolCalls(rawText, {
      accept: suppressSearch ? (name) => name !== WEB_SEARCH_TOOL : undefined,
    });

    let textSegments: string[] = [];
    if (remainingText.trim()) {
      textSegments = [remainingText];
    } else if (toolCalls.length === 0) {
      textSegments = [rawText];
    }

    return {
      textSegments,
      toolCalls,
      usageEstimate: estimateUsage(rawText),
      rawText,
    };
  }
}

// ─── Factory ────────────────────────────────────────────────────────────────

export function createOrchestrator(
  config: EngineConfig,
  overrides: Omit<InvocationOrchestratorOptions, 'executor'> = {},
): InvocationOrchestrator {
  const modelId = resolveModelId(config.modelName);
  const executor = new InvocationExecutor({
    modelId,
    connect: bedrockConnectionFactory({
      region: config.region,
      credentials: config.credentials,
    }),
  });

  return new InvocationOrchestrator({ executor, ...overrides });
}
