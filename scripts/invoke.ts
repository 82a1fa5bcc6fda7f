/**
 * One-shot generation against Bedrock from the command line.
 *
 *   npm run invoke -- "What changed in the last release?"
 *
 * Reads LLM_MODEL, AWS_REGION, credentials etc. from the environment or .env.
 */

import 'dotenv/config';
import { loadEngineConfig } from '../src/config/env';
import { outcomeText } from '../src/models/conversation';
import { DEFAULT_TOOL_CATALOG } from '../src/services/conductor';
import { createOrchestrator } from '../src/services/orchestrator';
import { errorMessage, logger } from '../src/utils/logger';

async function main(): Promise<void> {
  const prompt = process.argv.slice(2).join(' ').trim();
  if (!prompt) {
    logger.error('Usage: npm run invoke -- "<prompt>"');
    process.exitCode = 1;
    return;
  }

  const config = loadEngineConfig();
  const orchestrator = createOrchestrator(config);

  const outcome = await orchestrator.generate({
    messages: [{ role: 'user', content: prompt }],
    maxTokens: config.maxTokens,
    temperature: config.temperature,
    systemPrompt: config.systemPrompt,
    toolCatalog: DEFAULT_TOOL_CATALOG,
  });

  logger.info('Generation result', { modelId: orchestrator.modelId }, {
    outcome: outcome.kind,
    text: outcomeText(outcome),
    toolCalls: outcome.kind === 'interpreted' ? outcome.result.toolCalls : [],
  });
}

main().catch((err: unknown) => {
  logger.error('Invocation failed', {}, { error: errorMessage(err) });
  process.exitCode = 1;
});
