import type { Config } from '../../config.js';
import { logger } from '../../utils/logger.js';
import type { AssistantProvider } from './interface.js';
import { OpenAIAssistantProvider } from './openai-assistant.js';
import { golfTools } from './golf-tools.js';

export type { AssistantProvider, AssistantConfig, AssistantTool } from './interface.js';
export { OpenAIAssistantProvider } from './openai-assistant.js';
export { golfTools } from './golf-tools.js';

/**
 * Create the assistant provider with the golf function-calling tools
 */
export function createAssistantProvider(openai: Config['openai']): AssistantProvider {
  logger.info(`Initializing assistant provider: openai-assistant (${openai.assistantId ?? openai.assistantModel})`);

  return new OpenAIAssistantProvider(
    {
      apiUrl: openai.apiUrl,
      apiKey: openai.apiKey,
      assistantId: openai.assistantId,
      model: openai.assistantModel,
      pollIntervalMs: openai.pollIntervalMs,
      maxPollIntervalMs: openai.maxPollIntervalMs,
      runTimeoutMs: openai.runTimeoutMs,
    },
    golfTools,
  );
}
