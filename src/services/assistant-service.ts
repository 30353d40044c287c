import { logger } from '../utils/logger.js';
import { ProviderError } from '../utils/errors.js';
import { fail, succeed, type Outcome } from '../utils/outcome.js';
import type { AssistantProvider } from '../providers/assistant/index.js';

export const NO_REPLY_MESSAGE = "I'm sorry, I couldn't process your request.";
export const ERROR_REPLY_MESSAGE = "I'm sorry, I encountered an error while processing your request.";

/**
 * Conversational-assistant adapter
 */
export class AssistantService {
  private provider: AssistantProvider;

  constructor(provider: AssistantProvider) {
    this.provider = provider;
  }

  /**
   * Get the assistant's reply to a query. A run that produced no assistant
   * message answers with NO_REPLY_MESSAGE; provider failures are returned
   * as a failed outcome.
   */
  async getResponse(query: string): Promise<Outcome<string>> {
    try {
      const reply = await this.provider.respond(query);
      return succeed(reply ?? NO_REPLY_MESSAGE);
    } catch (error) {
      const failure = ProviderError.from(this.provider.name, error);
      logger.error(`Assistant request failed (${this.provider.name}, ${failure.kind}): ${failure.message}`);
      return fail(failure);
    }
  }
}
