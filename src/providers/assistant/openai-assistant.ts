import { setTimeout as sleep } from 'node:timers/promises';
import { request } from 'undici';
import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { ProviderError, errorMessage } from '../../utils/errors.js';
import { ASSISTANT_INSTRUCTIONS, ASSISTANT_NAME } from './golf-tools.js';
import type { AssistantConfig, AssistantProvider, AssistantTool } from './interface.js';

const idSchema = z.object({ id: z.string() });

const toolCallSchema = z.object({
  id: z.string(),
  type: z.string(),
  function: z.object({
    name: z.string(),
    arguments: z.string(),
  }),
});

const runSchema = z.object({
  id: z.string(),
  status: z.string(),
  required_action: z
    .object({
      type: z.string(),
      submit_tool_outputs: z.object({
        tool_calls: z.array(toolCallSchema),
      }),
    })
    .nullish(),
});

const messageListSchema = z.object({
  data: z.array(
    z.object({
      role: z.string(),
      content: z.array(
        z.object({
          type: z.string(),
          text: z.object({ value: z.string() }).optional(),
        }),
      ),
    }),
  ),
});

type Run = z.infer<typeof runSchema>;
type ToolCall = z.infer<typeof toolCallSchema>;

const PENDING_STATUSES = new Set(['queued', 'in_progress']);

/**
 * OpenAI Assistants API provider.
 *
 * Each call opens a new thread, posts the query, starts a run and polls it
 * with a doubling interval until it settles or `runTimeoutMs` elapses.
 * Function calls requested by the run are answered from the local tools.
 */
export class OpenAIAssistantProvider implements AssistantProvider {
  readonly name = 'openai-assistant';
  private config: AssistantConfig;
  private tools: Map<string, AssistantTool>;

  constructor(config: AssistantConfig, tools: readonly AssistantTool[] = []) {
    this.config = config;
    this.tools = new Map(tools.map((tool) => [tool.name, tool]));
  }

  async respond(query: string): Promise<string | null> {
    if (!this.config.apiKey) {
      throw new ProviderError(this.name, 'unavailable', 'OpenAI API key not configured');
    }

    const assistantId = await this.resolveAssistant();
    const thread = idSchema.parse(await this.call('POST', '/threads', {}));

    await this.call('POST', `/threads/${thread.id}/messages`, {
      role: 'user',
      content: query,
    });

    const created = runSchema.parse(
      await this.call('POST', `/threads/${thread.id}/runs`, { assistant_id: assistantId }),
    );
    const run = await this.waitForRun(thread.id, created);

    if (run.status !== 'completed') {
      logger.warn(`Assistant run ${run.id} ended with status ${run.status}`);
    }

    const messages = messageListSchema.parse(await this.call('GET', `/threads/${thread.id}/messages`));
    for (const message of messages.data) {
      if (message.role !== 'assistant') continue;
      const text = message.content.find((part) => part.type === 'text')?.text?.value;
      if (text !== undefined) {
        logger.debug(`Assistant response: "${text.substring(0, 100)}"`);
        return text;
      }
    }

    return null;
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.config.apiKey);
  }

  private async resolveAssistant(): Promise<string> {
    if (this.config.assistantId) {
      logger.debug(`Using existing assistant with ID: ${this.config.assistantId}`);
      return this.config.assistantId;
    }

    const assistant = idSchema.parse(
      await this.call('POST', '/assistants', {
        name: ASSISTANT_NAME,
        instructions: ASSISTANT_INSTRUCTIONS,
        model: this.config.model,
        tools: [...this.tools.values()].map((tool) => ({
          type: 'function',
          function: {
            name: tool.name,
            description: tool.description,
            parameters: tool.parameters,
          },
        })),
      }),
    );
    logger.info(`Created new assistant with ID: ${assistant.id}`);
    return assistant.id;
  }

  private async waitForRun(threadId: string, initial: Run): Promise<Run> {
    const deadline = Date.now() + this.config.runTimeoutMs;
    let delay = this.config.pollIntervalMs;
    let run = initial;

    for (;;) {
      if (run.status === 'requires_action' && run.required_action) {
        if (Date.now() > deadline) {
          throw new ProviderError(this.name, 'timeout', `Assistant run ${run.id} timed out awaiting tool outputs`);
        }
        run = await this.submitToolOutputs(threadId, run.id, run.required_action.submit_tool_outputs.tool_calls);
        continue;
      }

      if (!PENDING_STATUSES.has(run.status)) {
        return run;
      }

      if (Date.now() + delay > deadline) {
        throw new ProviderError(
          this.name,
          'timeout',
          `Assistant run ${run.id} still ${run.status} after ${this.config.runTimeoutMs}ms`,
        );
      }

      await sleep(delay);
      delay = Math.min(delay * 2, this.config.maxPollIntervalMs);
      run = runSchema.parse(await this.call('GET', `/threads/${threadId}/runs/${run.id}`));
    }
  }

  private async submitToolOutputs(threadId: string, runId: string, toolCalls: ToolCall[]): Promise<Run> {
    const toolOutputs = await Promise.all(
      toolCalls.map(async (call) => ({
        tool_call_id: call.id,
        output: JSON.stringify(await this.executeTool(call)),
      })),
    );

    return runSchema.parse(
      await this.call('POST', `/threads/${threadId}/runs/${runId}/submit_tool_outputs`, {
        tool_outputs: toolOutputs,
      }),
    );
  }

  private async executeTool(call: ToolCall): Promise<unknown> {
    const tool = this.tools.get(call.function.name);
    if (!tool) {
      logger.warn(`Assistant requested unknown tool: ${call.function.name}`);
      return { error: `Unknown tool: ${call.function.name}` };
    }

    try {
      const parsed: unknown = call.function.arguments ? JSON.parse(call.function.arguments) : {};
      const args = z.record(z.unknown()).parse(parsed);
      logger.debug(`Executing assistant tool ${tool.name}`, { args });
      return await tool.execute(args);
    } catch (error) {
      logger.warn(`Assistant tool ${tool.name} failed: ${errorMessage(error)}`);
      return { error: errorMessage(error) };
    }
  }

  private async call(method: 'GET' | 'POST', path: string, body?: unknown): Promise<unknown> {
    const response = await request(`${this.config.apiUrl}${path}`, {
      method,
      headers: {
        Authorization: `Bearer ${this.config.apiKey ?? ''}`,
        'Content-Type': 'application/json',
        'OpenAI-Beta': 'assistants=v2',
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    if (response.statusCode < 200 || response.statusCode >= 300) {
      const errorBody = await response.body.text();
      throw new ProviderError(
        this.name,
        'request',
        `Assistants API error on ${method} ${path} (${response.statusCode}): ${errorBody}`,
      );
    }

    return response.body.json();
  }
}
