import Groq from 'groq-sdk';
import type { ChatCompletionMessageParam, ChatCompletionTool } from 'groq-sdk/resources/chat/completions';
import type { Decision, DecisionModel, DecisionRequest, ModelMessage } from '../agent/decision.js';
import { GenerationBackendUnavailable, errorMessage, isAbortError } from '../errors.js';
import type { ToolCall } from '../types.js';
import { getLogger } from './logger.js';

export interface GroqModelOptions {
  apiKey: string;
  chatModel: string;
}

/** The part of a chat completion message the decision step reads. */
export interface ToolCallingMessage {
  content?: string | null;
  tool_calls?: Array<{ id?: string; function: { name: string; arguments: string } }> | null;
}

/**
 * Tool arguments arrive as a JSON string. Anything that is not a JSON
 * object is kept under `arguments` so validation reports it.
 */
export function parseToolArguments(raw: string): Record<string, unknown> {
  if (!raw.trim()) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { arguments: raw };
  }
  if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
    return Object.fromEntries(Object.entries(parsed));
  }
  return { arguments: raw };
}

export function toDecision(message: ToolCallingMessage | undefined): Decision {
  const toolCalls = message?.tool_calls ?? [];
  if (toolCalls.length === 0) return { kind: 'answer' };

  const calls: ToolCall[] = toolCalls.map((call, index) => ({
    id: call.id || `call_${index}`,
    name: call.function.name,
    args: parseToolArguments(call.function.arguments),
  }));
  return { kind: 'tools', calls };
}

function toGroqMessage(message: ModelMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

/** Decision model on Groq chat completions with native tool calling. */
export class GroqDecisionModel implements DecisionModel {
  private readonly client: Groq;
  private readonly log = getLogger('groq');

  constructor(
    private readonly options: GroqModelOptions,
    client?: Groq
  ) {
    this.client = client ?? new Groq({ apiKey: options.apiKey });
  }

  async decide(request: DecisionRequest, signal: AbortSignal): Promise<Decision> {
    const tools: ChatCompletionTool[] = request.tools.map((tool) => ({
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters,
      },
    }));

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.options.chatModel,
          messages: request.messages.map(toGroqMessage),
          tools,
          tool_choice: 'auto',
          temperature: 0.2,
          max_tokens: 1024,
        },
        { signal }
      );
      return toDecision(response.choices[0]?.message);
    } catch (err) {
      throw this.wrap(err, signal, 'decide');
    }
  }

  /**
   * Stream the final answer. Yields text chunks as they arrive and stops
   * when `signal` aborts.
   */
  async *streamAnswer(messages: ModelMessage[], signal: AbortSignal): AsyncGenerator<string> {
    try {
      const stream = await this.client.chat.completions.create(
        {
          model: this.options.chatModel,
          messages: messages.map(toGroqMessage),
          stream: true,
          max_tokens: 2048,
          temperature: 0.7,
        },
        { signal }
      );

      for await (const chunk of stream) {
        const token = chunk.choices[0]?.delta?.content;
        if (token) yield token;
      }
    } catch (err) {
      throw this.wrap(err, signal, 'streamAnswer');
    }
  }

  private wrap(err: unknown, signal: AbortSignal, operation: string): unknown {
    if (signal.aborted || isAbortError(err)) return err;
    this.log.error({ model: this.options.chatModel, operation, err: errorMessage(err) }, 'Groq request failed');
    return new GenerationBackendUnavailable(`generation backend unavailable: ${errorMessage(err)}`, { cause: err });
  }
}
