import type { ToolCall } from '../types.js';
import type { ToolSpec } from './registry.js';

export interface ModelMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export type Decision =
  | { kind: 'tools'; calls: ToolCall[] }
  | { kind: 'answer' };

export interface DecisionRequest {
  messages: ModelMessage[];
  tools: ToolSpec[];
}

/**
 * The text-generation model behind the loop: picks tools for the next
 * step, then writes the final answer.
 */
export interface DecisionModel {
  decide(request: DecisionRequest, signal: AbortSignal): Promise<Decision>;
  streamAnswer(messages: ModelMessage[], signal: AbortSignal): AsyncIterable<string>;
}
