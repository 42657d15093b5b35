import type { LoopEvent } from './events.js';
import type { ToolData } from './registry.js';

export interface WireEvent {
  event: string;
  data: Record<string, unknown>;
}

function toolPayload(data: ToolData | null): unknown {
  if (!data) return [];
  switch (data.kind) {
    case 'results':
      return data.results;
    case 'counts':
      return data.counts;
    case 'details':
      return data.details;
  }
}

/** Map one loop event to its wire form. Pure; holds no state. */
export function encodeEvent(event: LoopEvent): WireEvent {
  switch (event.type) {
    case 'loop-started':
      return {
        event: 'agent_start',
        data: { conversation_id: event.conversationId, max_iterations: event.maxIterations },
      };
    case 'tool-call':
      return { event: 'tool_call', data: { tool: event.tool, args: event.args } };
    case 'tool-result':
      return {
        event: 'tool_result',
        data: {
          tool: event.tool,
          count: event.count,
          results: toolPayload(event.data),
          ...(event.error ? { error: event.error } : {}),
        },
      };
    case 'thumbnail-available':
      return {
        event: 'thumbnail',
        data: { file_id: event.fileId, file_name: event.fileName, thumbnail_url: event.thumbnailUrl },
      };
    case 'answer-started':
      return { event: 'answer_start', data: {} };
    case 'answer-chunk':
      return { event: 'answer_chunk', data: { text: event.text } };
    case 'answer-complete':
      return { event: 'answer_end', data: {} };
    case 'loop-complete':
      return {
        event: 'done',
        data: {
          conversation_id: event.conversationId,
          message_count: event.messageCount,
          best_effort: event.bestEffort,
          ...(event.reason ? { reason: event.reason } : {}),
        },
      };
    case 'loop-cancelled':
      return { event: 'cancelled', data: { conversation_id: event.conversationId } };
    case 'error':
      return { event: 'error', data: { message: event.message } };
  }
}

export function formatSseFrame(wire: WireEvent): string {
  return `event: ${wire.event}\ndata: ${JSON.stringify(wire.data)}\n\n`;
}

export async function* encodeStream(events: AsyncIterable<LoopEvent>): AsyncGenerator<string> {
  for await (const event of events) {
    yield formatSseFrame(encodeEvent(event));
  }
}
