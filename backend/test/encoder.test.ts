import { describe, it, expect } from 'vitest';
import { encodeEvent, encodeStream, formatSseFrame } from '../src/agent/encoder.js';
import type { LoopEvent } from '../src/agent/events.js';
import { parseSse } from './helpers.js';

async function* fromArray(events: LoopEvent[]): AsyncGenerator<LoopEvent> {
  for (const event of events) yield event;
}

describe('encodeEvent', () => {
  it('maps loop events to their wire names', () => {
    const events: LoopEvent[] = [
      { type: 'loop-started', conversationId: 'c1', maxIterations: 5 },
      { type: 'tool-call', tool: 'keyword_search', args: { query: 'forest' } },
      { type: 'answer-started' },
      { type: 'answer-chunk', text: 'Hi' },
      { type: 'answer-complete' },
      { type: 'loop-cancelled', conversationId: 'c1' },
      { type: 'error', message: 'boom' },
    ];
    expect(events.map((event) => encodeEvent(event).event)).toEqual([
      'agent_start',
      'tool_call',
      'answer_start',
      'answer_chunk',
      'answer_end',
      'cancelled',
      'error',
    ]);
  });

  it('encodes a failed tool result with an empty payload and the error', () => {
    expect(
      encodeEvent({
        type: 'tool-result',
        tool: 'get_file_details',
        count: 0,
        data: null,
        error: { kind: 'NotFound', message: 'file 9 not found' },
      })
    ).toEqual({
      event: 'tool_result',
      data: {
        tool: 'get_file_details',
        count: 0,
        results: [],
        error: { kind: 'NotFound', message: 'file 9 not found' },
      },
    });
  });

  it('carries analytics counts as the result payload', () => {
    const counts = { group_by: 'type' as const, total: 2, groups: [{ key: 'image', count: 2 }] };
    expect(encodeEvent({ type: 'tool-result', tool: 'analytics_query', count: 1, data: { kind: 'counts', counts } }).data)
      .toEqual({ tool: 'analytics_query', count: 1, results: counts });
  });

  it('includes the best-effort reason only when there is one', () => {
    expect(
      encodeEvent({ type: 'loop-complete', conversationId: 'c1', messageCount: 3, bestEffort: false }).data
    ).toEqual({ conversation_id: 'c1', message_count: 3, best_effort: false });
    expect(
      encodeEvent({
        type: 'loop-complete',
        conversationId: 'c1',
        messageCount: 5,
        bestEffort: true,
        reason: 'iteration_limit',
      }).data
    ).toEqual({ conversation_id: 'c1', message_count: 5, best_effort: true, reason: 'iteration_limit' });
  });

  it('encodes thumbnails with snake_case fields', () => {
    expect(
      encodeEvent({ type: 'thumbnail-available', fileId: 4, fileName: 'a.png', thumbnailUrl: 'http://x/t.jpg' })
    ).toEqual({ event: 'thumbnail', data: { file_id: 4, file_name: 'a.png', thumbnail_url: 'http://x/t.jpg' } });
  });
});

describe('formatSseFrame', () => {
  it('writes one event line, one data line and a blank line', () => {
    expect(formatSseFrame({ event: 'answer_chunk', data: { text: 'line one\nline two' } })).toBe(
      'event: answer_chunk\ndata: {"text":"line one\\nline two"}\n\n'
    );
  });
});

describe('encodeStream', () => {
  it('preserves order and produces parseable frames', async () => {
    let body = '';
    for await (const frame of encodeStream(
      fromArray([
        { type: 'answer-started' },
        { type: 'answer-chunk', text: 'a' },
        { type: 'answer-chunk', text: 'b' },
        { type: 'answer-complete' },
      ])
    )) {
      body += frame;
    }

    expect(parseSse(body)).toEqual([
      { event: 'answer_start', data: {} },
      { event: 'answer_chunk', data: { text: 'a' } },
      { event: 'answer_chunk', data: { text: 'b' } },
      { event: 'answer_end', data: {} },
    ]);
  });
});
