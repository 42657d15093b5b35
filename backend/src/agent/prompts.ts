import type { ToolCall, Turn } from '../types.js';
import type { ModelMessage } from './decision.js';
import type { ToolData, ToolOutcome } from './registry.js';

export interface StepRecord {
  call: ToolCall;
  outcome: ToolOutcome;
}

const RESULTS_PER_TOOL = 5;

const DECISION_PROMPT = `You are an assistant that helps artists find assets in a catalog of production media files:
Blender scenes, images, videos, audio, code, spreadsheets and documents.
Decide which tools to call to answer the user's question. You may call several tools at once.
When earlier tool calls already gathered enough to answer, or the question is not about the catalog,
call no tools and reply with a short note that you are ready to answer.
If a tool failed, pick a different tool instead of repeating the same call.`;

const ANSWER_PROMPT = `You are an assistant for a catalog of production media files.
Answer the user's question using only the information gathered below. Mention files by name.
Be concise and specific. If nothing relevant was found, say so clearly. Do not invent files.`;

function historyMessages(history: Turn[]): ModelMessage[] {
  const messages: ModelMessage[] = [];
  for (const turn of history) {
    if (turn.role === 'user') messages.push({ role: 'user', content: turn.content });
    else if (turn.role === 'assistant') messages.push({ role: 'assistant', content: turn.content });
  }
  return messages;
}

function summarizeData(data: ToolData, limit: number): string {
  switch (data.kind) {
    case 'results': {
      if (data.results.length === 0) return 'no results';
      const lines = data.results.slice(0, limit).map((result) => {
        const score = result.similarity === null ? '' : ` similarity=${result.similarity.toFixed(3)}`;
        const size = result.width !== null && result.height !== null ? ` ${result.width}x${result.height}` : '';
        return `- [${result.file_id}] ${result.file_name} (${result.file_type}${size}) ${result.file_path}${score}`;
      });
      return `${data.results.length} results:\n${lines.join('\n')}`;
    }
    case 'counts': {
      const groups = data.counts.groups.map((group) => `${group.key}: ${group.count}`).join(', ');
      return `${data.counts.total} files by ${data.counts.group_by}: ${groups || 'none'}`;
    }
    case 'details': {
      const { file, media, thumbnail_url } = data.details;
      return JSON.stringify({ ...file, media, thumbnail_url });
    }
  }
}

export function summarizeStep(step: StepRecord, limit = RESULTS_PER_TOOL): string {
  const { call, outcome } = step;
  if (!outcome.ok) {
    return `tool ${call.name} failed (${outcome.errorKind}): ${outcome.message}`;
  }
  return `tool ${call.name} ${JSON.stringify(call.args)} returned ${summarizeData(outcome.data, limit)}`;
}

export function buildDecisionMessages(input: {
  query: string;
  history: Turn[];
  steps: StepRecord[];
  iteration: number;
  maxIterations: number;
  imageAttached: boolean;
}): ModelMessage[] {
  const parts = [`User question: ${input.query}`];
  if (input.imageAttached) {
    parts.push('The user attached an image; search_by_uploaded_image can use it.');
  }
  if (input.steps.length > 0) {
    parts.push(`Tool calls so far:\n${input.steps.map((step) => summarizeStep(step)).join('\n')}`);
  }
  parts.push(`Step ${input.iteration} of ${input.maxIterations}.`);

  return [
    { role: 'system', content: DECISION_PROMPT },
    ...historyMessages(input.history),
    { role: 'user', content: parts.join('\n\n') },
  ];
}

export function buildAnswerMessages(input: {
  query: string;
  history: Turn[];
  steps: StepRecord[];
  bestEffort: boolean;
}): ModelMessage[] {
  const gathered = input.steps.length > 0
    ? input.steps.map((step) => summarizeStep(step)).join('\n\n')
    : 'No tools were called.';

  const messages: ModelMessage[] = [
    { role: 'system', content: ANSWER_PROMPT },
    { role: 'system', content: `Information gathered:\n\n${gathered}` },
  ];
  if (input.bestEffort) {
    messages.push({
      role: 'system',
      content: 'The search was cut short. Say that the answer is based on partial results.',
    });
  }
  messages.push(...historyMessages(input.history), { role: 'user', content: input.query });
  return messages;
}
