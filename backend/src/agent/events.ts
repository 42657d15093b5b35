import type { ToolErrorKind } from '../types.js';
import type { ToolData } from './registry.js';

export type BestEffortReason = 'iteration_limit' | 'tool_timeout' | 'loop_timeout' | 'answer_timeout';

export type LoopState = 'Started' | 'Deciding' | 'ToolExecuting' | 'Answering' | 'Done' | 'Failed' | 'Cancelled';

/** Everything the reasoning loop reports, in the order it happens. */
export type LoopEvent =
  | { type: 'loop-started'; conversationId: string; maxIterations: number }
  | { type: 'tool-call'; tool: string; args: Record<string, unknown> }
  | {
      type: 'tool-result';
      tool: string;
      count: number;
      data: ToolData | null;
      error?: { kind: ToolErrorKind; message: string };
    }
  | { type: 'thumbnail-available'; fileId: number; fileName: string; thumbnailUrl: string }
  | { type: 'answer-started' }
  | { type: 'answer-chunk'; text: string }
  | { type: 'answer-complete' }
  | {
      type: 'loop-complete';
      conversationId: string;
      messageCount: number;
      bestEffort: boolean;
      reason?: BestEffortReason;
    }
  | { type: 'loop-cancelled'; conversationId: string }
  | { type: 'error'; message: string };
