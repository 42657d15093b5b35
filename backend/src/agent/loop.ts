import PQueue from 'p-queue';
import { errorMessage } from '../errors.js';
import type { ConversationStore } from '../services/conversations.js';
import { getLogger } from '../services/logger.js';
import type { AssistantTurn, ToolCall, ToolCallTurn, Turn, UserTurn } from '../types.js';
import type { DecisionModel } from './decision.js';
import type { BestEffortReason, LoopEvent, LoopState } from './events.js';
import { buildAnswerMessages, buildDecisionMessages, type StepRecord } from './prompts.js';
import { resultCount, type ToolData, type ToolOutcome, type ToolRegistry } from './registry.js';

export interface AgentRequest {
  query: string;
  userId: string;
  conversationId: string;
  uploadedImage: Buffer | null;
  /** Prior turns of the conversation, oldest first. */
  history: Turn[];
  signal: AbortSignal;
}

export interface AgentDeps {
  model: DecisionModel;
  tools: ToolRegistry;
  conversations: ConversationStore;
  now?: () => Date;
}

export interface AgentLimits {
  maxIterations: number;
  historyTurns: number;
  toolConcurrency: number;
  toolTimeoutMs: number;
  loopTimeoutMs: number;
  answerTimeoutMs: number;
}

type PhaseResult<T> =
  | { status: 'ok'; value: T }
  | { status: 'timeout' }
  | { status: 'cancelled' };

class PhaseTimeout extends Error {
  constructor(ms: number) {
    super(`phase timed out after ${ms}ms`);
    this.name = 'PhaseTimeout';
  }
}

const log = getLogger('agent');

/**
 * Run `work` under its own abort signal that fires on caller cancellation
 * or after `timeoutMs`. Resolves as soon as either happens, even if the
 * work ignores the signal; its late result is dropped.
 */
async function runPhase<T>(
  parent: AbortSignal,
  timeoutMs: number,
  work: (signal: AbortSignal) => Promise<T>
): Promise<PhaseResult<T>> {
  if (parent.aborted) return { status: 'cancelled' };

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new PhaseTimeout(timeoutMs)), Math.max(0, timeoutMs));
  const onParentAbort = () => controller.abort(parent.reason);
  parent.addEventListener('abort', onParentAbort, { once: true });

  const interrupted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
  });
  const pending = work(controller.signal);
  pending.catch((err: unknown) => log.debug({ err: errorMessage(err) }, 'Discarded result of an interrupted phase'));

  try {
    return { status: 'ok', value: await Promise.race([pending, interrupted]) };
  } catch (err) {
    if (parent.aborted) return { status: 'cancelled' };
    if (controller.signal.reason instanceof PhaseTimeout) return { status: 'timeout' };
    throw err;
  } finally {
    clearTimeout(timer);
    parent.removeEventListener('abort', onParentAbort);
  }
}

function isQueueTimeout(err: unknown): boolean {
  return err instanceof Error && err.name === 'TimeoutError';
}

function* thumbnailsOf(data: ToolData, seen: Set<number>): Generator<LoopEvent> {
  const candidates =
    data.kind === 'results'
      ? data.results.map((result) => ({ id: result.file_id, name: result.file_name, url: result.thumbnail_url }))
      : data.kind === 'details'
        ? [{ id: data.details.file.id, name: data.details.file.file_name, url: data.details.thumbnail_url }]
        : [];

  for (const candidate of candidates) {
    if (!candidate.url || seen.has(candidate.id)) continue;
    seen.add(candidate.id);
    yield { type: 'thumbnail-available', fileId: candidate.id, fileName: candidate.name, thumbnailUrl: candidate.url };
  }
}

/**
 * The reasoning loop for one query. Every yielded event corresponds to a
 * state transition or to output produced inside a state; the generator's
 * return value is the terminal state.
 *
 *   Started → Deciding → (ToolExecuting → Deciding)* → Answering → Done
 *
 * Failed and Cancelled are reachable from any non-terminal state.
 */
export async function* runAgent(
  request: AgentRequest,
  deps: AgentDeps,
  limits: AgentLimits
): AsyncGenerator<LoopEvent, LoopState> {
  const now = deps.now ?? (() => new Date());
  const { signal, conversationId } = request;
  const runLog = log.child({ conversationId });

  let state: LoopState = 'Started';
  const transition = (next: LoopState) => {
    runLog.debug({ from: state, to: next }, 'Loop transition');
    state = next;
  };

  const userTurn: UserTurn = {
    role: 'user',
    content: request.query,
    image_attached: request.uploadedImage !== null,
    timestamp: now().toISOString(),
  };
  const history = limits.historyTurns > 0 ? request.history.slice(-limits.historyTurns) : [];
  const loopDeadline = Date.now() + limits.loopTimeoutMs;

  const steps: StepRecord[] = [];
  const calls: ToolCall[] = [];
  const toolTurns: ToolCallTurn[] = [];
  const seenThumbnails = new Set<number>();
  let reason: BestEffortReason | undefined;
  let iteration = 0;

  const cancelled = function* (): Generator<LoopEvent, LoopState> {
    transition('Cancelled');
    runLog.info({ iteration }, 'Loop cancelled');
    yield { type: 'loop-cancelled', conversationId };
    return 'Cancelled';
  };

  yield { type: 'loop-started', conversationId, maxIterations: limits.maxIterations };

  try {
    while (reason === undefined) {
      if (signal.aborted) return yield* cancelled();
      if (iteration >= limits.maxIterations) {
        reason = 'iteration_limit';
        break;
      }
      const remaining = loopDeadline - Date.now();
      if (remaining <= 0) {
        reason = 'loop_timeout';
        break;
      }

      iteration += 1;
      transition('Deciding');
      const decideStarted = Date.now();
      const decided = await runPhase(signal, remaining, (phaseSignal) =>
        deps.model.decide(
          {
            messages: buildDecisionMessages({
              query: request.query,
              history,
              steps,
              iteration,
              maxIterations: limits.maxIterations,
              imageAttached: request.uploadedImage !== null,
            }),
            tools: deps.tools.list(),
          },
          phaseSignal
        )
      );
      if (decided.status === 'cancelled') return yield* cancelled();
      if (decided.status === 'timeout') {
        reason = 'loop_timeout';
        break;
      }

      const decision = decided.value;
      runLog.info(
        { iteration, decision: decision.kind, ms: Date.now() - decideStarted },
        'Decision made'
      );
      if (decision.kind === 'answer' || decision.calls.length === 0) break;

      transition('ToolExecuting');
      for (const call of decision.calls) {
        yield { type: 'tool-call', tool: call.name, args: call.args };
      }

      const queue = new PQueue({ concurrency: limits.toolConcurrency });
      const ctx = { uploadedImage: request.uploadedImage };
      const executed = await runPhase(signal, loopDeadline - Date.now(), () =>
        Promise.allSettled(
          decision.calls.map((call) =>
            queue.add(() => deps.tools.invoke(call.name, call.args, ctx), {
              timeout: limits.toolTimeoutMs,
              throwOnTimeout: true,
            })
          )
        )
      );
      if (executed.status === 'cancelled') return yield* cancelled();
      if (executed.status === 'timeout') {
        reason = 'loop_timeout';
        break;
      }

      let toolTimedOut = false;
      for (const [index, call] of decision.calls.entries()) {
        const settled = executed.value[index];
        let outcome: ToolOutcome;
        if (settled?.status === 'fulfilled') {
          outcome = settled.value;
        } else if (settled && isQueueTimeout(settled.reason)) {
          toolTimedOut = true;
          outcome = {
            ok: false,
            errorKind: 'ExecutionError',
            message: `timed out after ${limits.toolTimeoutMs}ms`,
          };
        } else {
          outcome = { ok: false, errorKind: 'ExecutionError', message: errorMessage(settled?.reason) };
        }

        steps.push({ call, outcome });
        calls.push(call);
        toolTurns.push({
          role: 'tool_call',
          tool: call.name,
          args: call.args,
          ok: outcome.ok,
          result_count: outcome.ok ? resultCount(outcome.data) : 0,
          error_kind: outcome.ok ? null : outcome.errorKind,
          message: outcome.ok ? null : outcome.message,
          timestamp: now().toISOString(),
        });

        if (outcome.ok) {
          yield { type: 'tool-result', tool: call.name, count: resultCount(outcome.data), data: outcome.data };
          yield* thumbnailsOf(outcome.data, seenThumbnails);
        } else {
          yield {
            type: 'tool-result',
            tool: call.name,
            count: 0,
            data: null,
            error: { kind: outcome.errorKind, message: outcome.message },
          };
        }
      }

      if (toolTimedOut) reason = 'tool_timeout';
    }

    if (signal.aborted) return yield* cancelled();

    transition('Answering');
    if (reason) runLog.info({ iteration, reason }, 'Answering with partial results');
    yield { type: 'answer-started' };

    let answer = '';
    const answerMessages = buildAnswerMessages({
      query: request.query,
      history,
      steps,
      bestEffort: reason !== undefined,
    });
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new PhaseTimeout(limits.answerTimeoutMs)), limits.answerTimeoutMs);
    const onAbort = () => controller.abort(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      const chunks = deps.model.streamAnswer(answerMessages, controller.signal)[Symbol.asyncIterator]();
      for (;;) {
        const next = await runPhase(controller.signal, limits.answerTimeoutMs, () => chunks.next());
        if (next.status !== 'ok') {
          chunks.return?.().catch((err: unknown) => runLog.debug({ err: errorMessage(err) }, 'Answer stream close failed'));
          if (signal.aborted) return yield* cancelled();
          reason = 'answer_timeout';
          runLog.warn({ chars: answer.length }, 'Answer generation timed out, keeping partial text');
          break;
        }
        if (next.value.done) break;
        answer += next.value.value;
        yield { type: 'answer-chunk', text: next.value.value };
      }
    } finally {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
    }

    if (signal.aborted) return yield* cancelled();
    yield { type: 'answer-complete' };

    const assistantTurn: AssistantTurn = {
      role: 'assistant',
      content: answer,
      tool_calls: calls,
      best_effort: reason !== undefined,
      timestamp: now().toISOString(),
    };
    const { messageCountAfter } = await deps.conversations.appendTurns(
      conversationId,
      request.userId,
      [userTurn, ...toolTurns, assistantTurn]
    );

    transition('Done');
    runLog.info({ iteration, tools: calls.length, bestEffort: reason !== undefined, reason }, 'Loop done');
    yield {
      type: 'loop-complete',
      conversationId,
      messageCount: messageCountAfter,
      bestEffort: reason !== undefined,
      ...(reason ? { reason } : {}),
    };
    return 'Done';
  } catch (err) {
    if (signal.aborted) return yield* cancelled();

    transition('Failed');
    runLog.error({ err, iteration }, 'Loop failed');
    try {
      await deps.conversations.appendTurn(conversationId, request.userId, userTurn);
    } catch (persistErr) {
      runLog.error({ err: persistErr }, 'Could not persist user turn after failure');
    }
    yield { type: 'error', message: errorMessage(err) };
    return 'Failed';
  }
}
