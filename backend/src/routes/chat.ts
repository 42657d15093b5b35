import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { encodeStream } from '../agent/encoder.js';
import type { DecisionModel } from '../agent/decision.js';
import { runAgent, type AgentLimits } from '../agent/loop.js';
import type { ToolRegistry } from '../agent/registry.js';
import { InvalidArgsError, NotFoundError, errorMessage } from '../errors.js';
import type { ConversationStore } from '../services/conversations.js';
import type { Turn } from '../types.js';
import { requireUserId } from './identity.js';

// Hard cap on user message length. At 4 chars/token this is ~2000 tokens,
// enough for any reasonable question without crowding out tool results.
const MAX_QUESTION_CHARS = 8000;

export interface ChatRouteDeps {
  model: DecisionModel;
  tools: ToolRegistry;
  conversations: ConversationStore;
  limits: AgentLimits;
  corsOrigins: string[];
}

interface ChatRequest {
  query: string;
  conversationId: string | null;
  image: Buffer | null;
}

const JsonBodySchema = z.object({
  query: z.string(),
  conversation_id: z.string().uuid().nullish(),
  uploaded_image: z.string().nullish(),
});

const ConversationIdSchema = z.string().uuid();

const BASE64_PATTERN = /^[A-Za-z0-9+/_-]+={0,2}$/;

function decodeImage(encoded: string): Buffer {
  const base64 = encoded.replace(/^data:[^;,]+;base64,/, '').replace(/\s+/g, '');
  if (!BASE64_PATTERN.test(base64)) {
    throw new InvalidArgsError('uploaded_image is not valid base64');
  }
  return Buffer.from(base64, 'base64');
}

async function readMultipart(req: FastifyRequest): Promise<ChatRequest> {
  let query = '';
  let conversationId: string | null = null;
  let image: Buffer | null = null;

  for await (const part of req.parts()) {
    if (part.type === 'file') {
      const bytes = await part.toBuffer();
      if (part.fieldname === 'image' && bytes.length > 0) image = bytes;
      continue;
    }
    const value = typeof part.value === 'string' ? part.value : '';
    if (part.fieldname === 'query') query = value;
    if (part.fieldname === 'conversation_id' && value.trim()) {
      const parsed = ConversationIdSchema.safeParse(value.trim());
      if (!parsed.success) throw new InvalidArgsError('conversation_id must be a UUID');
      conversationId = parsed.data;
    }
  }

  return { query, conversationId, image };
}

async function readChatRequest(req: FastifyRequest): Promise<ChatRequest> {
  if (req.isMultipart()) return readMultipart(req);

  const parsed = JsonBodySchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    throw new InvalidArgsError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
  }
  const body = parsed.data;
  return {
    query: body.query,
    conversationId: body.conversation_id ?? null,
    image: body.uploaded_image ? decodeImage(body.uploaded_image) : null,
  };
}

function allowedOrigin(requestOrigin: string, allowed: string[]): string {
  if (!requestOrigin) return '*';
  const ok = allowed.includes(requestOrigin) || /^https?:\/\/(localhost|127\.0\.0\.1)(:\d+)?$/.test(requestOrigin);
  return ok ? requestOrigin : 'null';
}

export function chatRoutes(deps: ChatRouteDeps) {
  return async function (fastify: FastifyInstance): Promise<void> {
    fastify.post('/api/chat', async (req: FastifyRequest, reply: FastifyReply) => {
      const userId = requireUserId(req);
      const request = await readChatRequest(req);

      const question = request.query.trim();
      if (!question) {
        throw new InvalidArgsError('query is required');
      }
      // Truncate so a huge paste cannot push tool results out of the prompt.
      const safeQuestion =
        question.length > MAX_QUESTION_CHARS
          ? question.slice(0, MAX_QUESTION_CHARS) + ' [message truncated]'
          : question;

      let conversationId = request.conversationId;
      let history: Turn[] = [];
      if (conversationId) {
        const existing = await deps.conversations.getConversation(conversationId, userId);
        if (!existing) {
          throw new NotFoundError(`conversation ${conversationId} not found`);
        }
        history = existing.turns;
      } else {
        conversationId = uuidv4();
      }

      // We bypass Fastify's response pipeline by writing to reply.raw, so
      // CORS headers from the plugin never reach the client.
      reply.hijack();
      const raw = reply.raw;
      raw.setHeader('Access-Control-Allow-Origin', allowedOrigin(req.headers.origin ?? '', deps.corsOrigins));
      raw.setHeader('Access-Control-Allow-Credentials', 'true');
      raw.setHeader('Content-Type', 'text/event-stream');
      raw.setHeader('Cache-Control', 'no-cache');
      raw.setHeader('Connection', 'keep-alive');
      raw.setHeader('X-Accel-Buffering', 'no');
      raw.flushHeaders();

      const abortController = new AbortController();
      raw.on('close', () => {
        if (!raw.writableFinished) abortController.abort();
      });
      const transportOpen = () => !raw.destroyed && !raw.writableEnded;

      const events = runAgent(
        {
          query: safeQuestion,
          userId,
          conversationId,
          uploadedImage: request.image,
          history,
          signal: abortController.signal,
        },
        { model: deps.model, tools: deps.tools, conversations: deps.conversations },
        deps.limits
      );

      try {
        for await (const frame of encodeStream(events)) {
          if (transportOpen()) raw.write(frame);
        }
      } catch (err) {
        req.log.error({ err }, '[chat] stream failed');
        if (transportOpen()) {
          raw.write(`event: error\ndata: ${JSON.stringify({ message: errorMessage(err) })}\n\n`);
        }
      } finally {
        if (transportOpen()) raw.end();
      }
    });
  };
}
