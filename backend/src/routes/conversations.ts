import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { InvalidArgsError, NotFoundError } from '../errors.js';
import type { ConversationStore } from '../services/conversations.js';
import { requireUserId } from './identity.js';

const ListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

type IdParams = { id: string };

export function conversationRoutes(conversations: ConversationStore) {
  return async function (fastify: FastifyInstance): Promise<void> {
    fastify.get('/api/conversations', async (req: FastifyRequest<{ Querystring: unknown }>, reply: FastifyReply) => {
      const userId = requireUserId(req);
      const parsed = ListQuerySchema.safeParse(req.query ?? {});
      if (!parsed.success) {
        throw new InvalidArgsError('limit must be an integer between 1 and 100');
      }

      const items = await conversations.listConversations(userId, parsed.data.limit);
      return reply.send({ conversations: items });
    });

    fastify.get('/api/conversations/:id', async (req: FastifyRequest<{ Params: IdParams }>, reply: FastifyReply) => {
      const userId = requireUserId(req);
      const conversation = await conversations.getConversation(req.params.id, userId);
      if (!conversation) {
        throw new NotFoundError(`conversation ${req.params.id} not found`);
      }
      return reply.send(conversation);
    });

    fastify.delete('/api/conversations/:id', async (req: FastifyRequest<{ Params: IdParams }>, reply: FastifyReply) => {
      const userId = requireUserId(req);
      const deleted = await conversations.deleteConversation(req.params.id, userId);
      if (!deleted) {
        throw new NotFoundError(`conversation ${req.params.id} not found`);
      }
      return reply.send({ ok: true, conversation_id: req.params.id });
    });
  };
}
