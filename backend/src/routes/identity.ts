import type { FastifyRequest } from 'fastify';
import { UnauthorizedError } from '../errors.js';

export const USER_HEADER = 'x-user-id';

/** The gateway in front of the backend authenticates and forwards the user id. */
export function requireUserId(req: FastifyRequest): string {
  const raw = req.headers[USER_HEADER];
  const value = (Array.isArray(raw) ? raw[0] : raw)?.trim();
  if (!value) {
    throw new UnauthorizedError(`missing ${USER_HEADER} header`);
  }
  return value;
}
