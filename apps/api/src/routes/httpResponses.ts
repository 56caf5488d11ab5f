import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';

export const FORBIDDEN_BODY = 'Forbidden';
export const INTERNAL_ERROR_BODY = 'Internal Server Error';

export function ok<T extends Record<string, unknown>>(payload: T): { ok: true } & T {
  return { ok: true, ...payload };
}

function sendPlainText(reply: FastifyReply, status: number, body: string): FastifyReply {
  return reply.status(status).type('text/plain; charset=utf-8').send(body);
}

// Every denial looks the same on the wire; the reason only goes to the log.
export function sendForbidden(reply: FastifyReply): FastifyReply {
  return sendPlainText(reply, 403, FORBIDDEN_BODY);
}

export function sendInternalError(reply: FastifyReply): FastifyReply {
  return sendPlainText(reply, 500, INTERNAL_ERROR_BODY);
}

// Errors carrying a 4xx status come from the request itself (body limits,
// malformed headers) and get the same denial as any other refused lookup.
export function handleRouteError(err: FastifyError, req: FastifyRequest, reply: FastifyReply): FastifyReply {
  if (typeof err.statusCode === 'number' && err.statusCode < 500) {
    req.log.info({ err }, 'request rejected');
    return sendForbidden(reply);
  }
  req.log.error({ err }, 'request failed');
  return sendInternalError(reply);
}
