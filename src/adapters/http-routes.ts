import { timingSafeEqual } from 'crypto';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { ZodType, ZodTypeDef } from 'zod';
import type { AdminService } from '../admin/admin-service';
import { ReloadFailed, describeError } from '../core/errors';
import type { Orchestrator } from '../core/orchestrator';
import { broadcastBodySchema, messageBodySchema, resetBodySchema, toInboundEvent } from './schemas';
import { wsHandler } from './ws-handler';

export type HttpDeps = {
  orchestrator: Pick<Orchestrator, 'handle'>;
  admin: AdminService;
  /** Shared secret every route except /health requires. */
  apiToken: string;
  health?: () => Record<string, unknown>;
};

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

// `Authorization: Bearer <token>`, or `?token=` for WebSocket clients that cannot set headers.
function presentedToken(req: FastifyRequest): string | undefined {
  const auth = firstHeader(req.headers.authorization);
  const bearer = auth?.match(/^Bearer\s+(\S+)$/i);
  if (bearer) return bearer[1];
  const query = req.query;
  if (typeof query === 'object' && query !== null && 'token' in query && typeof query.token === 'string') {
    return query.token;
  }
  return undefined;
}

export function tokenMatches(expected: string, presented: string | undefined): boolean {
  if (!expected || presented === undefined) return false;
  const a = Buffer.from(expected);
  const b = Buffer.from(presented);
  return a.length === b.length && timingSafeEqual(a, b);
}

function parseBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, req: FastifyRequest, reply: FastifyReply): T | null {
  const parsed = schema.safeParse(req.body);
  if (!parsed.success) {
    void reply.code(400).send({ error: 'invalid_body', issues: parsed.error.issues.map((i) => i.message) });
    return null;
  }
  return parsed.data;
}

export async function registerHttpRoutes(app: FastifyInstance, deps: HttpDeps) {
  const { orchestrator, admin } = deps;

  app.get('/health', async () => ({ status: 'ok', ...(deps.health?.() ?? {}) }));

  await app.register(async (api) => {
    api.addHook('onRequest', async (req, reply) => {
      if (!tokenMatches(deps.apiToken, presentedToken(req))) {
        return reply.code(401).send({ error: 'unauthorized' });
      }
    });

    api.get('/ws/chat', { websocket: true }, (socket) => {
      wsHandler(socket, orchestrator);
    });

    api.post('/api/messages', async (req, reply) => {
      const body = parseBody(messageBodySchema, req, reply);
      if (!body) return reply;
      const out = await orchestrator.handle(toInboundEvent(body));
      if (!out) return reply.code(204).send();
      return { reply: out.text, status: out.status, errorKind: out.errorKind ?? null };
    });

    await api.register(async (scope) => registerAdminRoutes(scope, admin));
  });
}

async function registerAdminRoutes(scope: FastifyInstance, admin: AdminService) {
  scope.addHook('preHandler', async (req, reply) => {
    if (!admin.isAdmin(firstHeader(req.headers['x-admin-id']))) {
      return reply.code(403).send({ error: 'forbidden' });
    }
  });

  scope.get('/admin/stats', async () => admin.stats());

  scope.post('/admin/reload', async (_req, reply) => {
    try {
      return await admin.reloadKnowledge();
    } catch (err) {
      const code = err instanceof ReloadFailed ? 502 : 500;
      return reply.code(code).send({ error: describeError(err) });
    }
  });

  scope.post('/admin/reset', async (req, reply) => {
    const body = parseBody(resetBodySchema, req, reply);
    if (!body) return reply;
    await admin.resetHistory(body.userId);
    return { ok: true, userId: body.userId };
  });

  scope.post('/admin/broadcast', async (req, reply) => {
    const body = parseBody(broadcastBodySchema, req, reply);
    if (!body) return reply;
    try {
      return await admin.broadcast(body.text);
    } catch (err) {
      return reply.code(503).send({ error: describeError(err) });
    }
  });
}
