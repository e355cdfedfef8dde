import Fastify, { type FastifyInstance } from 'fastify';
import websocket from '@fastify/websocket';
import { registerHttpRoutes, type HttpDeps } from './adapters/http-routes';

type ServerOpts = {
  logger?: boolean;
};

/** HTTP + WebSocket surface over the same orchestrator the Telegram bot uses. */
export async function buildServer(deps: HttpDeps, opts: ServerOpts = {}): Promise<FastifyInstance> {
  const server = Fastify({ logger: opts.logger ?? true });
  await server.register(websocket);
  await registerHttpRoutes(server, deps);
  return server;
}
