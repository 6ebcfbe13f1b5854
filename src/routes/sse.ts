import Fastify, { type FastifyBaseLogger, type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import type { ServerContext } from '../mcp/context.js';
import { createMcpServer } from '../mcp/server.js';

export const SSE_PATH = '/sse';
export const MESSAGE_PATH = '/messages';

// Keep-alive comment interval, well under common proxy idle timeouts
const KEEPALIVE_INTERVAL_MS = 15_000;

interface SseSession {
  transport: SSEServerTransport;
  connectedAt: number;
}

export interface SseRoutesOptions {
  context: ServerContext;
}

/**
 * Register the MCP SSE binding:
 * - GET /sse opens the event stream and announces the message endpoint
 * - POST /messages?sessionId=... delivers client messages to that stream
 */
export async function sseRoutes(app: FastifyInstance, options: SseRoutesOptions): Promise<void> {
  const { context } = options;
  const sessions = new Map<string, SseSession>();

  app.addHook('onClose', async () => {
    for (const [sessionId, session] of sessions) {
      app.log.info({ sessionId }, 'Closing SSE session');
      await session.transport.close();
    }
    sessions.clear();
  });

  app.get(SSE_PATH, async (request: FastifyRequest, reply: FastifyReply) => {
    // The transport writes the response itself
    reply.hijack();

    const transport = new SSEServerTransport(MESSAGE_PATH, reply.raw);
    const sessionId = transport.sessionId;
    const connectedAt = Date.now();
    sessions.set(sessionId, { transport, connectedAt });

    const server = createMcpServer(context);
    try {
      await server.connect(transport);
    } catch (error) {
      app.log.error({ sessionId, err: error }, 'Failed to connect MCP server to SSE transport');
      sessions.delete(sessionId);
      if (!reply.raw.writableEnded) reply.raw.end();
      return;
    }
    app.log.info({ sessionId }, 'SSE connection established');

    const keepAlive = setInterval(() => {
      if (reply.raw.writableEnded || reply.raw.destroyed) {
        clearInterval(keepAlive);
        return;
      }
      reply.raw.write(': keepalive\n\n');
    }, KEEPALIVE_INTERVAL_MS);

    request.raw.on('close', () => {
      clearInterval(keepAlive);
      sessions.delete(sessionId);
      app.log.info(
        { sessionId, durationSec: Math.round((Date.now() - connectedAt) / 1000) },
        'SSE connection closed'
      );
      server.close().catch((error: unknown) => {
        app.log.warn({ sessionId, err: error }, 'Error closing MCP server');
      });
    });
  });

  app.post(MESSAGE_PATH, async (request: FastifyRequest<{ Querystring: { sessionId?: string } }>, reply: FastifyReply) => {
    const sessionId = request.query.sessionId;

    if (!sessionId) {
      return reply.code(400).send({
        error: 'bad_request',
        message: 'Missing sessionId parameter'
      });
    }

    const session = sessions.get(sessionId);
    if (!session) {
      return reply.code(404).send({
        error: 'session_not_found',
        message: `No active SSE connection for this sessionId. Connect to ${SSE_PATH} first.`
      });
    }

    // Hand the already-parsed body to the transport, which writes the response
    reply.hijack();
    try {
      await session.transport.handlePostMessage(request.raw, reply.raw, request.body);
    } catch (error) {
      app.log.error({ sessionId, err: error }, 'Error handling MCP message');
      if (!reply.raw.headersSent) {
        reply.raw.writeHead(500, { 'Content-Type': 'application/json' });
        reply.raw.end(JSON.stringify({ error: 'message_failed' }));
      }
    }
  });
}

/**
 * Build the HTTP app serving the SSE binding and a health check
 */
export async function buildSseApp(context: ServerContext, logger: FastifyBaseLogger): Promise<FastifyInstance> {
  const app = Fastify({ loggerInstance: logger });

  app.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString()
    };
  });

  await app.register(sseRoutes, { context });
  return app;
}
