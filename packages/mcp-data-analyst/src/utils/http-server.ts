/**
 * HTTP server utilities for the MCP endpoint
 *
 * Session management, JSON-RPC error responses and shutdown handling for the
 * streamable-http transport. The REST API lives in routes/api-routes.ts.
 */

import type { Server } from 'node:http';
import express, { type Request, type Response } from 'express';
import type { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { Logger } from './logger.ts';
import { errorMessage } from './errors.ts';

/**
 * Extracts MCP session ID from HTTP request headers
 */
export function getSessionId(headers: Request['headers']): string | undefined {
  const header = headers['mcp-session-id'] || headers['Mcp-Session-Id'];
  return typeof header === 'string' ? header : undefined;
}

function requestIdOf(body: unknown): unknown {
  return typeof body === 'object' && body !== null && 'id' in body ? body.id : null;
}

function isInitializeRequest(body: unknown): boolean {
  return typeof body === 'object' && body !== null && 'method' in body && body.method === 'initialize';
}

/** Client went away mid-request; not a server error. */
function isConnectionClosed(error: unknown): boolean {
  const message = errorMessage(error);
  return (
    message.includes('aborted') ||
    message.includes('closed') ||
    message.includes('ECONNRESET') ||
    message.includes('EPIPE')
  );
}

/**
 * Sends a JSON-RPC error response
 */
export function sendErrorResponse(
  res: Response,
  status: number,
  code: number,
  message: string,
  id: unknown = null,
): void {
  if (res.headersSent || res.closed || res.destroyed) return;
  res.status(status).json({
    jsonrpc: '2.0',
    error: { code, message },
    id,
  });
}

export interface HttpServerConfig {
  /** Server name for health check endpoint */
  serverName: string;
  version: string;
  /** Session transport map */
  transports: Map<string, StreamableHTTPServerTransport>;
  /** Creates a new MCP server instance with its transport */
  createSession: () => {
    server: { connect: (transport: StreamableHTTPServerTransport) => Promise<void> };
    transport: StreamableHTTPServerTransport;
  };
  logger: Logger;
}

/**
 * Creates standard Express endpoints for the MCP HTTP server
 *
 * - GET /health - Health check endpoint
 * - GET /mcp - SSE stream for an existing session
 * - DELETE /mcp - Session termination endpoint
 * - POST /mcp - Main MCP endpoint; creates a session on initialize
 */
export function setupMcpEndpoints(app: express.Application, config: HttpServerConfig): void {
  const { serverName, version, transports, createSession, logger } = config;

  app.use('/mcp', express.json({ limit: '10mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      server: serverName,
      version,
      activeSessions: transports.size,
    });
  });

  app.get('/mcp', async (req: Request, res: Response) => {
    const sessionId = getSessionId(req.headers);
    if (!sessionId) {
      sendErrorResponse(res, 400, -32000, 'Bad Request: No session ID provided');
      return;
    }

    const transport = transports.get(sessionId);
    if (!transport) {
      sendErrorResponse(res, 404, -32000, 'Session not found');
      return;
    }

    try {
      await transport.handleRequest(req, res);
    } catch (error) {
      if (isConnectionClosed(error)) {
        logger.debug({ sessionId, error: errorMessage(error) }, 'SSE stream connection closed');
        return;
      }
      logger.error({ sessionId, error: errorMessage(error) }, 'Error handling SSE stream request');
      sendErrorResponse(res, 500, -32603, 'Internal server error');
    }
  });

  app.delete('/mcp', async (req: Request, res: Response) => {
    const sessionId = getSessionId(req.headers);
    if (!sessionId) {
      sendErrorResponse(res, 400, -32000, 'Bad Request: No session ID provided');
      return;
    }

    const transport = transports.get(sessionId);
    if (!transport) {
      sendErrorResponse(res, 404, -32000, 'Session not found');
      return;
    }

    try {
      await transport.handleRequest(req, res, req.body);
      logger.info({ sessionId, totalSessions: transports.size - 1 }, 'Session deleted');
    } catch (error) {
      if (isConnectionClosed(error)) {
        logger.warn({ sessionId, error: errorMessage(error) }, 'Connection closed during session termination');
      } else {
        logger.error({ sessionId, error: errorMessage(error) }, 'Error handling session termination');
        sendErrorResponse(res, 500, -32603, 'Error handling session termination');
      }
    } finally {
      transports.delete(sessionId);
    }
  });

  app.post('/mcp', async (req: Request, res: Response) => {
    const requestId = requestIdOf(req.body);
    try {
      const sessionId = getSessionId(req.headers);

      if (sessionId) {
        const transport = transports.get(sessionId);
        if (!transport) {
          sendErrorResponse(res, 404, -32000, 'Session not found', requestId);
          return;
        }
        await transport.handleRequest(req, res, req.body);
        return;
      }

      // No session ID - only initialize requests may create a session
      if (!isInitializeRequest(req.body)) {
        sendErrorResponse(res, 400, -32000, 'Bad Request: No session ID provided', requestId);
        return;
      }

      const { server, transport } = createSession();
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      if (isConnectionClosed(error)) {
        logger.warn({ requestId, error: errorMessage(error) }, 'Client connection closed during request');
        return;
      }
      logger.error({ requestId, error: errorMessage(error) }, 'Error handling MCP request');
      sendErrorResponse(res, 500, -32603, 'Internal server error', requestId);
    }
  });
}

/**
 * Closes every session, then the HTTP server, then runs `onShutdown` and exits.
 */
export function setupGracefulShutdown(
  server: Server,
  transports: Map<string, StreamableHTTPServerTransport>,
  logger: Logger,
  onShutdown?: () => Promise<void>,
): void {
  const shutdown = async () => {
    logger.info('Shutting down...');
    for (const [sessionId, transport] of transports.entries()) {
      try {
        await transport.close();
      } catch (error) {
        logger.error({ error: errorMessage(error), sessionId }, 'Error closing transport');
      }
    }
    transports.clear();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    try {
      await onShutdown?.();
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Error during shutdown');
    }
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}
