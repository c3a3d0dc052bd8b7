import express, { Request, Response, RequestHandler } from 'express';
import type { Server as HttpServer } from 'http';
import { randomUUID } from 'crypto';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { validateToken, getConfig } from './auth/middleware.js';
import { ToolRegistry } from './tools/index.js';
import { WebhookError } from './errors/index.js';
import { isRedisAvailable } from './utils/redis.js';
import type { WebhookIngestor } from './webhooks/ingestor.js';

export interface ServerOptions {
  port: number;
  /** Shared tool registry; one is built from the environment when omitted */
  registry?: ToolRegistry;
}

function headerValue(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * POST /webhook handler. The signature arrives in the `x-signature` header and the
 * event in the JSON body.
 */
export function handleWebhook(ingestor: WebhookIngestor): RequestHandler {
  return async (req: Request, res: Response) => {
    const signature = headerValue(req, 'x-signature');
    if (!signature) {
      res.status(400).json({ error: 'Missing x-signature header' });
      return;
    }

    try {
      const result = await ingestor.process(signature, req.body);
      res.status(200).json(result);
    } catch (error) {
      if (error instanceof WebhookError) {
        const status = error.kind === 'secret_not_configured' ? 503 : 401;
        res.status(status).json({ error: error.message });
        return;
      }
      console.error('[Webhook] Error processing delivery:', error);
      res.status(500).json({ error: 'Internal server error' });
    }
  };
}

export async function createServer(options: ServerOptions): Promise<express.Express> {
  const app = express();
  app.use(express.json());

  const config = getConfig();

  // Shared across connections so downloads and webhook events outlive MCP sessions
  const toolRegistry = options.registry ?? new ToolRegistry({
    intervals: config.intervals,
    webhookSecret: config.webhookSecret,
    redisUrl: config.redisUrl,
    downloadDir: config.downloadDir,
  });

  console.log('Tool registry created');

  // Store active transports and servers by sessionId
  const sessions: Record<string, { transport: StreamableHTTPServerTransport; server: McpServer }> = {};

  // Health check endpoint (no auth required)
  app.get('/health', async (_req: Request, res: Response) => {
    const redis = config.redisUrl ? ((await isRedisAvailable()) ? 'connected' : 'unavailable') : 'not configured';
    res.json({ status: 'healthy', timestamp: new Date().toISOString(), redis });
  });

  // Webhook deliveries authenticate with their signature, not the MCP token
  app.post('/webhook', handleWebhook(toolRegistry.webhooks));

  // MCP endpoint - handles all Streamable HTTP requests
  app.all('/mcp', validateToken, async (req: Request, res: Response) => {
    const sessionId = headerValue(req, 'mcp-session-id');

    if (sessionId && sessions[sessionId]) {
      const { transport } = sessions[sessionId];
      try {
        await transport.handleRequest(req, res, req.body);
      } catch (error) {
        console.error('Error handling MCP request:', error);
        if (!res.headersSent) {
          res.status(500).json({ error: 'Internal server error' });
        }
      }
      return;
    }

    // For new sessions (initialization), create a new server and transport
    const mcpServer = new McpServer({
      name: 'pacekeeper',
      version: '1.0.0',
    });

    toolRegistry.registerTools(mcpServer);

    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (newSessionId) => {
        console.log(`Session initialized: ${newSessionId}`);
        sessions[newSessionId] = { transport, server: mcpServer };
      },
      onsessionclosed: (closedSessionId) => {
        console.log(`Session closed: ${closedSessionId}`);
        delete sessions[closedSessionId];
      },
    });

    await mcpServer.connect(transport);

    try {
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      console.error('Error handling MCP request:', error);
      if (!res.headersSent) {
        res.status(500).json({ error: 'Internal server error' });
      }
    }
  });

  // Handle session termination via DELETE
  app.delete('/mcp', validateToken, async (req: Request, res: Response) => {
    const sessionId = headerValue(req, 'mcp-session-id');

    if (!sessionId || !sessions[sessionId]) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }

    const { transport, server } = sessions[sessionId];

    try {
      await transport.close();
      await server.close();
      delete sessions[sessionId];
      console.log(`Session terminated: ${sessionId}`);
      res.status(204).send();
    } catch (error) {
      console.error('Error terminating session:', error);
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: express.NextFunction) => {
    console.error('Server error:', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export async function startServer(options: ServerOptions): Promise<HttpServer> {
  const app = await createServer(options);

  return app.listen(options.port, () => {
    console.log(`Pacekeeper MCP server running on port ${options.port}`);
    console.log(`Health check: http://localhost:${options.port}/health`);
    console.log(`MCP endpoint: http://localhost:${options.port}/mcp`);
    console.log(`Webhook endpoint: http://localhost:${options.port}/webhook`);
  });
}
