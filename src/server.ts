import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import express, { type ErrorRequestHandler, type Express } from 'express';
import { createActionsRouter } from './actions.js';
import { describeError } from './errors.js';
import type { TaigaGateway } from './gateway.js';
import { logger } from './logging/index.js';
import { createMcpServer } from './tools.js';
import { isRecord } from './utils.js';

export interface AppOptions {
  gateway: TaigaGateway;
  apiKey?: string;
  /** Host header values accepted on /mcp; empty disables DNS rebinding protection. */
  allowedHosts?: string[];
}

function jsonRpcError(code: number, message: string) {
  return {
    jsonrpc: '2.0',
    error: { code, message },
    id: null,
  };
}

const mcpParseErrorHandler: ErrorRequestHandler = (err: unknown, _req, res, next) => {
  if (isRecord(err) && err.type === 'entity.parse.failed') {
    res.status(400).json(jsonRpcError(-32700, 'Parse error'));
    return;
  }
  next(err);
};

export function createApp(options: AppOptions): Express {
  const { gateway } = options;
  const allowedHosts = options.allowedHosts ?? [];

  const app = express();
  app.set('query parser', 'simple');
  app.disable('x-powered-by');

  app.get('/', (_req, res) => {
    res.type('text/plain').send('Taiga MCP up');
  });

  app.get('/healthz', (_req, res) => {
    res.type('text/plain').send('ok');
  });

  app.use('/actions', createActionsRouter(gateway, { apiKey: options.apiKey }));

  // ============================================
  // MCP (stateless Streamable HTTP)
  // ============================================
  // A new server and transport per request: nothing is shared between calls.

  app.post('/mcp', express.json(), async (req, res) => {
    const server = createMcpServer(gateway);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableDnsRebindingProtection: allowedHosts.length > 0,
      allowedHosts: allowedHosts.length > 0 ? allowedHosts : undefined,
    });

    res.on('close', () => {
      Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
        logger.warning('Failed to close MCP transport', { error: describeError(error) }, 'server');
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error('Error handling MCP request', { error: describeError(error) }, 'server');
      if (!res.headersSent) {
        res.status(500).json(jsonRpcError(-32603, 'Internal server error'));
      }
    }
  });

  app.get('/mcp', (_req, res) => {
    res.status(405).set('Allow', 'POST').json(jsonRpcError(-32000, 'Method not allowed.'));
  });

  app.delete('/mcp', (_req, res) => {
    res.status(405).set('Allow', 'POST').json(jsonRpcError(-32000, 'Method not allowed.'));
  });

  app.use('/mcp', mcpParseErrorHandler);

  return app;
}
