#!/usr/bin/env node

/**
 * REST API server for the spelling corrector
 * Exposes the CLI functionality via HTTP endpoints
 */

import { createServer, IncomingMessage, ServerResponse } from 'http';
import { printPerfCountersAndReset } from '@corrector/core';
import { Corrector, configFromEnv } from '@corrector/data';
import { config } from 'dotenv';
import { readRequestBody } from './body.js';
import { dispatch, type SpellingService } from './routes.js';

// Parse environment variables
config();

const PORT = parseInt(process.env.PORT || '3100', 10);

/**
 * Send JSON response
 */
function sendJson(res: ServerResponse, data: unknown, status = 200, requestId?: string): void {
  const json = JSON.stringify(data);
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(json);
  if (requestId) {
    console.log(`[${requestId}] Response sent: ${json.length} bytes, status ${status}`);
  }
}

export function createRequestHandler(service: SpellingService) {
  return async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const requestId = Math.random().toString(36).substring(7);
    const startTime = Date.now();
    const url = new URL(req.url || '/', `http://${req.headers.host ?? 'localhost'}`);
    const method = req.method ?? 'GET';

    console.log(`[${requestId}] START ${method} ${url.pathname}`);

    // CORS headers
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      console.log(`[${requestId}] END OPTIONS ${url.pathname} - ${Date.now() - startTime}ms`);
      return;
    }

    const response = await dispatch(service, method, url.pathname, () =>
      readRequestBody(req, req.headers['content-length'])
    );
    sendJson(res, response.body, response.status, requestId);
    console.log(`[${requestId}] END ${url.pathname} - ${Date.now() - startTime}ms`);
  };
}

/**
 * Start the server
 */
async function main(): Promise<void> {
  process.on('unhandledRejection', (reason) => {
    console.error('UNHANDLED REJECTION:', reason);
  });

  const session = Corrector.load(configFromEnv());
  const stats = session.stats();
  console.log(`Loaded ${stats.words} words for '${stats.language}' (${stats.infinitives} infinitives)`);

  const handler = createRequestHandler(session);
  const server = createServer((req, res) => {
    handler(req, res).catch((error) => {
      console.error('Request error:', error);
      if (!res.headersSent) sendJson(res, { error: 'Internal server error' }, 500);
    });
  });

  // Bind to 0.0.0.0 to allow external connections
  server.listen(PORT, '0.0.0.0', () => {
    console.log(`Corrector API server listening on http://0.0.0.0:${PORT}`);
    console.log(`Health check: http://0.0.0.0:${PORT}/health`);
    console.log(`API docs: http://0.0.0.0:${PORT}/api`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down gracefully...`);
    server.close(() => {
      console.log('Server closed');
      printPerfCountersAndReset();
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

// Run server if this is the entry point
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error(`FATAL: ${error}`);
    process.exit(2);
  });
}
