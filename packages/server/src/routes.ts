// HTTP routes for CrowdSim Server
// Node http module with manual body parsing. CORS on all responses.

import type * as http from 'node:http';
import { timingSafeEqual } from 'node:crypto';
import { ConflictError, ConfigValidationError, describeError } from '@crowdsim/core';
import type { CrowdSimServer } from './CrowdSimServer.js';
import { parseAnalyzeRequest, parseStartRequest, sanitizeJson, toWireResults, toWireState } from './validation.js';

function setSecurityHeaders(res: http.ServerResponse): void {
  res.setHeader('X-Content-Type-Options', 'nosniff');
  res.setHeader('X-Frame-Options', 'DENY');
  res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
}

function setCorsHeaders(res: http.ServerResponse, allowedOrigin: string, requestOrigin?: string): void {
  setSecurityHeaders(res);
  // Reflect the request origin only when it matches; non-browser requests get the configured origin.
  let origin: string;
  if (allowedOrigin === '*') {
    origin = '*';
  } else if (requestOrigin === undefined) {
    origin = allowedOrigin;
  } else {
    origin = requestOrigin.toLowerCase() === allowedOrigin.toLowerCase() ? requestOrigin : '';
  }
  if (origin) {
    res.setHeader('Access-Control-Allow-Origin', origin);
  }
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
}

export function checkAuth(header: string | undefined, apiKey: string | undefined): boolean {
  if (!apiKey) return true; // no key configured = open
  if (typeof header !== 'string') return false;
  const given = Buffer.from(header);
  const expected = Buffer.from(`Bearer ${apiKey}`);
  if (given.length !== expected.length) return false;
  return timingSafeEqual(given, expected);
}

function json(res: http.ServerResponse, status: number, data: unknown, origin: string, reqOrigin?: string): void {
  setCorsHeaders(res, origin, reqOrigin);
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

const MAX_BODY_BYTES = 1_048_576; // 1 MB

class BodyTooLargeError extends Error {}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let totalBytes = 0;
    req.on('data', (chunk: Buffer) => {
      totalBytes += chunk.length;
      if (totalBytes > MAX_BODY_BYTES) {
        req.destroy();
        reject(new BodyTooLargeError('Request body too large'));
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    req.on('error', reject);
  });
}

export function createRouteHandler(
  server: CrowdSimServer,
): (req: http.IncomingMessage, res: http.ServerResponse) => void {
  const cors = server.corsOrigin;
  const apiKey = server.apiKey;
  const manager = server.manager;

  const handle = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const path = url.pathname;
    const method = req.method?.toUpperCase() ?? 'GET';
    const reqOrigin = req.headers['origin'];

    const respond = (status: number, data: unknown) => json(res, status, data, cors, reqOrigin);

    // CORS preflight
    if (method === 'OPTIONS') {
      setCorsHeaders(res, cors, reqOrigin);
      res.writeHead(204);
      res.end();
      return;
    }

    try {
      // POST /api/simulation/start: validate config, launch the run, return immediately
      if (path === '/api/simulation/start' && method === 'POST') {
        if (!checkAuth(req.headers['authorization'], apiKey)) {
          respond(401, { error: 'Unauthorized' });
          return;
        }
        const body = await readBody(req);
        let parsed: unknown;
        try {
          parsed = sanitizeJson(body.trim() === '' ? {} : JSON.parse(body));
        } catch {
          respond(400, { error: 'Invalid JSON' });
          return;
        }

        const validation = parseStartRequest(parsed);
        if (!validation.valid) {
          respond(400, { error: 'invalid_config', validationErrors: validation.errors });
          return;
        }

        try {
          const started = manager.start(validation.value);
          respond(202, {
            message: 'Simulation started',
            run_id: started.runId,
            total_steps: started.totalSteps,
            seed: started.seed,
          });
        } catch (err) {
          if (err instanceof ConflictError) {
            respond(409, { error: 'conflict', message: err.message, run_id: err.activeRunId });
            return;
          }
          if (err instanceof ConfigValidationError) {
            respond(400, { error: 'invalid_config', validationErrors: err.issues });
            return;
          }
          throw err;
        }
        return;
      }

      // POST /api/kalshi/analyze: what is trending on the market venue, optionally narrowed to a topic
      if (path === '/api/kalshi/analyze' && method === 'POST') {
        if (!checkAuth(req.headers['authorization'], apiKey)) {
          respond(401, { error: 'Unauthorized' });
          return;
        }
        const body = await readBody(req);
        let parsed: unknown;
        try {
          parsed = sanitizeJson(body.trim() === '' ? {} : JSON.parse(body));
        } catch {
          respond(400, { error: 'Invalid JSON' });
          return;
        }

        const request = parseAnalyzeRequest(parsed);
        if (!request.valid) {
          respond(400, { error: 'invalid_request', validationErrors: request.errors });
          return;
        }

        try {
          const analysis = await server.trends.analyzeTrends(request.value.topic);
          respond(200, { source: server.trends.name, trends: analysis });
        } catch (err) {
          server.logger.warn({ err: describeError(err), source: server.trends.name }, 'trend analysis failed');
          respond(502, { error: 'trend_source_unavailable', message: describeError(err) });
        }
        return;
      }

      // POST /api/simulation/stop: cooperative stop signal
      if (path === '/api/simulation/stop' && method === 'POST') {
        if (!checkAuth(req.headers['authorization'], apiKey)) {
          respond(401, { error: 'Unauthorized' });
          return;
        }
        respond(200, { message: manager.stop() ? 'Stop signal sent' : 'No simulation running' });
        return;
      }

      // GET /api/simulation/state: latest snapshot
      if (path === '/api/simulation/state' && method === 'GET') {
        respond(200, toWireState(manager.state()));
        return;
      }

      // GET /api/results/stats: summary and chart of the latest run
      if (path === '/api/results/stats' && method === 'GET') {
        const results = manager.results();
        if (!results) {
          respond(404, { error: 'No results available' });
          return;
        }
        respond(200, toWireResults(results));
        return;
      }

      // GET /health
      if (path === '/health' && method === 'GET') {
        respond(200, {
          status: 'ok',
          uptime: server.getUptime(),
          run_status: manager.state().status,
        });
        return;
      }

      // 404
      respond(404, { error: 'Not found' });
    } catch (err) {
      if (err instanceof BodyTooLargeError) {
        respond(413, { error: 'Request body too large' });
        return;
      }
      server.logger.error({ err: describeError(err), path }, 'unhandled route error');
      respond(500, { error: 'Internal server error' });
    }
  };

  return (req, res) => {
    handle(req, res).catch((err: unknown) => {
      server.logger.error({ err: describeError(err) }, 'request handler failed');
    });
  };
}
