// WebSocket handler for CrowdSim Server
// Same port via HTTP upgrade. JSON messages with `type` field.

import type * as http from 'node:http';
import { timingSafeEqual } from 'node:crypto';
import { WebSocketServer, WebSocket } from 'ws';
import { isRecord } from '@crowdsim/core';
import type { CrowdSimServer } from './CrowdSimServer.js';
import { sanitizeJson, toWireState } from './validation.js';

function send(ws: WebSocket, data: Record<string, unknown>): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(data));
  }
}

export interface WebSocketHandle {
  cleanup: () => void;
  broadcast: (data: Record<string, unknown>) => void;
}

const MAX_WS_PAYLOAD = 65_536; // 64 KB, clients only send small commands
const MAX_WS_CONNECTIONS = 100;
const HEARTBEAT_INTERVAL_MS = 30_000;

export function tokenMatches(token: string | null | undefined, apiKey: string): boolean {
  if (!token) return false;
  const given = Buffer.from(token);
  const expected = Buffer.from(apiKey);
  if (given.length !== expected.length) return false;
  return timingSafeEqual(given, expected);
}

export function createWebSocketHandler(
  httpServer: http.Server,
  server: CrowdSimServer,
): WebSocketHandle {
  const wss = new WebSocketServer({ server: httpServer, maxPayload: MAX_WS_PAYLOAD });
  const log = server.logger;

  // Heartbeat: ping every 30s, terminate if the previous ping got no pong
  const aliveMap = new WeakMap<WebSocket, boolean>();

  const heartbeatInterval = setInterval(() => {
    for (const ws of wss.clients) {
      if (ws.readyState === WebSocket.OPEN) {
        if (aliveMap.get(ws) === false) {
          ws.terminate();
          continue;
        }
        aliveMap.set(ws, false);
        ws.ping();
      }
    }
  }, HEARTBEAT_INTERVAL_MS);
  heartbeatInterval.unref();

  wss.on('connection', (ws, req) => {
    if (wss.clients.size > MAX_WS_CONNECTIONS) {
      ws.close(1013, 'Server at capacity');
      return;
    }

    // Origin check against the CORS policy (skipped for non-browser clients)
    const wsOrigin = req.headers['origin'];
    if (wsOrigin && server.corsOrigin !== '*') {
      if (wsOrigin.toLowerCase() !== server.corsOrigin.toLowerCase()) {
        ws.close(1008, 'Origin not allowed');
        return;
      }
    }

    // Browsers cannot set headers on the upgrade request, so ?token= is accepted as well.
    if (server.apiKey) {
      const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
      const authHeader = req.headers['authorization'];
      const token = (authHeader?.startsWith('Bearer ') ? authHeader.slice(7) : undefined)
        ?? url.searchParams.get('token');
      if (!tokenMatches(token, server.apiKey)) {
        ws.close(1008, 'Unauthorized');
        return;
      }
    }

    log.debug({ clients: wss.clients.size }, 'websocket client connected');
    aliveMap.set(ws, true);

    ws.on('pong', () => {
      aliveMap.set(ws, true);
    });

    ws.on('close', () => {
      log.debug({ clients: wss.clients.size }, 'websocket client disconnected');
    });

    ws.on('message', (raw) => {
      let msg: unknown;
      try {
        msg = sanitizeJson(JSON.parse(raw.toString()));
      } catch {
        send(ws, { type: 'error', message: 'Malformed JSON' });
        return;
      }

      const type = isRecord(msg) ? msg['type'] : undefined;
      if (typeof type !== 'string' || !type) {
        send(ws, { type: 'error', message: 'Missing "type" field' });
        return;
      }

      switch (type) {
        case 'state': {
          send(ws, { type: 'state_result', ...toWireState(server.manager.state()) });
          break;
        }

        case 'stop': {
          const signalled = server.manager.stop();
          send(ws, { type: 'stop_result', message: signalled ? 'Stop signal sent' : 'No simulation running' });
          break;
        }

        default:
          send(ws, { type: 'error', message: `Unknown message type: "${type.slice(0, 100)}"` });
      }
    });
  });

  function broadcast(data: Record<string, unknown>): void {
    const payload = JSON.stringify(data);
    for (const ws of wss.clients) {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(payload);
      }
    }
  }

  return {
    cleanup: () => {
      clearInterval(heartbeatInterval);
      for (const ws of wss.clients) ws.terminate();
      wss.close();
    },
    broadcast,
  };
}
