// Shared setup for the server suites: an in-process server on a random port
// whose external sources never leave the process.

import { WebSocket } from 'ws';
import { isRecord, type PersonaSource, type TrendAnalyzer, type TrendSource } from '@crowdsim/core';
import { CrowdSimServer, type ServerConfig } from '../src/CrowdSimServer.js';

export const offlineTrend: TrendSource = {
  name: 'offline',
  fetchTrend: () => Promise.reject(new Error('offline')),
};

export const offlinePersonas: PersonaSource = {
  name: 'offline',
  fetchPersonas: () => Promise.reject(new Error('offline')),
};

export const offlineAnalyzer: TrendAnalyzer = {
  name: 'offline',
  analyzeTrends: () => Promise.reject(new Error('offline')),
};

export interface TestServer {
  server: CrowdSimServer;
  baseUrl: string;
  wsUrl: string;
}

export async function startTestServer(config: ServerConfig = {}): Promise<TestServer> {
  const server = new CrowdSimServer({
    port: 0,
    trendAnalyzer: offlineAnalyzer,
    ...config,
    runManager: { trendSource: offlineTrend, personaSource: offlinePersonas, ...config.runManager },
  });
  await server.start();
  const { port } = server.getAddress();
  return { server, baseUrl: `http://127.0.0.1:${port}`, wsUrl: `ws://127.0.0.1:${port}` };
}

export function connect(url: string, headers?: Record<string, string>): Promise<WebSocket> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(url, { headers });
    ws.on('open', () => resolve(ws));
    ws.on('error', reject);
  });
}

export function sendAndReceive(ws: WebSocket, msg: unknown): Promise<Record<string, unknown>> {
  return new Promise((resolve) => {
    ws.once('message', (raw) => {
      resolve(JSON.parse(raw.toString()));
    });
    ws.send(typeof msg === 'string' ? msg : JSON.stringify(msg));
  });
}

/** Collects broadcast messages until `done` matches one (inclusive). */
export function collectUntil(
  ws: WebSocket,
  done: (msg: Record<string, unknown>) => boolean,
): Promise<Record<string, unknown>[]> {
  return new Promise((resolve) => {
    const seen: Record<string, unknown>[] = [];
    const onMessage = (raw: WebSocket.RawData): void => {
      const msg: Record<string, unknown> = JSON.parse(raw.toString());
      seen.push(msg);
      if (done(msg)) {
        ws.off('message', onMessage);
        resolve(seen);
      }
    };
    ws.on('message', onMessage);
  });
}

export function closeReason(ws: WebSocket): Promise<{ code: number; reason: string }> {
  return new Promise((resolve) => {
    ws.on('close', (code, reason) => resolve({ code, reason: reason.toString() }));
  });
}

export async function readJson(res: Response): Promise<Record<string, unknown>> {
  const data: unknown = await res.json();
  if (!isRecord(data)) throw new Error(`expected a JSON object, got ${JSON.stringify(data)}`);
  return data;
}

export function keysOf(value: unknown): string[] {
  return value !== null && typeof value === 'object' ? Object.keys(value) : [];
}
