// CrowdSimServer: HTTP + WebSocket transport over one RunManager

import * as http from 'node:http';
import {
  KalshiTrendSource,
  RunManager,
  silentLogger,
  type Logger,
  type RunManagerOptions,
  type TrendAnalyzer,
} from '@crowdsim/core';
import { createRouteHandler } from './routes.js';
import { toWireState } from './validation.js';
import { createWebSocketHandler, type WebSocketHandle } from './websocket.js';

export interface ServerConfig {
  port?: number;
  host?: string;
  corsOrigin?: string;
  /** API key for mutation routes. When set, POST routes and WebSocket require `Authorization: Bearer <key>`. */
  apiKey?: string;
  logger?: Logger;
  /** Passed to the RunManager the server creates. */
  runManager?: Omit<RunManagerOptions, 'logger'>;
  /** Backs POST /api/kalshi/analyze. Defaults to the public Kalshi markets. */
  trendAnalyzer?: TrendAnalyzer;
}

export class CrowdSimServer {
  readonly manager: RunManager;
  readonly trends: TrendAnalyzer;
  private readonly server: http.Server;
  private readonly startedAt = Date.now();
  private wsHandle: WebSocketHandle | null = null;
  readonly port: number;
  private readonly host: string;
  readonly corsOrigin: string;
  readonly apiKey: string | undefined;
  readonly logger: Logger;

  constructor(config: ServerConfig = {}) {
    this.port = config.port ?? 8000;
    this.host = config.host ?? '127.0.0.1';
    this.apiKey = config.apiKey;
    this.corsOrigin = config.corsOrigin ?? 'http://localhost:5173';
    this.logger = config.logger ?? silentLogger();

    this.manager = new RunManager({ ...config.runManager, logger: this.logger });
    this.trends = config.trendAnalyzer ?? new KalshiTrendSource();

    // Push run progress to WebSocket clients
    this.manager.on('step', (record) => {
      this.broadcast({
        type: 'step',
        run_id: record.runId,
        step: record.currentStep,
        total_steps: record.totalSteps,
        timestamp: record.market.timestamp,
        price: record.market.price,
        sentiment: record.market.aggregateSentiment,
        posts: record.entries.length,
      });
    });
    this.manager.on('status', (snapshot) => {
      this.broadcast({ type: 'status', ...toWireState(snapshot) });
    });
    this.manager.on('error', (failure) => {
      this.broadcast({ type: 'error', run_id: failure.runId, code: failure.code, message: failure.message });
    });

    this.server = http.createServer(createRouteHandler(this));
  }

  async start(): Promise<void> {
    this.wsHandle = createWebSocketHandler(this.server, this);

    return new Promise((resolve) => {
      this.server.listen(this.port, this.host, () => {
        const addr = this.getAddress();
        this.logger.info({ host: addr.host, port: addr.port }, 'server listening');
        resolve();
      });
    });
  }

  /** Stops the active run, waits for it to settle, then closes the sockets. */
  async stop(): Promise<void> {
    this.manager.stop();
    await this.manager.settled();
    if (this.wsHandle) this.wsHandle.cleanup();
    return new Promise((resolve, reject) => {
      this.server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  getAddress(): { port: number; host: string } {
    const addr = this.server.address();
    if (addr && typeof addr === 'object') {
      return { port: addr.port, host: addr.address };
    }
    return { port: this.port, host: this.host };
  }

  getUptime(): number {
    return Date.now() - this.startedAt;
  }

  broadcast(data: Record<string, unknown>): void {
    if (this.wsHandle) this.wsHandle.broadcast(data);
  }
}
