import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { TrendAnalysis, TrendAnalyzer } from '@crowdsim/core';
import { keysOf, readJson, startTestServer, type TestServer } from './helpers.js';

let ctx: TestServer;

async function post(path: string, body?: unknown, headers: Record<string, string> = {}): Promise<Response> {
  return fetch(`${ctx.baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body),
  });
}

async function get(path: string, headers: Record<string, string> = {}): Promise<Response> {
  return fetch(`${ctx.baseUrl}${path}`, { headers });
}

const MOCK_RUN = { agent_count: 10, day_count: 1, mock_mode: true, random_seed: 7 };

afterEach(async () => {
  await ctx.server.stop();
});

describe('HTTP: idle server', () => {
  beforeEach(async () => {
    ctx = await startTestServer();
  });

  it('GET /health reports the run status', async () => {
    const res = await get('/health');
    expect(res.status).toBe(200);
    const data = await readJson(res);
    expect(data).toMatchObject({ status: 'ok', run_status: 'IDLE' });
    expect(typeof data['uptime']).toBe('number');
  });

  it('GET /api/simulation/state returns the idle snapshot', async () => {
    const res = await get('/api/simulation/state');
    expect(res.status).toBe(200);
    expect(await readJson(res)).toEqual({
      run_id: null,
      status: 'IDLE',
      is_running: false,
      current_step: 0,
      total_steps: 0,
      progress_pct: 0,
      current_price: 0,
      current_day: 0,
      run_error: null,
      recent_logs: [],
    });
  });

  it('GET /api/results/stats is 404 before any run', async () => {
    const res = await get('/api/results/stats');
    expect(res.status).toBe(404);
    expect(await readJson(res)).toEqual({ error: 'No results available' });
  });

  it('POST /api/simulation/stop with nothing running', async () => {
    const res = await post('/api/simulation/stop');
    expect(res.status).toBe(200);
    expect(await readJson(res)).toEqual({ message: 'No simulation running' });
  });

  it('unknown routes are 404', async () => {
    const res = await get('/api/nope');
    expect(res.status).toBe(404);
    expect(await readJson(res)).toEqual({ error: 'Not found' });
  });

  it('answers preflight with CORS headers', async () => {
    const res = await fetch(`${ctx.baseUrl}/api/simulation/start`, {
      method: 'OPTIONS',
      headers: { Origin: 'http://localhost:5173' },
    });
    expect(res.status).toBe(204);
    expect(res.headers.get('access-control-allow-origin')).toBe('http://localhost:5173');
    expect(res.headers.get('access-control-allow-methods')).toBe('GET, POST, OPTIONS');
  });

  it('does not reflect a foreign origin', async () => {
    const res = await get('/health', { Origin: 'http://elsewhere.test' });
    expect(res.headers.get('access-control-allow-origin')).toBeNull();
    expect(res.headers.get('x-content-type-options')).toBe('nosniff');
  });
});

describe('HTTP: POST /api/simulation/start', () => {
  beforeEach(async () => {
    ctx = await startTestServer();
  });

  it('accepts a run, returns immediately and completes in the background', async () => {
    const res = await post('/api/simulation/start', MOCK_RUN);
    expect(res.status).toBe(202);
    const data = await readJson(res);
    expect(data).toMatchObject({ message: 'Simulation started', total_steps: 24, seed: 7 });
    expect(typeof data['run_id']).toBe('string');

    await ctx.server.manager.settled();

    expect(await readJson(await get('/api/simulation/state'))).toMatchObject({
      run_id: data['run_id'],
      status: 'COMPLETED',
      is_running: false,
      current_step: 24,
      total_steps: 24,
      progress_pct: 100,
      current_day: 1,
      run_error: null,
    });

    const stats = await readJson(await get('/api/results/stats'));
    expect(stats).toHaveProperty('summary.time_periods', 24);
    expect(keysOf(stats['summary'])).toEqual([
      'total_posts',
      'time_periods',
      'avg_sentiment',
      'max_sentiment',
      'min_sentiment',
      'peak_activity_timestamp',
      'keyword_totals',
    ]);
    const chart = stats['chart_data'];
    expect(chart).toHaveLength(24);
    expect(keysOf(Array.isArray(chart) ? chart[0] : null)).toEqual(['timestamp', 'sentiment_score', 'market_price']);
  });

  it('accepts the short field names', async () => {
    const res = await post('/api/simulation/start', { agents: 2, days: 2, mock_mode: true });
    expect(res.status).toBe(202);
    expect(await readJson(res)).toHaveProperty('total_steps', 48);
  });

  it('rejects an out-of-range config with snake_case paths', async () => {
    const res = await post('/api/simulation/start', { agent_count: 0, day_count: 1 });
    expect(res.status).toBe(400);
    expect(await readJson(res)).toEqual({
      error: 'invalid_config',
      validationErrors: [
        {
          path: 'agent_count',
          expected: '>= 1',
          received: 'integer',
          message: 'agent_count: Number must be greater than or equal to 1',
        },
      ],
    });
    expect(await readJson(await get('/api/simulation/state'))).toHaveProperty('status', 'IDLE');
  });

  it('an empty body is missing both counts', async () => {
    const res = await post('/api/simulation/start');
    expect(res.status).toBe(400);
    expect(await readJson(res)).toMatchObject({
      error: 'invalid_config',
      validationErrors: [{ path: 'agent_count' }, { path: 'day_count' }],
    });
  });

  it('rejects malformed JSON', async () => {
    const res = await post('/api/simulation/start', '{oops');
    expect(res.status).toBe(400);
    expect(await readJson(res)).toEqual({ error: 'Invalid JSON' });
  });

  it('rejects a body that is not an object', async () => {
    const res = await post('/api/simulation/start', [1, 2]);
    expect(res.status).toBe(400);
    expect(await readJson(res)).toEqual({
      error: 'invalid_config',
      validationErrors: [{ path: '', expected: 'object', received: 'array', message: 'Body must be a JSON object' }],
    });
  });

  it('locates custom agent issues in snake_case', async () => {
    const agent = {
      name: 'custom',
      neurobiology: { arousal_baseline: 0.5, valence_baseline: 0, shock_sensitivity: 0.5 },
      cognition: { bias_coefficient: 1, initial_belief: 0 },
      emotion: { decay_rate: 0.2 },
      social: { susceptibility: 0.5, ties: [] },
      identity: { group: 'whale', identification: 0.5 },
      network: { position: 'core', influence: 0.5 },
      market: { action_threshold: 2, risk_tolerance: 0.5 },
    };
    const res = await post('/api/simulation/start', { agent_count: 1, day_count: 1, custom_agents: [agent] });
    expect(res.status).toBe(400);
    expect(await readJson(res)).toMatchObject({
      validationErrors: [
        { path: 'custom_agents.0.identity.group', received: 'string' },
        {
          path: 'custom_agents.0.market.action_threshold',
          message: 'custom_agents.0.market.action_threshold: Number must be less than or equal to 1',
        },
      ],
    });
  });

  it('runs valid snake_case custom agents', async () => {
    const agent = {
      name: 'custom',
      neurobiology: { arousal_baseline: 0.5, valence_baseline: 0, shock_sensitivity: 0.5 },
      cognition: { bias_coefficient: 1, initial_belief: 0 },
      emotion: { decay_rate: 0.2 },
      social: { susceptibility: 0.5, ties: [{ agent_id: 1, strength: 0.5 }] },
      identity: { group: 'retail_investor', identification: 0.5 },
      network: { position: 'core', influence: 1 },
      market: { action_threshold: 0, risk_tolerance: 1 },
    };
    const res = await post('/api/simulation/start', {
      agent_count: 2,
      day_count: 1,
      mock_mode: true,
      custom_agents: [agent],
    });
    expect(res.status).toBe(202);
    await ctx.server.manager.settled();
    expect(await readJson(await get('/api/results/stats'))).toHaveProperty('summary.total_posts', 48);
  });
});

describe('HTTP: one run at a time', () => {
  beforeEach(async () => {
    ctx = await startTestServer({ runManager: { stepDelayMs: 50 } });
  });

  it('answers 409 while a run is active, then stops it', async () => {
    const first = await readJson(await post('/api/simulation/start', MOCK_RUN));
    const runId = first['run_id'];

    const conflict = await post('/api/simulation/start', MOCK_RUN);
    expect(conflict.status).toBe(409);
    expect(await readJson(conflict)).toEqual({
      error: 'conflict',
      message: `Simulation already running (${String(runId)})`,
      run_id: runId,
    });

    const stop = await post('/api/simulation/stop');
    expect(await readJson(stop)).toEqual({ message: 'Stop signal sent' });
    await ctx.server.manager.settled();

    const state = await readJson(await get('/api/simulation/state'));
    expect(state).toMatchObject({ status: 'STOPPED', run_id: runId, is_running: false });
    expect(state['current_step']).toBeLessThan(24);
  });
});

const FED_TRENDS: TrendAnalysis = {
  topics: ['Fed holds rates'],
  tickers: ['FED-HOLD'],
  summary: 'Top trending Kalshi markets: Fed holds rates',
  price: 40,
};

describe('HTTP: trend analysis', () => {
  let topics: Array<string | undefined>;

  beforeEach(async () => {
    topics = [];
    const analyzer: TrendAnalyzer = {
      name: 'fake-venue',
      analyzeTrends: async (topic) => {
        topics.push(topic);
        return FED_TRENDS;
      },
    };
    ctx = await startTestServer({ trendAnalyzer: analyzer });
  });

  it('POST /api/kalshi/analyze lists the trending markets', async () => {
    const res = await post('/api/kalshi/analyze');
    expect(res.status).toBe(200);
    expect(await readJson(res)).toEqual({ source: 'fake-venue', trends: FED_TRENDS });
    expect(topics).toEqual([undefined]);
  });

  it('passes a trimmed topic through', async () => {
    await post('/api/kalshi/analyze', { market_topic: ' Fed ' });
    await post('/api/kalshi/analyze', { topic: 'rates' });
    expect(topics).toEqual(['Fed', 'rates']);
  });

  it('rejects a topic that is not a string', async () => {
    const res = await post('/api/kalshi/analyze', { topic: 5 });
    expect(res.status).toBe(400);
    expect(await readJson(res)).toEqual({
      error: 'invalid_request',
      validationErrors: [
        { path: 'topic', expected: 'string', received: 'integer', message: 'topic: Expected string, received number' },
      ],
    });
    expect(topics).toEqual([]);
  });
});

describe('HTTP: trend analysis without a venue', () => {
  beforeEach(async () => {
    ctx = await startTestServer();
  });

  it('answers 502 when the trend source is down', async () => {
    const res = await post('/api/kalshi/analyze', { topic: 'Fed' });
    expect(res.status).toBe(502);
    expect(await readJson(res)).toEqual({ error: 'trend_source_unavailable', message: 'offline' });
  });
});

describe('HTTP: API key', () => {
  beforeEach(async () => {
    ctx = await startTestServer({ apiKey: 'test-secret' });
  });

  it('guards the mutation routes', async () => {
    expect((await post('/api/simulation/start', MOCK_RUN)).status).toBe(401);
    expect((await post('/api/simulation/stop')).status).toBe(401);
    expect((await post('/api/kalshi/analyze')).status).toBe(401);
    expect((await post('/api/simulation/start', MOCK_RUN, { Authorization: 'Bearer wrong' })).status).toBe(401);

    const ok = await post('/api/simulation/start', MOCK_RUN, { Authorization: 'Bearer test-secret' });
    expect(ok.status).toBe(202);
    await ctx.server.manager.settled();
  });

  it('answers 401 to a non-ASCII key of the same length', async () => {
    const res = await post('/api/simulation/stop', undefined, { Authorization: 'Bearer test-secreé' });
    expect(res.status).toBe(401);
    expect(await readJson(res)).toEqual({ error: 'Unauthorized' });
  });

  it('leaves the read routes open', async () => {
    expect((await get('/api/simulation/state')).status).toBe(200);
    expect((await get('/health')).status).toBe(200);
  });
});
