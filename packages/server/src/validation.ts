// Wire-format helpers shared by routes.ts and websocket.ts
// snake_case JSON on the wire, camelCase inside @crowdsim/core

import { z } from 'zod';
import {
  isRecord,
  toIssues,
  validateSimulationConfig,
  type RunSnapshot,
  type SimulationConfig,
  type SimulationResults,
  type ValidationIssue,
  type ValidationResult,
} from '@crowdsim/core';

/** Strips prototype-polluting keys from parsed JSON objects (recursive). */
export function sanitizeJson(obj: unknown): unknown {
  if (obj === null || typeof obj !== 'object') return obj;
  if (Array.isArray(obj)) return obj.map(sanitizeJson);
  const clean: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(obj)) {
    if (key === '__proto__' || key === 'constructor' || key === 'prototype') continue;
    clean[key] = sanitizeJson(val);
  }
  return clean;
}

export function snakeToCamel(key: string): string {
  return key.replace(/[_-]([a-z0-9])/g, (_, c: string) => c.toUpperCase());
}

export function camelToSnake(key: string): string {
  return key.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toLowerCase();
}

/** Renames every object key to camelCase (recursive). */
function camelizeKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(camelizeKeys);
  if (!isRecord(value)) return value;
  const out: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) out[snakeToCamel(key)] = camelizeKeys(inner);
  return out;
}

function firstDefined(body: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    if (body[key] !== undefined) return body[key];
  }
  return undefined;
}

/**
 * Maps a start request body to a SimulationConfig. Accepts `agent_count`
 * (or `agents`), `day_count` (or `days`), `mock_mode`, `market_topic`,
 * `random_seed` and `custom_agents`; camelCase names work too. Issue paths
 * come back in snake_case.
 */
export function parseStartRequest(body: unknown): ValidationResult<SimulationConfig> {
  if (!isRecord(body)) return notAnObject(body);

  const customAgents = firstDefined(body, 'custom_agents', 'customAgents');
  const result = validateSimulationConfig({
    agentCount: firstDefined(body, 'agent_count', 'agents', 'agentCount'),
    dayCount: firstDefined(body, 'day_count', 'days', 'dayCount'),
    mockMode: firstDefined(body, 'mock_mode', 'mockMode'),
    marketTopic: firstDefined(body, 'market_topic', 'marketTopic'),
    randomSeed: firstDefined(body, 'random_seed', 'randomSeed'),
    customAgents: customAgents === undefined ? undefined : camelizeKeys(customAgents),
  });
  if (result.valid) return result;
  return { valid: false, errors: result.errors.map(toWireIssue) };
}

function notAnObject(body: unknown): { valid: false; errors: ValidationIssue[] } {
  return {
    valid: false,
    errors: [{
      path: '',
      expected: 'object',
      received: body === null ? 'null' : Array.isArray(body) ? 'array' : typeof body,
      message: 'Body must be a JSON object',
    }],
  };
}

const AnalyzeRequestSchema = z.object({
  topic: z.string().trim().min(1).max(200).optional(),
});

export type AnalyzeRequest = z.infer<typeof AnalyzeRequestSchema>;

/** Trend analysis request: an optional `topic` (or `market_topic`). An empty body is fine. */
export function parseAnalyzeRequest(body: unknown): ValidationResult<AnalyzeRequest> {
  if (!isRecord(body)) return notAnObject(body);
  const input = { topic: firstDefined(body, 'topic', 'market_topic', 'marketTopic') };
  const parsed = AnalyzeRequestSchema.safeParse(input);
  if (parsed.success) return { valid: true, value: parsed.data };
  return { valid: false, errors: toIssues(parsed.error, input) };
}

function toWireIssue(issue: ValidationIssue): ValidationIssue {
  const path = issue.path
    .split('.')
    .map(camelToSnake)
    .join('.');
  return {
    ...issue,
    path,
    message: issue.path && issue.message.startsWith(`${issue.path}:`)
      ? `${path}${issue.message.slice(issue.path.length)}`
      : issue.message,
  };
}

// ── Outgoing ─────────────────────────────────────────────────────────────────

export function toWireState(snapshot: RunSnapshot): Record<string, unknown> {
  return {
    run_id: snapshot.runId,
    status: snapshot.status,
    is_running: snapshot.isRunning,
    current_step: snapshot.currentStep,
    total_steps: snapshot.totalSteps,
    progress_pct: snapshot.progressPct,
    current_price: snapshot.currentPrice,
    current_day: snapshot.currentDay,
    run_error: snapshot.error,
    recent_logs: snapshot.recentLogs.map((log) => ({
      agent_id: log.agentId,
      action_type: log.actionType,
      content: log.content,
      timestamp: log.timestamp,
    })),
  };
}

export function toWireResults(results: SimulationResults): Record<string, unknown> {
  const { summary } = results;
  return {
    summary: {
      total_posts: summary.totalPosts,
      time_periods: summary.timePeriods,
      avg_sentiment: summary.avgSentiment,
      max_sentiment: summary.maxSentiment,
      min_sentiment: summary.minSentiment,
      peak_activity_timestamp: summary.peakActivityTimestamp,
      keyword_totals: summary.keywordTotals,
    },
    chart_data: results.chartData.map((point) => ({
      timestamp: point.timestamp,
      sentiment_score: point.sentimentScore,
      market_price: point.marketPrice,
    })),
  };
}
