// ResultsAggregator: pure summary of an action log and a market series

import type { ActionLogEntry, ChartPoint, MarketState, ResultsSummary, SimulationResults } from './types.js';
import { round } from './utils.js';

const STOP_WORDS = new Set([
  'the', 'and', 'for', 'are', 'but', 'not', 'you', 'all', 'any', 'can', 'had', 'her',
  'was', 'one', 'our', 'out', 'has', 'him', 'his', 'how', 'its', 'may', 'now', 'too',
  'yet', 'just', 'more', 'from', 'this', 'that', 'with', 'have', 'been', 'into', 'about',
  'than', 'them', 'then', 'they', 'what', 'when', 'will', 'your', 'here', 'there', 'same',
  'keeps', 'every', 'before', 'after', 'single', 'today', 'still', 'look', 'looks',
]);

export function tokenize(content: string): string[] {
  return content
    .toLowerCase()
    .replace(/['’]/g, '')
    .split(/[^\p{L}\p{N}$#]+/u)
    .filter((t) => t.length >= 3 && !STOP_WORDS.has(t));
}

/** Token counts, most frequent first, ties alphabetical. */
export function keywordTotals(log: readonly ActionLogEntry[]): Record<string, number> {
  const counts = new Map<string, number>();
  for (const entry of log) {
    for (const token of tokenize(entry.content)) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }
  }
  const sorted = [...counts.entries()].sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
  return Object.fromEntries(sorted);
}

/** Timestamp of the step with the most entries; ties go to the earliest step. */
export function peakActivity(log: readonly ActionLogEntry[]): string | null {
  const perStep = new Map<number, { timestamp: string; count: number }>();
  for (const entry of log) {
    const bucket = perStep.get(entry.stepIndex);
    if (bucket) bucket.count++;
    else perStep.set(entry.stepIndex, { timestamp: entry.timestamp, count: 1 });
  }

  let best: { stepIndex: number; timestamp: string; count: number } | null = null;
  for (const [stepIndex, { timestamp, count }] of perStep) {
    if (!best || count > best.count || (count === best.count && stepIndex < best.stepIndex)) {
      best = { stepIndex, timestamp, count };
    }
  }
  return best ? best.timestamp : null;
}

export function chartData(series: readonly MarketState[]): ChartPoint[] {
  return series.map((s) => ({
    timestamp: s.timestamp,
    sentimentScore: s.aggregateSentiment,
    marketPrice: s.price,
  }));
}

export function summarize(log: readonly ActionLogEntry[], series: readonly MarketState[]): ResultsSummary {
  let sum = 0;
  let max: number | null = null;
  let min: number | null = null;
  for (const { sentimentScore } of log) {
    sum += sentimentScore;
    max = max === null ? sentimentScore : Math.max(max, sentimentScore);
    min = min === null ? sentimentScore : Math.min(min, sentimentScore);
  }
  return {
    totalPosts: log.length,
    timePeriods: series.length,
    avgSentiment: log.length === 0 ? 0 : round(sum / log.length, 4),
    maxSentiment: max,
    minSentiment: min,
    peakActivityTimestamp: peakActivity(log),
    keywordTotals: keywordTotals(log),
  };
}

/** Pure and idempotent: the same inputs always give equal results. */
export function summarizeResults(
  log: readonly ActionLogEntry[],
  series: readonly MarketState[],
): SimulationResults {
  return { summary: summarize(log, series), chartData: chartData(series) };
}
