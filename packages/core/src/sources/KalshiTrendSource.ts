/**
 * Kalshi trend source
 *
 * Reads Kalshi's public markets through the official kalshi-typescript SDK
 * and turns the markets matching a topic into a starting price and a list of
 * trend topics. Market data needs no credentials.
 *
 * @see https://docs.kalshi.com/sdks/typescript/quickstart
 */

import { Configuration, MarketsApi } from 'kalshi-typescript';
import { z } from 'zod';
import { isRecord } from '../ConfigValidator.js';
import { MarketSeedError, describeError } from '../errors.js';
import type { MarketTrend, TrendAnalysis, TrendAnalyzer, TrendSource } from '../types.js';
import { mean, round } from '../utils.js';

export const KALSHI_PUBLIC_API = 'https://api.elections.kalshi.com/trade-api/v2';

const PAGE_LIMIT = 100;
const ANALYSIS_LIMIT = 8;
const TITLE_MAX = 80;
const OPEN_STATUSES = new Set(['open', 'active']);

export const KalshiMarketSchema = z.object({
  ticker: z.string(),
  title: z.string(),
  status: z.string().optional(),
  last_price: z.number().optional(),
  volume: z.number().optional(),
  volume_24h: z.number().optional(),
  open_interest: z.number().optional(),
});
export type KalshiMarket = z.infer<typeof KalshiMarketSchema>;

const MarketsResponseSchema = z.object({
  markets: z.array(z.unknown()),
});

/** The slice of the SDK's `MarketsApi` this source calls. */
export interface KalshiMarketsClient {
  getMarkets(limit?: number): Promise<{ data: { markets?: unknown } }>;
}

export interface KalshiTrendSourceOptions {
  basePath?: string;
  /** Injected SDK client; built from `basePath` when absent. */
  client?: KalshiMarketsClient;
  timeoutMs?: number;
  /** Markets kept for the price average and the topic list. */
  topMarkets?: number;
}

export class KalshiTrendSource implements TrendSource, TrendAnalyzer {
  readonly name = 'kalshi';

  private readonly client: KalshiMarketsClient;
  private readonly timeoutMs: number;
  private readonly topMarkets: number;

  constructor(options: KalshiTrendSourceOptions = {}) {
    this.client =
      options.client ?? new MarketsApi(new Configuration({ basePath: options.basePath ?? KALSHI_PUBLIC_API }));
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.topMarkets = options.topMarkets ?? 5;
  }

  /** @throws MarketSeedError */
  async fetchTrend(topic: string): Promise<MarketTrend> {
    const markets = await this.fetchOpenMarkets();
    const selected = rankMarkets(matchTopic(markets, topic)).slice(0, this.topMarkets);
    const price = meanPrice(selected);

    if (price === null) {
      throw new MarketSeedError(`no priced Kalshi markets for "${topic}"`);
    }
    return { price, context: selected.map((m) => m.title) };
  }

  /**
   * The most traded open markets, narrowed to `topic` when given.
   * @throws MarketSeedError
   */
  async analyzeTrends(topic?: string): Promise<TrendAnalysis> {
    const markets = await this.fetchOpenMarkets();
    const pool = topic ? matchTopic(markets, topic) : markets;
    const top = rankMarkets(pool).slice(0, ANALYSIS_LIMIT);

    if (top.length === 0) {
      return { topics: ['General Market'], tickers: [], summary: 'No market data available.', price: null };
    }
    const topics = top.map((m) => cleanTitle(m.title));
    return {
      topics,
      tickers: top.map((m) => m.ticker),
      summary: `Top trending Kalshi markets: ${topics.join(', ')}`,
      price: meanPrice(top),
    };
  }

  private async fetchOpenMarkets(): Promise<KalshiMarket[]> {
    let body: unknown;
    try {
      const response = await withTimeout(this.client.getMarkets(PAGE_LIMIT), this.timeoutMs);
      body = response.data;
    } catch (err) {
      const status = httpStatus(err);
      if (status !== null) throw new MarketSeedError(`Kalshi responded ${status}`, { cause: err });
      throw new MarketSeedError(`Kalshi request failed: ${describeError(err)}`, { cause: err });
    }

    const parsed = MarketsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new MarketSeedError('unexpected Kalshi response shape');
    }

    const markets: KalshiMarket[] = [];
    for (const raw of parsed.data.markets) {
      const market = KalshiMarketSchema.safeParse(raw);
      if (!market.success) continue;
      if (market.data.status !== undefined && !OPEN_STATUSES.has(market.data.status)) continue;
      markets.push(market.data);
    }
    return markets;
  }
}

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`timed out after ${ms} ms`)), ms);
    timer.unref();
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/** Status of an SDK (axios) error that carries a response. */
function httpStatus(err: unknown): number | null {
  if (!isRecord(err) || !isRecord(err.response)) return null;
  const status = err.response.status;
  return typeof status === 'number' ? status : null;
}

function meanPrice(markets: readonly KalshiMarket[]): number | null {
  const prices = markets
    .map((m) => m.last_price)
    .filter((p): p is number => p !== undefined && Number.isFinite(p) && p > 0);
  return prices.length === 0 ? null : round(mean(prices), 2);
}

/** Drops the "yes"/"no" prefixes Kalshi repeats in titles and caps the length. */
export function cleanTitle(title: string): string {
  const cleaned = title.replace(/\b(yes|no)\s+/gi, '').trim();
  if (cleaned.length === 0) return 'Unknown Market';
  return cleaned.length > TITLE_MAX ? `${cleaned.slice(0, TITLE_MAX - 3)}...` : cleaned;
}

function topicWords(topic: string): string[] {
  return topic
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((w) => w.length >= 3);
}

/** Markets whose title mentions any topic word; all markets when none do. */
export function matchTopic(markets: KalshiMarket[], topic: string): KalshiMarket[] {
  const words = topicWords(topic);
  const matched = markets.filter((m) => {
    const title = m.title.toLowerCase();
    return words.some((w) => title.includes(w));
  });
  return matched.length > 0 ? matched : markets;
}

function activity(market: KalshiMarket): number {
  return market.volume_24h || market.volume || market.open_interest || 0;
}

/** Most traded first; stable for equal activity. */
export function rankMarkets(markets: KalshiMarket[]): KalshiMarket[] {
  return [...markets].sort((a, b) => activity(b) - activity(a));
}
