// MarketModel: price process driven by aggregate sentiment plus seeded noise

import { assertMarketParams } from './ConfigValidator.js';
import { DEFAULT_MARKET_PARAMS, MOVEMENT_SCALE_PCT, STEP_MINUTES, type MarketParams } from './defaults.js';
import { describeError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { Rng, STREAM, deriveSeed } from './Rng.js';
import type { MarketContext, MarketState, TrendSource } from './types.js';
import { clamp, mean, stepTimestamp } from './utils.js';

export interface MarketModelOptions {
  runSeed: number;
  startTime: string;
  stepsPerDay: number;
  stepMinutes?: number;
  params?: Partial<MarketParams>;
}

export interface StepClock {
  day: number;
  step: number;
  stepIndex: number;
  timestamp: string;
}

export class MarketModel {
  readonly params: MarketParams;
  private readonly runSeed: number;
  private readonly startTime: string;
  private readonly stepsPerDay: number;
  private readonly stepMinutes: number;

  private currentPrice: number;
  private lastChangePct = 0;
  private returns: number[] = [];
  private trendTopics: string[] = [];
  private history: MarketState[] = [];

  /** @throws ConfigValidationError when the merged params are out of range */
  constructor(options: MarketModelOptions) {
    this.params = assertMarketParams({ ...DEFAULT_MARKET_PARAMS, ...options.params });
    this.runSeed = options.runSeed;
    this.startTime = options.startTime;
    this.stepsPerDay = options.stepsPerDay;
    this.stepMinutes = options.stepMinutes ?? STEP_MINUTES;
    this.currentPrice = this.params.basePrice;
  }

  get price(): number {
    return this.currentPrice;
  }

  /** Percent change of the most recent update; 0 before the first. */
  get priceChangePct(): number {
    return this.lastChangePct;
  }

  /** Mean of the last `trendWindow` returns, scaled to [-1, 1]. */
  get trend(): number {
    const window = this.returns.slice(-this.params.trendWindow);
    return clamp(mean(window) / MOVEMENT_SCALE_PCT, -1, 1);
  }

  get topics(): readonly string[] {
    return this.trendTopics;
  }

  get series(): readonly MarketState[] {
    return this.history;
  }

  /**
   * Seeds the starting price and the trend topics from an external source.
   * Never rejects: any failure, or a price that is not finite or below the
   * floor, leaves the neutral default in place.
   * @returns whether the source was applied
   */
  async seed(source: TrendSource, topic: string, logger: Logger = silentLogger()): Promise<boolean> {
    try {
      const trend = await source.fetchTrend(topic);
      if (!Number.isFinite(trend.price) || trend.price < this.params.priceFloor) {
        logger.warn({ source: source.name, price: trend.price }, 'ignoring invalid trend price');
        return false;
      }
      this.currentPrice = trend.price;
      this.trendTopics = trend.context.slice();
      logger.info({ source: source.name, price: trend.price, topics: trend.context.length }, 'market seeded');
      return true;
    } catch (err) {
      logger.warn({ source: source.name, err: describeError(err) }, 'trend source unavailable, using default market');
      return false;
    }
  }

  clock(stepIndex: number): StepClock {
    return {
      day: Math.floor(stepIndex / this.stepsPerDay) + 1,
      step: stepIndex % this.stepsPerDay,
      stepIndex,
      timestamp: stepTimestamp(this.startTime, stepIndex, this.stepMinutes),
    };
  }

  /** What agents see at the start of `stepIndex`. */
  context(stepIndex: number, topic: string, peerSentiment: ReadonlyMap<number, number>): MarketContext {
    return {
      ...this.clock(stepIndex),
      topic,
      trendTopics: this.trendTopics,
      price: this.currentPrice,
      priceChangePct: this.lastChangePct,
      trend: this.trend,
      peerSentiment,
    };
  }

  /**
   * Applies one step: price[t] = max(floor, price[t-1] + sensitivity x tanh(2s)
   * + volatility x (2u - 1)).
   */
  update(stepIndex: number, sentiment: number, postCount: number): MarketState {
    const { sensitivity, volatility, priceFloor } = this.params;
    const u = new Rng(deriveSeed(this.runSeed, STREAM.market, stepIndex)).next();
    const previous = this.currentPrice;
    const next = Math.max(
      priceFloor,
      previous + sensitivity * Math.tanh(2 * sentiment) + volatility * (2 * u - 1),
    );

    this.lastChangePct = ((next - previous) / previous) * 100;
    this.returns.push(this.lastChangePct);
    if (this.returns.length > this.params.trendWindow) this.returns.shift();
    this.currentPrice = next;

    const state: MarketState = {
      ...this.clock(stepIndex),
      price: next,
      aggregateSentiment: sentiment,
      postCount,
    };
    this.history.push(state);
    return state;
  }
}
