import type { IdentityGroup } from './types.js';

export const STEPS_PER_DAY = 24;
export const STEP_MINUTES = 60;
export const DEFAULT_START_TIME = '2021-01-11T09:00:00.000Z';
export const DEFAULT_MARKET_TOPIC = 'prediction markets';

export const CONFIG_BOUNDS = {
  agentCount: { min: 1, max: 1000 },
  dayCount: { min: 1, max: 30 },
} as const;

export interface MarketParams {
  basePrice: number;
  priceFloor: number;
  /** Max absolute move per step attributable to sentiment. */
  sensitivity: number;
  /** Max absolute noise per step. */
  volatility: number;
  /** Returns averaged for the short-horizon trend. */
  trendWindow: number;
}

export const DEFAULT_MARKET_PARAMS: MarketParams = {
  basePrice: 20,
  priceFloor: 1,
  sensitivity: 1,
  volatility: 0.4,
  trendWindow: 3,
};

// Agent model
export const MAX_NEIGHBOR_SAMPLE = 8;
export const BELIEF_LEARNING_RATE = 0.2;
export const BELIEF_JITTER = 0.01;
export const WILLINGNESS_JITTER = 0.05;
export const SHOCK_SCALE_PCT = 10;      // a 10% move is a full shock
export const MOVEMENT_SCALE_PCT = 5;    // a 5% move saturates the cognition signal
export const TIE_LEARNING_RATE = 0.05;
export const MIN_TIE_STRENGTH = 0.05;
export const IDENTITY_PULL = 0.05;
export const MAX_SOCIAL_WEIGHT = 0.9;

export const RECENT_LOG_LIMIT = 20;

/** How strongly each group defers to its peers. */
export const GROUP_CONFORMITY: Record<IdentityGroup, number> = {
  wsb_ape: 1.0,
  retail_investor: 0.7,
  institutional: 0.3,
  skeptic: 0.4,
  neutral: 0.5,
};

/** Direction each group's members lean towards, -1 bearish to 1 bullish. */
export const GROUP_LEAN: Record<IdentityGroup, number> = {
  wsb_ape: 1,
  retail_investor: 0.3,
  institutional: 0,
  skeptic: -0.6,
  neutral: 0,
};

/** Share of each group in the synthetic population. */
export const GROUP_WEIGHTS: ReadonlyArray<readonly [IdentityGroup, number]> = [
  ['wsb_ape', 0.25],
  ['retail_investor', 0.35],
  ['institutional', 0.1],
  ['skeptic', 0.15],
  ['neutral', 0.15],
];
