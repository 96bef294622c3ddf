// Shared builders for the core test suites

import { Rng } from '../src/Rng.js';
import type { AgentState, MarketContext, PersonaTraits, StageInput } from '../src/types.js';

export function makeTraits(overrides: Partial<PersonaTraits> = {}): PersonaTraits {
  return {
    name: 'Test Agent',
    neurobiology: { arousalBaseline: 0.5, valenceBaseline: 0, shockSensitivity: 0.5 },
    cognition: { biasCoefficient: 1, initialBelief: 0 },
    emotion: { decayRate: 0.2 },
    social: { susceptibility: 0.5, ties: [] },
    identity: { group: 'neutral', identification: 0.5 },
    network: { position: 'periphery', influence: 0.2 },
    market: { actionThreshold: 0.5, riskTolerance: 0.5 },
    ...overrides,
  };
}

/** Traits whose willingness always clears a zero threshold. */
export function alwaysPostTraits(name = 'Poster'): PersonaTraits {
  return makeTraits({
    name,
    network: { position: 'core', influence: 1 },
    market: { actionThreshold: 0, riskTolerance: 1 },
  });
}

export function makeState(overrides: Partial<AgentState> = {}): AgentState {
  return {
    belief: 0,
    arousal: 0.5,
    valence: 0,
    emotionalIntensity: 0,
    dominantEmotion: 'neutral',
    socialWeight: 0.5,
    ties: [],
    sampledNeighbors: [],
    peerSentiment: null,
    willingness: 0,
    lastUpdatedStep: -1,
    ...overrides,
  };
}

export function makeContext(overrides: Partial<MarketContext> = {}): MarketContext {
  return {
    day: 1,
    step: 0,
    stepIndex: 0,
    timestamp: '2021-01-11T09:00:00.000Z',
    topic: 'prediction markets',
    trendTopics: [],
    price: 20,
    priceChangePct: 0,
    trend: 0,
    peerSentiment: new Map(),
    ...overrides,
  };
}

export function makeInput(
  traits: PersonaTraits = makeTraits(),
  context: Partial<MarketContext> = {},
  seed = 1,
): StageInput {
  return { traits, context: makeContext(context), rng: new Rng(seed) };
}
