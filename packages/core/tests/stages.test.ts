import { describe, it, expect } from 'vitest';
import {
  ALL_STAGES,
  CognitionStage,
  EmotionStage,
  IdentityStage,
  MarketStructureStage,
  NetworkStage,
  NeurobiologyStage,
  SocialStage,
  classifyEmotion,
  emotionalIntensity,
  evolveTie,
  marketShock,
  peerSignal,
  socialWeightFor,
} from '../src/stages/index.js';
import { makeInput, makeState, makeTraits } from './fixtures.js';

describe('stage order', () => {
  it('runs the seven stages in fixed order', () => {
    expect(ALL_STAGES.map(s => s.id)).toEqual([
      'neurobiology',
      'cognition',
      'emotion',
      'social',
      'identity',
      'network',
      'market',
    ]);
  });
});

describe('NeurobiologyStage', () => {
  const traits = makeTraits({
    neurobiology: { arousalBaseline: 0.5, valenceBaseline: 0, shockSensitivity: 1 },
    emotion: { decayRate: Math.LN2 },
  });

  it('leaves a state at baseline untouched when the price is flat', () => {
    const next = NeurobiologyStage.apply(makeState(), makeInput(traits));
    expect(next.arousal).toBeCloseTo(0.5, 12);
    expect(next.valence).toBeCloseTo(0, 12);
  });

  it('relaxes toward baseline by exp(-decayRate x elapsed)', () => {
    const oneStep = NeurobiologyStage.apply(makeState({ arousal: 0.9 }), makeInput(traits));
    expect(oneStep.arousal).toBeCloseTo(0.7, 10);

    const twoSteps = NeurobiologyStage.apply(
      makeState({ arousal: 0.9, lastUpdatedStep: 3 }),
      makeInput(traits, { stepIndex: 5 }),
    );
    expect(twoSteps.arousal).toBeCloseTo(0.6, 10);
  });

  it('a full positive shock saturates arousal and lifts valence', () => {
    const next = NeurobiologyStage.apply(makeState(), makeInput(traits, { priceChangePct: 10 }));
    expect(next.arousal).toBeCloseTo(1, 10);
    expect(next.valence).toBeCloseTo(0.5, 10);
  });

  it('a drop pushes valence down in proportion to sensitivity', () => {
    const sensitive = makeTraits({
      neurobiology: { arousalBaseline: 0.5, valenceBaseline: 0, shockSensitivity: 0.8 },
    });
    const next = NeurobiologyStage.apply(makeState(), makeInput(sensitive, { priceChangePct: -5 }));
    expect(next.arousal).toBeCloseTo(0.7, 10);
    expect(next.valence).toBeCloseTo(-0.2, 10);
  });

  it('marketShock caps at the sensitivity', () => {
    expect(marketShock(40, 0.6)).toBeCloseTo(0.6, 12);
    expect(marketShock(-2.5, 1)).toBeCloseTo(0.25, 12);
  });
});

describe('CognitionStage', () => {
  it('moves belief 20% of the way to the perceived movement', () => {
    const next = CognitionStage.apply(makeState({ belief: 0 }), makeInput(makeTraits(), { priceChangePct: 5 }));
    expect(next.belief).toBeGreaterThanOrEqual(0.19);
    expect(next.belief).toBeLessThanOrEqual(0.21);
  });

  it('saturates the movement signal beyond 5%', () => {
    const small = CognitionStage.apply(makeState(), makeInput(makeTraits(), { priceChangePct: 5 }, 11));
    const large = CognitionStage.apply(makeState(), makeInput(makeTraits(), { priceChangePct: 50 }, 11));
    expect(large.belief).toBe(small.belief);
  });

  it('a zero bias coefficient only leaves the jitter', () => {
    const traits = makeTraits({ cognition: { biasCoefficient: 0, initialBelief: 0 } });
    const next = CognitionStage.apply(makeState({ belief: 0.3 }), makeInput(traits, { priceChangePct: -8 }));
    expect(Math.abs(next.belief - 0.3)).toBeLessThanOrEqual(0.01);
  });
});

describe('EmotionStage', () => {
  it('computes intensity from valence and arousal distance', () => {
    expect(emotionalIntensity(0.8, 0.9)).toBeCloseTo(0.8, 10);
    expect(emotionalIntensity(0, 0.5)).toBe(0);
    expect(emotionalIntensity(-1, 1)).toBe(1);
  });

  it.each([
    [0.8, 0.9, 'euphoria'],
    [0.5, 0.7, 'excitement'],
    [0.5, 0.2, 'contentment'],
    [-0.8, 0.9, 'panic'],
    [-0.5, 0.7, 'fear'],
    [-0.5, 0.5, 'anxiety'],
    [-0.5, 0.2, 'sadness'],
    [0, 0.8, 'alertness'],
    [0, 0.1, 'calm'],
    [0, 0.5, 'neutral'],
  ] as const)('valence %s, arousal %s is %s', (valence, arousal, label) => {
    expect(classifyEmotion(valence, arousal)).toBe(label);
  });

  it('writes both fields onto the state', () => {
    const next = EmotionStage.apply(makeState({ valence: -0.8, arousal: 0.9 }), makeInput());
    expect(next.dominantEmotion).toBe('panic');
    expect(next.emotionalIntensity).toBeCloseTo(0.8, 10);
  });
});

describe('SocialStage', () => {
  it('samples at most eight ties regardless of how many exist', () => {
    const ties = Array.from({ length: 30 }, (_, i) => ({ agentId: i + 1, strength: 0.5 }));
    const next = SocialStage.apply(makeState({ ties }), makeInput());
    expect(next.sampledNeighbors).toHaveLength(8);
    expect(new Set(next.sampledNeighbors).size).toBe(8);
  });

  it('folds the tie-weighted peer sentiment into belief', () => {
    const state = makeState({
      belief: 0,
      socialWeight: 0.5,
      ties: [{ agentId: 1, strength: 1 }, { agentId: 2, strength: 0.5 }],
    });
    const peers = new Map([[1, 0.8], [2, -0.4]]);
    const next = SocialStage.apply(state, makeInput(makeTraits(), { peerSentiment: peers }));
    // peer = (0.8 - 0.2) / 1.5 = 0.4, exposure = 0.75, weight = 0.375
    expect(next.peerSentiment).toBeCloseTo(0.4, 10);
    expect(next.belief).toBeCloseTo(0.15, 10);
  });

  it('leaves belief alone when no sampled neighbor posted', () => {
    const state = makeState({ belief: 0.3, ties: [{ agentId: 4, strength: 1 }] });
    const next = SocialStage.apply(state, makeInput(makeTraits(), { peerSentiment: new Map([[9, 1]]) }));
    expect(next.belief).toBe(0.3);
    expect(next.peerSentiment).toBeNull();
    expect(next.sampledNeighbors).toEqual([4]);
  });

  it('peerSignal is null without posts', () => {
    expect(peerSignal([{ agentId: 1, strength: 1 }], new Map())).toBeNull();
  });
});

describe('IdentityStage', () => {
  it('scales social weight by susceptibility, conformity and identification', () => {
    const traits = makeTraits({
      social: { susceptibility: 0.5, ties: [] },
      identity: { group: 'retail_investor', identification: 1 },
    });
    expect(socialWeightFor(traits, null)).toBeCloseTo(0.35, 10);
    expect(socialWeightFor(traits, 0.5)).toBeCloseTo(0.42, 10);
    expect(socialWeightFor(traits, -0.5)).toBeCloseTo(0.35, 10);
  });

  it('never boosts a group without a lean', () => {
    const traits = makeTraits({
      social: { susceptibility: 1, ties: [] },
      identity: { group: 'institutional', identification: 1 },
    });
    expect(socialWeightFor(traits, 0.9)).toBeCloseTo(0.3, 10);
  });

  it('caps social weight at 0.9', () => {
    const traits = makeTraits({
      social: { susceptibility: 1, ties: [] },
      identity: { group: 'wsb_ape', identification: 1 },
    });
    expect(socialWeightFor(traits, 1)).toBe(0.9);
  });

  it('pulls belief toward the group lean', () => {
    const traits = makeTraits({ identity: { group: 'skeptic', identification: 1 } });
    const next = IdentityStage.apply(makeState({ belief: 0 }), makeInput(traits));
    expect(next.belief).toBeCloseTo(-0.03, 10);
  });
});

describe('NetworkStage', () => {
  it('strengthens agreeing ties and weakens disagreeing ones', () => {
    expect(evolveTie({ agentId: 1, strength: 0.5 }, 1, 1).strength).toBeCloseTo(0.525, 10);
    expect(evolveTie({ agentId: 1, strength: 0.5 }, -1, 1).strength).toBeCloseTo(0.475, 10);
  });

  it('keeps strength within [0.05, 1]', () => {
    expect(evolveTie({ agentId: 1, strength: 0.06 }, -1, 1).strength).toBe(0.05);
    expect(evolveTie({ agentId: 1, strength: 0.99 }, 1, 1).strength).toBe(1);
  });

  it('only touches sampled neighbors that posted', () => {
    const state = makeState({
      belief: 1,
      ties: [
        { agentId: 1, strength: 0.5 },
        { agentId: 2, strength: 0.5 },
        { agentId: 3, strength: 0.5 },
      ],
      sampledNeighbors: [1, 2],
    });
    const peers = new Map([[1, 1], [3, 1]]);
    const next = NetworkStage.apply(state, makeInput(makeTraits(), { peerSentiment: peers }));
    expect(next.ties[0]?.strength).toBeCloseTo(0.525, 10);
    expect(next.ties[1]?.strength).toBe(0.5);
    expect(next.ties[2]?.strength).toBe(0.5);
    expect(state.ties[0]?.strength).toBe(0.5);
  });
});

describe('MarketStructureStage', () => {
  it('clamps willingness to 1 for a maximal agent', () => {
    const traits = makeTraits({
      network: { position: 'core', influence: 1 },
      market: { actionThreshold: 0.5, riskTolerance: 1 },
    });
    const next = MarketStructureStage.apply(
      makeState({ belief: 1, emotionalIntensity: 1 }),
      makeInput(traits, { trend: 1 }),
    );
    expect(next.willingness).toBe(1);
  });

  it('clamps willingness to 0 for a minimal agent', () => {
    const traits = makeTraits({
      network: { position: 'periphery', influence: 0 },
      market: { actionThreshold: 0.5, riskTolerance: 0 },
    });
    const next = MarketStructureStage.apply(makeState({ belief: 0, emotionalIntensity: 0 }), makeInput(traits));
    expect(next.willingness).toBe(0);
  });

  it('stays within the jitter band of the weighted sum', () => {
    const next = MarketStructureStage.apply(
      makeState({ belief: -0.5, emotionalIntensity: 0.4 }),
      makeInput(makeTraits(), { trend: 0.5 }),
    );
    // 0.225 + 0.14 + 0.05 + 0.02 + 0 = 0.435
    expect(next.willingness).toBeGreaterThanOrEqual(0.385);
    expect(next.willingness).toBeLessThanOrEqual(0.485);
  });
});
