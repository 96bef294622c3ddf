// Stage 2: Cognition. Belief chases the perceived price movement at a rate
// set by the persona's bias coefficient.

import { BELIEF_JITTER, BELIEF_LEARNING_RATE, MOVEMENT_SCALE_PCT } from '../defaults.js';
import type { AgentState, Stage, StageInput } from '../types.js';
import { clamp } from '../utils.js';

export function perceivedMovement(priceChangePct: number): number {
  return clamp(priceChangePct / MOVEMENT_SCALE_PCT, -1, 1);
}

export const CognitionStage: Stage = {
  id: 'cognition',
  name: 'Cognition',
  description:
    'belief += 0.2 x biasCoefficient x (movement - belief), movement = clamp(change% / 5, -1, 1), ' +
    'plus jitter in [-0.01, 0.01).',
  apply(state: AgentState, { traits, context, rng }: StageInput): AgentState {
    const movement = perceivedMovement(context.priceChangePct);
    const rate = BELIEF_LEARNING_RATE * traits.cognition.biasCoefficient;
    const jitter = rng.range(-BELIEF_JITTER, BELIEF_JITTER);
    return {
      ...state,
      belief: clamp(state.belief + rate * (movement - state.belief) + jitter, -1, 1),
    };
  },
};
