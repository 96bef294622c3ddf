// Stage 6: Network structure. Ties to neighbors read this step drift with agreement.

import { MIN_TIE_STRENGTH, TIE_LEARNING_RATE } from '../defaults.js';
import type { AgentState, SocialTie, Stage, StageInput } from '../types.js';
import { clamp } from '../utils.js';

export function evolveTie(tie: SocialTie, neighborSentiment: number, belief: number): SocialTie {
  const agreement = 1 - Math.abs(neighborSentiment - belief) / 2;
  return {
    agentId: tie.agentId,
    strength: clamp(tie.strength + TIE_LEARNING_RATE * (agreement - 0.5), MIN_TIE_STRENGTH, 1),
  };
}

export const NetworkStage: Stage = {
  id: 'network',
  name: 'Network Structure',
  description:
    'For each sampled neighbor that posted, strength += 0.05 x (agreement - 0.5), clamped to [0.05, 1].',
  apply(state: AgentState, { context }: StageInput): AgentState {
    if (state.sampledNeighbors.length === 0) return state;
    const sampled = new Set(state.sampledNeighbors);
    const ties = state.ties.map((tie) => {
      if (!sampled.has(tie.agentId)) return tie;
      const sentiment = context.peerSentiment.get(tie.agentId);
      return sentiment === undefined ? tie : evolveTie(tie, sentiment, state.belief);
    });
    return { ...state, ties };
  },
};
