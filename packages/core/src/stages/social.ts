// Stage 4: Social interaction. A bounded sample of ties is read for last
// step's posts and their weighted mood is folded into belief.

import { MAX_NEIGHBOR_SAMPLE } from '../defaults.js';
import type { AgentState, SocialTie, Stage, StageInput } from '../types.js';
import { clamp } from '../utils.js';

export interface PeerSignal {
  /** Tie-strength-weighted mean sentiment of neighbors that posted. */
  sentiment: number;
  /** Mean strength of those ties. */
  exposure: number;
}

export function peerSignal(
  ties: readonly SocialTie[],
  posts: ReadonlyMap<number, number>,
): PeerSignal | null {
  let weightSum = 0;
  let weighted = 0;
  let count = 0;
  for (const tie of ties) {
    const sentiment = posts.get(tie.agentId);
    if (sentiment === undefined) continue;
    weightSum += tie.strength;
    weighted += tie.strength * sentiment;
    count++;
  }
  if (count === 0 || weightSum === 0) return null;
  return { sentiment: weighted / weightSum, exposure: weightSum / count };
}

export const SocialStage: Stage = {
  id: 'social',
  name: 'Social Interaction',
  description:
    'Sample at most 8 ties; belief moves toward the weighted peer sentiment ' +
    'by socialWeight x exposure.',
  apply(state: AgentState, { context, rng }: StageInput): AgentState {
    const sampled = rng.sample(state.ties, MAX_NEIGHBOR_SAMPLE);
    const signal = peerSignal(sampled, context.peerSentiment);
    const sampledNeighbors = sampled.map((t) => t.agentId);

    if (!signal) {
      return { ...state, sampledNeighbors, peerSentiment: null };
    }

    const weight = state.socialWeight * signal.exposure;
    return {
      ...state,
      sampledNeighbors,
      peerSentiment: signal.sentiment,
      belief: clamp(state.belief + weight * (signal.sentiment - state.belief), -1, 1),
    };
  },
};
