// Stage 5: Identity. Group membership sets how much peers matter and pulls
// belief toward the group's lean.

import { GROUP_CONFORMITY, GROUP_LEAN, IDENTITY_PULL, MAX_SOCIAL_WEIGHT } from '../defaults.js';
import type { AgentState, PersonaTraits, Stage, StageInput } from '../types.js';
import { clamp } from '../utils.js';

const AGREEMENT_BOOST = 1.2;

export function socialWeightFor(traits: PersonaTraits, peerSentiment: number | null): number {
  const { group, identification } = traits.identity;
  let weight = traits.social.susceptibility * GROUP_CONFORMITY[group] * (0.5 + 0.5 * identification);
  const lean = GROUP_LEAN[group];
  if (peerSentiment !== null && lean !== 0 && Math.sign(peerSentiment) === Math.sign(lean)) {
    weight *= AGREEMENT_BOOST;
  }
  return clamp(weight, 0, MAX_SOCIAL_WEIGHT);
}

export const IdentityStage: Stage = {
  id: 'identity',
  name: 'Identity',
  description:
    'socialWeight = susceptibility x conformity x (0.5 + 0.5 identification), x1.2 when peers ' +
    'agree with the group lean, capped at 0.9; belief moves toward the lean by 0.05 x identification.',
  apply(state: AgentState, { traits }: StageInput): AgentState {
    const lean = GROUP_LEAN[traits.identity.group];
    const pull = IDENTITY_PULL * traits.identity.identification;
    return {
      ...state,
      socialWeight: socialWeightFor(traits, state.peerSentiment),
      belief: clamp(state.belief + pull * (lean - state.belief), -1, 1),
    };
  },
};
