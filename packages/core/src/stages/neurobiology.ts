// Stage 1: Neurobiology. Arousal and valence relax toward the persona's
// baselines and react to the latest market shock.

import { SHOCK_SCALE_PCT } from '../defaults.js';
import type { AgentState, Stage, StageInput } from '../types.js';
import { clamp } from '../utils.js';

/** Share of a full shock that reaches valence. */
const VALENCE_SHOCK_GAIN = 0.5;

export function marketShock(priceChangePct: number, shockSensitivity: number): number {
  return Math.min(Math.abs(priceChangePct) / SHOCK_SCALE_PCT, 1) * shockSensitivity;
}

export const NeurobiologyStage: Stage = {
  id: 'neurobiology',
  name: 'Neurobiology',
  description:
    'Arousal and valence decay toward baseline by exp(-decayRate x elapsed steps), ' +
    'then the previous price move pushes arousal up and valence in its direction.',
  apply(state: AgentState, { traits, context }: StageInput): AgentState {
    const { arousalBaseline, valenceBaseline, shockSensitivity } = traits.neurobiology;
    const elapsed = state.lastUpdatedStep < 0 ? 1 : Math.max(1, context.stepIndex - state.lastUpdatedStep);
    const decay = Math.exp(-traits.emotion.decayRate * elapsed);

    let arousal = arousalBaseline + (state.arousal - arousalBaseline) * decay;
    let valence = valenceBaseline + (state.valence - valenceBaseline) * decay;

    const shock = marketShock(context.priceChangePct, shockSensitivity);
    arousal += shock * (1 - arousal);
    valence += Math.sign(context.priceChangePct) * shock * VALENCE_SHOCK_GAIN;

    return {
      ...state,
      arousal: clamp(arousal, 0, 1),
      valence: clamp(valence, -1, 1),
    };
  },
};
