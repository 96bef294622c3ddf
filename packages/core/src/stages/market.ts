// Stage 7: Market structure. Willingness to act on the current view.

import { WILLINGNESS_JITTER } from '../defaults.js';
import type { AgentState, Stage, StageInput } from '../types.js';
import { clamp } from '../utils.js';

export const MarketStructureStage: Stage = {
  id: 'market',
  name: 'Market Structure',
  description:
    'willingness = 0.45|belief| + 0.35 intensity + 0.1|trend| + 0.1 influence ' +
    '+ 0.2 (riskTolerance - 0.5) + jitter, clamped to [0, 1].',
  apply(state: AgentState, { traits, context, rng }: StageInput): AgentState {
    const raw =
      0.45 * Math.abs(state.belief) +
      0.35 * state.emotionalIntensity +
      0.1 * Math.abs(context.trend) +
      0.1 * traits.network.influence +
      0.2 * (traits.market.riskTolerance - 0.5) +
      rng.range(-WILLINGNESS_JITTER, WILLINGNESS_JITTER);
    return { ...state, willingness: clamp(raw, 0, 1) };
  },
};
