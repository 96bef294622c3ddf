// Stage 3: Emotion. Intensity and a dominant label from the valence/arousal plane.

import type { AgentState, EmotionLabel, Stage } from '../types.js';

export function emotionalIntensity(valence: number, arousal: number): number {
  return Math.min(1, (Math.abs(valence) + Math.abs(arousal - 0.5) * 2) / 2);
}

/** First matching quadrant wins; checked from the most to the least extreme. */
export function classifyEmotion(valence: number, arousal: number): EmotionLabel {
  if (valence > 0.6 && arousal > 0.7) return 'euphoria';
  if (valence > 0.3 && arousal > 0.6) return 'excitement';
  if (valence > 0.3 && arousal < 0.4) return 'contentment';
  if (valence < -0.6 && arousal > 0.7) return 'panic';
  if (valence < -0.3 && arousal > 0.6) return 'fear';
  if (valence < -0.3 && arousal > 0.4) return 'anxiety';
  if (valence < -0.3 && arousal < 0.4) return 'sadness';
  if (arousal > 0.6) return 'alertness';
  if (arousal < 0.3) return 'calm';
  return 'neutral';
}

export const EmotionStage: Stage = {
  id: 'emotion',
  name: 'Emotion',
  description: 'intensity = min(1, (|valence| + 2|arousal - 0.5|) / 2); label by quadrant.',
  apply(state: AgentState): AgentState {
    return {
      ...state,
      emotionalIntensity: emotionalIntensity(state.valence, state.arousal),
      dominantEmotion: classifyEmotion(state.valence, state.arousal),
    };
  },
};
