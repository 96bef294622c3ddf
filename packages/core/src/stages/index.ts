import { NeurobiologyStage } from './neurobiology.js';
import { CognitionStage } from './cognition.js';
import { EmotionStage } from './emotion.js';
import { SocialStage } from './social.js';
import { IdentityStage } from './identity.js';
import { NetworkStage } from './network.js';
import { MarketStructureStage } from './market.js';
import type { Stage } from '../types.js';

export * from './neurobiology.js';
export * from './cognition.js';
export * from './emotion.js';
export * from './social.js';
export * from './identity.js';
export * from './network.js';
export * from './market.js';

/** The seven stages in evaluation order. */
export const ALL_STAGES: readonly Stage[] = [
  NeurobiologyStage,
  CognitionStage,
  EmotionStage,
  SocialStage,
  IdentityStage,
  NetworkStage,
  MarketStructureStage,
];
