// AgentModel: runs the seven stages for one agent and applies the decision rule

import { assertPersonaTraits } from './ConfigValidator.js';
import { Rng, STREAM, deriveSeed } from './Rng.js';
import { ALL_STAGES, classifyEmotion, emotionalIntensity, socialWeightFor } from './stages/index.js';
import type {
  ActionLogEntry,
  Agent,
  AgentState,
  ContentProducer,
  MarketContext,
  Persona,
  PersonaTraits,
  SocialTie,
  Stage,
} from './types.js';
import { clamp } from './utils.js';

export interface AgentModelOptions {
  runSeed: number;
  producer: ContentProducer;
  /** Defaults to ALL_STAGES. Order is evaluation order. */
  stages?: readonly Stage[];
}

export interface Evaluation {
  state: AgentState;
  /** null when the agent abstains. */
  entry: ActionLogEntry | null;
}

/**
 * Builds an agent from a persona, validating every layer's parameters.
 * Self-ties and repeated ties are dropped (first one wins).
 * @throws ConfigValidationError
 */
export function createAgent(persona: Persona): Agent {
  const traits = assertPersonaTraits(persona.traits);
  const validated: Persona = { ...persona, traits };
  return {
    id: persona.id,
    persona: validated,
    state: initialState(traits, persona.id),
  };
}

export function initialState(traits: PersonaTraits, selfId: number): AgentState {
  const { arousalBaseline, valenceBaseline } = traits.neurobiology;
  return {
    belief: traits.cognition.initialBelief,
    arousal: arousalBaseline,
    valence: valenceBaseline,
    emotionalIntensity: emotionalIntensity(valenceBaseline, arousalBaseline),
    dominantEmotion: classifyEmotion(valenceBaseline, arousalBaseline),
    socialWeight: socialWeightFor(traits, null),
    ties: uniqueTies(traits.social.ties, selfId),
    sampledNeighbors: [],
    peerSentiment: null,
    willingness: 0,
    lastUpdatedStep: -1,
  };
}

function uniqueTies(ties: readonly SocialTie[], selfId: number): SocialTie[] {
  const seen = new Set<number>([selfId]);
  const out: SocialTie[] = [];
  for (const tie of ties) {
    if (seen.has(tie.agentId)) continue;
    seen.add(tie.agentId);
    out.push({ agentId: tie.agentId, strength: tie.strength });
  }
  return out;
}

export function sentimentScore(state: AgentState): number {
  return clamp(0.7 * state.belief + 0.3 * state.valence, -1, 1);
}

export class AgentModel {
  private readonly runSeed: number;
  private readonly producer: ContentProducer;
  private readonly stages: readonly Stage[];

  constructor(options: AgentModelOptions) {
    this.runSeed = options.runSeed;
    this.producer = options.producer;
    this.stages = options.stages ?? ALL_STAGES;
  }

  /**
   * Evaluates one agent for one step. The agent is not modified; the caller
   * commits the returned state once the whole step has succeeded.
   */
  evaluate(agent: Agent, context: MarketContext): Evaluation {
    const traits = agent.persona.traits;
    const rng = new Rng(deriveSeed(this.runSeed, STREAM.agent, agent.id, context.stepIndex));

    let state = agent.state;
    for (const stage of this.stages) {
      state = stage.apply(state, { traits, context, rng });
    }
    state = { ...state, lastUpdatedStep: context.stepIndex };

    if (state.willingness <= traits.market.actionThreshold) {
      return { state, entry: null };
    }

    const score = sentimentScore(state);
    const content = this.producer.produce(
      deriveSeed(this.runSeed, STREAM.content, agent.id, context.stepIndex),
      score,
      { topic: context.topic, trendTopics: context.trendTopics, emotion: state.dominantEmotion },
    );

    return {
      state,
      entry: {
        agentId: agent.id,
        day: context.day,
        step: context.step,
        stepIndex: context.stepIndex,
        timestamp: context.timestamp,
        actionType: 'POST',
        content,
        sentimentScore: score,
      },
    };
  }
}
