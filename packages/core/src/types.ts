// ─────────────────────────────────────────────────────────────────────────────
// CrowdSim Core Types
// Every other file imports from here. Keep this file pure (no logic).
// ─────────────────────────────────────────────────────────────────────────────

import type { Rng } from './Rng.js';

// ── Personas ─────────────────────────────────────────────────────────────────

export type IdentityGroup =
  | 'wsb_ape'
  | 'retail_investor'
  | 'institutional'
  | 'skeptic'
  | 'neutral';

export type NetworkPosition = 'core' | 'bridge' | 'periphery';

export interface SocialTie {
  agentId: number;
  strength: number;           // (0, 1]
}

/** Per-layer parameters of one agent. Every block is required. */
export interface PersonaTraits {
  name: string;
  neurobiology: {
    arousalBaseline: number;  // [0, 1]
    valenceBaseline: number;  // [-1, 1]
    shockSensitivity: number; // [0, 1]
  };
  cognition: {
    biasCoefficient: number;  // [0, 3]; <1 under-reacts, >1 over-reacts
    initialBelief: number;    // [-1, 1]
  };
  emotion: {
    decayRate: number;        // [0, 1] per step
  };
  social: {
    susceptibility: number;   // [0, 1]
    ties: SocialTie[];
  };
  identity: {
    group: IdentityGroup;
    identification: number;   // [0, 1]
  };
  network: {
    position: NetworkPosition;
    influence: number;        // [0, 1]
  };
  market: {
    actionThreshold: number;  // [0, 1]
    riskTolerance: number;    // [0, 1]
  };
}

export interface SyntheticPersona {
  kind: 'synthetic';
  id: number;
  traits: PersonaTraits;
}

export interface ExternalPersona {
  kind: 'external';
  id: number;
  source: string;
  traits: PersonaTraits;
}

/** Supplied in the run config; cycled over the population. */
export interface CustomPersona {
  kind: 'custom';
  id: number;
  traits: PersonaTraits;
}

export type Persona = SyntheticPersona | ExternalPersona | CustomPersona;

// ── Agents ───────────────────────────────────────────────────────────────────

export type EmotionLabel =
  | 'euphoria'
  | 'excitement'
  | 'contentment'
  | 'panic'
  | 'fear'
  | 'anxiety'
  | 'sadness'
  | 'alertness'
  | 'calm'
  | 'neutral';

export interface AgentState {
  belief: number;             // [-1, 1]
  arousal: number;            // [0, 1]
  valence: number;            // [-1, 1]
  emotionalIntensity: number; // [0, 1]
  dominantEmotion: EmotionLabel;
  socialWeight: number;       // [0, 1]
  ties: SocialTie[];
  sampledNeighbors: number[];
  peerSentiment: number | null;
  willingness: number;        // [0, 1]
  lastUpdatedStep: number;    // -1 before the first step
}

export interface Agent {
  readonly id: number;
  readonly persona: Persona;
  state: AgentState;
}

export type StageId =
  | 'neurobiology'
  | 'cognition'
  | 'emotion'
  | 'social'
  | 'identity'
  | 'network'
  | 'market';

/** Read-only inputs every stage sees. The rng is the agent's stream for this step. */
export interface StageInput {
  traits: PersonaTraits;
  context: MarketContext;
  rng: Rng;
}

export interface Stage {
  id: StageId;
  name: string;
  description: string;
  /** Pure: returns a new state, never mutates the one passed in. */
  apply(state: AgentState, input: StageInput): AgentState;
}

// ── Market ───────────────────────────────────────────────────────────────────

/** What an agent sees of the world when it is evaluated for one step. */
export interface MarketContext {
  day: number;                // 1-based
  step: number;               // 0-based step within the day
  stepIndex: number;          // 0-based global step
  timestamp: string;          // ISO-8601, simulated clock
  topic: string;
  trendTopics: string[];
  price: number;
  priceChangePct: number;     // previous step's move
  trend: number;              // [-1, 1], short horizon
  peerSentiment: ReadonlyMap<number, number>; // previous step's posts by agent id
}

export interface MarketState {
  day: number;
  step: number;
  stepIndex: number;
  timestamp: string;
  price: number;
  aggregateSentiment: number;
  postCount: number;
}

export interface MarketTrend {
  price: number;
  context: string[];
}

// ── Actions & results ────────────────────────────────────────────────────────

export type ActionType = 'POST';

export interface ActionLogEntry {
  agentId: number;
  day: number;
  step: number;
  stepIndex: number;
  timestamp: string;
  actionType: ActionType;
  content: string;
  sentimentScore: number;     // [-1, 1]
}

export interface ResultsSummary {
  totalPosts: number;
  timePeriods: number;        // market steps in the series
  avgSentiment: number;       // 0 for an empty log
  maxSentiment: number | null;
  minSentiment: number | null;
  peakActivityTimestamp: string | null;
  keywordTotals: Record<string, number>;
}

export interface ChartPoint {
  timestamp: string;
  sentimentScore: number;
  marketPrice: number;
}

export interface SimulationResults {
  summary: ResultsSummary;
  chartData: ChartPoint[];
}

// ── Runs ─────────────────────────────────────────────────────────────────────

export interface SimulationConfig {
  agentCount: number;
  dayCount: number;
  mockMode: boolean;
  marketTopic?: string;
  randomSeed?: number;
  customAgents?: PersonaTraits[];
}

/** Config snapshot stored on a run: every optional resolved. */
export interface ResolvedConfig {
  agentCount: number;
  dayCount: number;
  mockMode: boolean;
  marketTopic: string;
  randomSeed: number;
  customAgents: PersonaTraits[];
  stepsPerDay: number;
  startTime: string;
}

export type RunStatus = 'RUNNING' | 'COMPLETED' | 'STOPPED' | 'FAILED';

export interface SimulationRun {
  runId: string;
  config: ResolvedConfig;
  status: RunStatus;
  currentStep: number;
  totalSteps: number;
  error: string | null;
  startedAt: string;
  stoppedAt: string | null;
}

export interface RecentLog {
  agentId: number;
  actionType: ActionType;
  content: string;
  timestamp: string;
}

/** Immutable view of the run manager, replaced wholesale after every step. */
export interface RunSnapshot {
  runId: string | null;
  status: RunStatus | 'IDLE';
  isRunning: boolean;
  currentStep: number;
  totalSteps: number;
  progressPct: number;
  currentPrice: number;
  currentDay: number;
  error: string | null;
  recentLogs: readonly RecentLog[];
}

export interface RunStarted {
  runId: string;
  totalSteps: number;
  seed: number;
}

export interface StepRecord {
  runId: string;
  market: MarketState;
  chartPoint: ChartPoint;
  entries: readonly ActionLogEntry[];
  currentStep: number;
  totalSteps: number;
}

/** Everything a finished run leaves behind. */
export interface RunArtifact {
  runId: string;
  status: RunStatus;
  config: ResolvedConfig;
  log: ActionLogEntry[];
  series: MarketState[];
}

// ── Collaborators ────────────────────────────────────────────────────────────

export interface PersonaProvider {
  generate(count: number, topic: string): Promise<Persona[]>;
}

export interface PersonaSource {
  readonly name: string;
  /** Raw records; free-text fields are stripped by the caller. */
  fetchPersonas(topic: string, count: number): Promise<Record<string, unknown>[]>;
}

export interface TrendSource {
  readonly name: string;
  fetchTrend(topic: string): Promise<MarketTrend>;
}

/** Snapshot of what is trending on the market venue right now. */
export interface TrendAnalysis {
  topics: string[];
  tickers: string[];
  summary: string;
  /** Mean last price of the listed markets; null when none is priced. */
  price: number | null;
}

export interface TrendAnalyzer {
  readonly name: string;
  analyzeTrends(topic?: string): Promise<TrendAnalysis>;
}

export interface ContentContext {
  topic: string;
  trendTopics: string[];
  emotion: EmotionLabel;
}

export interface ContentProducer {
  /** Must be a pure function of its arguments. */
  produce(seed: number, sentiment: number, context: ContentContext): string;
}

export interface ResultSink {
  write(artifact: RunArtifact): Promise<void>;
}
