// RunManager: owns the single active run
// start → background steps (personas → market seed → agents → step loop) → COMPLETED | STOPPED | FAILED

import { randomInt, randomUUID } from 'node:crypto';
import { setImmediate as yieldToLoop, setTimeout as sleep } from 'node:timers/promises';
import { AgentModel, createAgent } from './AgentModel.js';
import { assertMarketParams, assertSimulationConfig, type SimulationConfigInput } from './ConfigValidator.js';
import { TemplateContentProducer } from './ContentProducer.js';
import {
  DEFAULT_MARKET_PARAMS,
  DEFAULT_MARKET_TOPIC,
  DEFAULT_START_TIME,
  RECENT_LOG_LIMIT,
  STEPS_PER_DAY,
  type MarketParams,
} from './defaults.js';
import { ConflictError, CrowdSimError, StepExecutionError, describeError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { MarketModel } from './MarketModel.js';
import { ExternalPersonaProvider, FallbackPersonaProvider, SyntheticPersonaProvider } from './PersonaProvider.js';
import { summarizeResults } from './ResultsAggregator.js';
import { RunLog } from './RunLog.js';
import { DatasetPersonaSource } from './sources/DatasetPersonaSource.js';
import { KalshiTrendSource } from './sources/KalshiTrendSource.js';
import type {
  ActionLogEntry,
  Agent,
  AgentState,
  ContentProducer,
  Persona,
  PersonaSource,
  ResolvedConfig,
  ResultSink,
  RunArtifact,
  RunSnapshot,
  RunStarted,
  RunStatus,
  SimulationResults,
  SimulationRun,
  StepRecord,
  TrendSource,
} from './types.js';
import { clamp, mean, round } from './utils.js';

export interface RunFailure {
  runId: string;
  code: string;
  message: string;
}

export interface RunEventMap {
  step: StepRecord;
  status: RunSnapshot;
  error: RunFailure;
}

export type RunEventName = keyof RunEventMap;
export type RunEventHandler<K extends RunEventName> = (payload: RunEventMap[K]) => void;

export interface RunManagerOptions {
  logger?: Logger;
  /** Opt-in for external persona datasets. Off by default. */
  researchMode?: boolean;
  personaSource?: PersonaSource;
  trendSource?: TrendSource;
  contentProducer?: ContentProducer;
  resultSink?: ResultSink;
  /** Wait between steps. 0 yields to the event loop only. */
  stepDelayMs?: number;
  /** ISO-8601 time of day 1, step 0 on the simulated clock. */
  startTime?: string;
  marketParams?: Partial<MarketParams>;
}

interface ActiveRun {
  run: SimulationRun;
  log: RunLog;
  market: MarketModel;
  logger: Logger;
}

const IDLE_SNAPSHOT: RunSnapshot = Object.freeze({
  runId: null,
  status: 'IDLE',
  isRunning: false,
  currentStep: 0,
  totalSteps: 0,
  progressPct: 0,
  currentPrice: 0,
  currentDay: 0,
  error: null,
  recentLogs: Object.freeze([]),
});

export class RunManager {
  private static readonly MAX_HANDLERS_PER_EVENT = 100;

  private readonly logger: Logger;
  private readonly researchMode: boolean;
  private readonly personaSource: PersonaSource;
  private readonly trendSource: TrendSource;
  private readonly producer: ContentProducer;
  private readonly sink: ResultSink | null;
  private readonly stepDelayMs: number;
  private readonly startTime: string;
  private readonly marketParams: MarketParams;

  private active: ActiveRun | null = null;
  private snapshot: RunSnapshot = IDLE_SNAPSHOT;
  private stopRequested = false;
  private task: Promise<void> = Promise.resolve();

  private handlers: { [K in RunEventName]: RunEventHandler<K>[] } = { step: [], status: [], error: [] };

  constructor(options: RunManagerOptions = {}) {
    this.logger = options.logger ?? silentLogger();
    this.researchMode = options.researchMode ?? false;
    this.personaSource = options.personaSource ?? new DatasetPersonaSource();
    this.trendSource = options.trendSource ?? new KalshiTrendSource();
    this.producer = options.contentProducer ?? new TemplateContentProducer();
    this.sink = options.resultSink ?? null;
    this.stepDelayMs = options.stepDelayMs ?? 0;
    this.startTime = options.startTime ?? DEFAULT_START_TIME;
    this.marketParams = assertMarketParams({ ...DEFAULT_MARKET_PARAMS, ...options.marketParams });
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────────

  /**
   * Validates the config, creates the run and launches it in the background.
   * Returns before the first step runs.
   * @throws ConflictError while another run is RUNNING
   * @throws ConfigValidationError before any run is created
   */
  start(input: SimulationConfigInput): RunStarted {
    if (this.active && this.active.run.status === 'RUNNING') {
      throw new ConflictError(this.active.run.runId);
    }
    const config = assertSimulationConfig(input);

    const resolved: ResolvedConfig = {
      agentCount: config.agentCount,
      dayCount: config.dayCount,
      mockMode: config.mockMode,
      marketTopic: config.marketTopic ?? DEFAULT_MARKET_TOPIC,
      randomSeed: config.randomSeed ?? randomInt(0, 2 ** 31),
      customAgents: config.customAgents ?? [],
      stepsPerDay: STEPS_PER_DAY,
      startTime: this.startTime,
    };

    const run: SimulationRun = {
      runId: randomUUID(),
      config: resolved,
      status: 'RUNNING',
      currentStep: 0,
      totalSteps: resolved.dayCount * resolved.stepsPerDay,
      error: null,
      startedAt: new Date().toISOString(),
      stoppedAt: null,
    };

    const active: ActiveRun = {
      run,
      log: new RunLog(),
      market: new MarketModel({
        runSeed: resolved.randomSeed,
        startTime: resolved.startTime,
        stepsPerDay: resolved.stepsPerDay,
        params: this.marketParams,
      }),
      logger: this.logger.child({ runId: run.runId }),
    };

    this.active = active;
    this.stopRequested = false;
    this.publish(active);
    active.logger.info(
      { agents: resolved.agentCount, days: resolved.dayCount, seed: resolved.randomSeed, mock: resolved.mockMode },
      'run started',
    );
    this.emit('status', this.snapshot);

    this.task = this.execute(active).catch((err: unknown) => this.fail(active, err));
    return { runId: run.runId, totalSteps: run.totalSteps, seed: resolved.randomSeed };
  }

  /** Signals the running run to stop at the next step boundary. */
  stop(): boolean {
    if (!this.active || this.active.run.status !== 'RUNNING') return false;
    this.stopRequested = true;
    this.active.logger.info({ step: this.active.run.currentStep }, 'stop requested');
    return true;
  }

  /** Resolves once the background task of the latest run has finished. */
  settled(): Promise<void> {
    return this.task;
  }

  // ── Queries ─────────────────────────────────────────────────────────────────

  /** Current frozen snapshot. Never waits on a step. */
  state(): RunSnapshot {
    return this.snapshot;
  }

  /** Summary and chart of the latest run (partial while running); null before any run. */
  results(): SimulationResults | null {
    if (!this.active) return null;
    return summarizeResults(this.active.log.all(), this.active.market.series);
  }

  /** Copy of the latest run record. */
  currentRun(): SimulationRun | null {
    return this.active ? { ...this.active.run } : null;
  }

  // ── Background execution ────────────────────────────────────────────────────

  private async execute(active: ActiveRun): Promise<void> {
    const { run, market, logger } = active;
    const config = run.config;

    let agents: Agent[];
    try {
      const personas = await this.resolvePersonas(config, logger);
      if (!config.mockMode) {
        await market.seed(this.trendSource, config.marketTopic, logger);
      }
      agents = personas.map(createAgent).sort((a, b) => a.id - b.id);
    } catch (err) {
      await this.fail(active, err);
      return;
    }

    const model = new AgentModel({ runSeed: config.randomSeed, producer: this.producer });
    this.publish(active);

    while (run.currentStep < run.totalSteps) {
      if (this.stopRequested) {
        await this.finish(active, 'STOPPED');
        return;
      }
      const stepIndex = run.currentStep;
      let record: StepRecord;
      try {
        record = this.executeStep(active, agents, model, stepIndex);
      } catch (err) {
        await this.fail(active, new StepExecutionError(stepIndex, err));
        return;
      }
      this.publish(active);
      this.emit('step', record);
      await this.pause();
    }

    await this.finish(active, 'COMPLETED');
  }

  private executeStep(active: ActiveRun, agents: Agent[], model: AgentModel, stepIndex: number): StepRecord {
    const { run, log, market } = active;
    const context = market.context(stepIndex, run.config.marketTopic, log.previousStepPosts());

    const states: AgentState[] = [];
    const entries: ActionLogEntry[] = [];
    for (const agent of agents) {
      const { state, entry } = model.evaluate(agent, context);
      states.push(state);
      if (entry) entries.push(entry);
    }

    // Every agent succeeded: commit.
    const sentiment = mean(entries.map((e) => e.sentimentScore));
    const marketState = market.update(stepIndex, sentiment, entries.length);
    log.commitStep(stepIndex, entries);
    agents.forEach((agent, i) => {
      const state = states[i];
      if (state) agent.state = state;
    });
    run.currentStep = stepIndex + 1;

    return {
      runId: run.runId,
      market: marketState,
      chartPoint: { timestamp: marketState.timestamp, sentimentScore: sentiment, marketPrice: marketState.price },
      entries,
      currentStep: run.currentStep,
      totalSteps: run.totalSteps,
    };
  }

  private async resolvePersonas(config: ResolvedConfig, logger: Logger): Promise<Persona[]> {
    const custom = config.customAgents;
    if (custom.length > 0) {
      const personas: Persona[] = [];
      for (let id = 0; id < config.agentCount; id++) {
        const traits = custom[id % custom.length];
        if (traits) personas.push({ kind: 'custom', id, traits });
      }
      return personas;
    }

    const synthetic = new SyntheticPersonaProvider(config.randomSeed);
    if (config.mockMode || !this.researchMode) {
      return synthetic.generate(config.agentCount, config.marketTopic);
    }
    const external = new ExternalPersonaProvider(this.personaSource, { optIn: this.researchMode, logger });
    return new FallbackPersonaProvider(external, synthetic, logger).generate(config.agentCount, config.marketTopic);
  }

  private pause(): Promise<unknown> {
    return this.stepDelayMs > 0 ? sleep(this.stepDelayMs) : yieldToLoop();
  }

  private async fail(active: ActiveRun, err: unknown): Promise<void> {
    const message = describeError(err);
    const code = err instanceof CrowdSimError ? err.code : 'internal';
    active.logger.error({ err: message, code, step: active.run.currentStep }, 'run failed');
    this.emit('error', { runId: active.run.runId, code, message });
    await this.finish(active, 'FAILED', message);
  }

  private async finish(active: ActiveRun, status: Exclude<RunStatus, 'RUNNING'>, error: string | null = null): Promise<void> {
    const { run } = active;
    if (run.status !== 'RUNNING') return;
    run.status = status;
    run.error = error;
    run.stoppedAt = new Date().toISOString();
    this.publish(active);
    if (status !== 'FAILED') {
      active.logger.info({ status, steps: run.currentStep, posts: active.log.size }, 'run finished');
    }
    this.emit('status', this.snapshot);

    if (status !== 'FAILED' && this.sink) {
      try {
        await this.sink.write(this.artifact(active));
      } catch (err) {
        active.logger.error({ err: describeError(err) }, 'failed to write run artifact');
      }
    }
  }

  private artifact(active: ActiveRun): RunArtifact {
    return {
      runId: active.run.runId,
      status: active.run.status,
      config: active.run.config,
      log: [...active.log.all()],
      series: [...active.market.series],
    };
  }

  /** Replaces the snapshot with a new frozen object. */
  private publish(active: ActiveRun): void {
    const { run, log, market } = active;
    const { currentStep, totalSteps } = run;
    this.snapshot = Object.freeze({
      runId: run.runId,
      status: run.status,
      isRunning: run.status === 'RUNNING',
      currentStep,
      totalSteps,
      progressPct: totalSteps > 0 ? round(clamp((currentStep / totalSteps) * 100, 0, 100), 1) : 0,
      currentPrice: market.price,
      currentDay: Math.min(run.config.dayCount, Math.floor(currentStep / run.config.stepsPerDay) + 1),
      error: run.error,
      recentLogs: Object.freeze(log.recent(RECENT_LOG_LIMIT)),
    });
  }

  // ── Events ──────────────────────────────────────────────────────────────────

  on<K extends RunEventName>(event: K, handler: RunEventHandler<K>): this {
    const list: RunEventHandler<K>[] = this.handlers[event];
    if (!list.includes(handler)) {
      if (list.length >= RunManager.MAX_HANDLERS_PER_EVENT) {
        throw new Error(`[RunManager] Max ${RunManager.MAX_HANDLERS_PER_EVENT} handlers per event reached for '${event}'`);
      }
      list.push(handler);
    }
    return this;
  }

  off<K extends RunEventName>(event: K, handler: RunEventHandler<K>): this {
    const list: RunEventHandler<K>[] = this.handlers[event];
    const index = list.indexOf(handler);
    if (index >= 0) list.splice(index, 1);
    return this;
  }

  private emit<K extends RunEventName>(event: K, payload: RunEventMap[K]): void {
    const list: RunEventHandler<K>[] = this.handlers[event];
    for (const handler of [...list]) {
      try {
        handler(payload);
      } catch (err) {
        this.logger.error({ event, err: describeError(err) }, 'event handler failed');
      }
    }
  }
}
