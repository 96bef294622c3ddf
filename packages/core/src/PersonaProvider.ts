// PersonaProvider: synthetic personas from the run seed, external personas
// from an opt-in source, and the fallback that joins them.

import { validatePersonaTraits, isRecord } from './ConfigValidator.js';
import { GROUP_WEIGHTS } from './defaults.js';
import { PersonaSourceError, describeError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { Rng, STREAM, deriveSeed } from './Rng.js';
import type {
  ExternalPersona,
  IdentityGroup,
  NetworkPosition,
  Persona,
  PersonaProvider,
  PersonaSource,
  PersonaTraits,
  SocialTie,
  SyntheticPersona,
} from './types.js';
import { round } from './utils.js';

// ── Synthetic ────────────────────────────────────────────────────────────────

type Range = readonly [min: number, max: number];

interface GroupProfile {
  label: string;
  arousalBaseline: Range;
  valenceBaseline: Range;
  shockSensitivity: Range;
  biasCoefficient: Range;
  initialBelief: Range;
  decayRate: Range;
  susceptibility: Range;
  identification: Range;
  actionThreshold: Range;
  riskTolerance: Range;
}

const GROUP_PROFILES: Record<IdentityGroup, GroupProfile> = {
  wsb_ape: {
    label: 'Ape',
    arousalBaseline: [0.6, 0.9],
    valenceBaseline: [0.1, 0.6],
    shockSensitivity: [0.6, 1],
    biasCoefficient: [1.2, 2.5],
    initialBelief: [0.2, 0.8],
    decayRate: [0.05, 0.2],
    susceptibility: [0.6, 1],
    identification: [0.6, 1],
    actionThreshold: [0.2, 0.4],
    riskTolerance: [0.7, 1],
  },
  retail_investor: {
    label: 'Retail',
    arousalBaseline: [0.4, 0.7],
    valenceBaseline: [-0.1, 0.3],
    shockSensitivity: [0.4, 0.8],
    biasCoefficient: [0.8, 1.6],
    initialBelief: [-0.1, 0.5],
    decayRate: [0.1, 0.3],
    susceptibility: [0.4, 0.8],
    identification: [0.3, 0.7],
    actionThreshold: [0.3, 0.5],
    riskTolerance: [0.4, 0.7],
  },
  institutional: {
    label: 'Desk',
    arousalBaseline: [0.2, 0.4],
    valenceBaseline: [-0.1, 0.1],
    shockSensitivity: [0.1, 0.4],
    biasCoefficient: [0.3, 0.8],
    initialBelief: [-0.2, 0.2],
    decayRate: [0.3, 0.6],
    susceptibility: [0.05, 0.3],
    identification: [0.2, 0.5],
    actionThreshold: [0.5, 0.7],
    riskTolerance: [0.2, 0.5],
  },
  skeptic: {
    label: 'Skeptic',
    arousalBaseline: [0.3, 0.6],
    valenceBaseline: [-0.5, -0.1],
    shockSensitivity: [0.3, 0.7],
    biasCoefficient: [0.6, 1.2],
    initialBelief: [-0.7, -0.1],
    decayRate: [0.15, 0.35],
    susceptibility: [0.1, 0.4],
    identification: [0.4, 0.8],
    actionThreshold: [0.35, 0.55],
    riskTolerance: [0.2, 0.5],
  },
  neutral: {
    label: 'Observer',
    arousalBaseline: [0.3, 0.5],
    valenceBaseline: [-0.1, 0.1],
    shockSensitivity: [0.2, 0.6],
    biasCoefficient: [0.7, 1.3],
    initialBelief: [-0.2, 0.2],
    decayRate: [0.2, 0.4],
    susceptibility: [0.3, 0.6],
    identification: [0.1, 0.4],
    actionThreshold: [0.4, 0.6],
    riskTolerance: [0.3, 0.6],
  },
};

const POSITION_WEIGHTS: ReadonlyArray<readonly [NetworkPosition, number]> = [
  ['core', 0.2],
  ['bridge', 0.3],
  ['periphery', 0.5],
];

const INFLUENCE_BY_POSITION: Record<NetworkPosition, Range> = {
  core: [0.6, 1],
  bridge: [0.4, 0.7],
  periphery: [0.05, 0.4],
};

const MIN_TIES = 2;
const MAX_TIES = 5;

/** Deterministic population drawn from the run seed. Never rejects. */
export class SyntheticPersonaProvider implements PersonaProvider {
  constructor(private readonly seed: number) {}

  async generate(count: number, _topic: string): Promise<SyntheticPersona[]> {
    return this.generateSync(count);
  }

  generateSync(count: number): SyntheticPersona[] {
    const rng = new Rng(deriveSeed(this.seed, STREAM.personas));
    const personas: SyntheticPersona[] = [];
    for (let id = 0; id < count; id++) {
      personas.push({ kind: 'synthetic', id, traits: syntheticTraits(rng, id, count) });
    }
    return personas;
  }
}

function syntheticTraits(rng: Rng, id: number, count: number): PersonaTraits {
  const group = rng.weighted(GROUP_WEIGHTS);
  const profile = GROUP_PROFILES[group];
  const position = rng.weighted(POSITION_WEIGHTS);
  const draw = (range: Range): number => round(rng.range(range[0], range[1]), 4);

  return {
    name: `${profile.label} ${id}`,
    neurobiology: {
      arousalBaseline: draw(profile.arousalBaseline),
      valenceBaseline: draw(profile.valenceBaseline),
      shockSensitivity: draw(profile.shockSensitivity),
    },
    cognition: {
      biasCoefficient: draw(profile.biasCoefficient),
      initialBelief: draw(profile.initialBelief),
    },
    emotion: { decayRate: draw(profile.decayRate) },
    social: {
      susceptibility: draw(profile.susceptibility),
      ties: drawTies(rng, id, count),
    },
    identity: { group, identification: draw(profile.identification) },
    network: { position, influence: draw(INFLUENCE_BY_POSITION[position]) },
    market: {
      actionThreshold: draw(profile.actionThreshold),
      riskTolerance: draw(profile.riskTolerance),
    },
  };
}

function drawTies(rng: Rng, id: number, count: number): SocialTie[] {
  const wanted = Math.min(count - 1, MIN_TIES + rng.int(MAX_TIES - MIN_TIES + 1));
  const chosen = new Set<number>();
  while (chosen.size < wanted) {
    const other = rng.int(count);
    if (other !== id) chosen.add(other);
  }
  return [...chosen].map((agentId) => ({ agentId, strength: round(rng.range(0.2, 1), 4) }));
}

// ── External ─────────────────────────────────────────────────────────────────

const RESTRICTED_TOKENS = new Set([
  'text',
  'tweet',
  'tweets',
  'post',
  'posts',
  'body',
  'timeline',
  'message',
  'messages',
]);

/** Splits camelCase, snake_case and kebab-case keys into lower-case tokens. */
export function keyTokens(key: string): string[] {
  return key
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .split(/[\s_\-.]+/)
    .map((t) => t.toLowerCase())
    .filter((t) => t.length > 0);
}

export function isRestrictedField(key: string): boolean {
  return keyTokens(key).some((t) => RESTRICTED_TOKENS.has(t));
}

/** Recursively removes raw free-text fields from a record. */
export function stripFreeText(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(stripFreeText);
  if (!isRecord(value)) return value;
  const out: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    if (isRestrictedField(key)) continue;
    out[key] = stripFreeText(inner);
  }
  return out;
}

export interface ExternalPersonaProviderOptions {
  /** Research-mode opt-in. Without it the source is never called. */
  optIn: boolean;
  logger?: Logger;
}

export class ExternalPersonaProvider implements PersonaProvider {
  private readonly log: Logger;

  constructor(
    private readonly source: PersonaSource,
    private readonly options: ExternalPersonaProviderOptions,
  ) {
    this.log = options.logger ?? silentLogger();
  }

  /**
   * Personas from the source, free text stripped and traits validated.
   * Invalid records are dropped, so the result may be short.
   * @throws PersonaSourceError when not opted in or the source fails
   */
  async generate(count: number, topic: string): Promise<ExternalPersona[]> {
    if (!this.options.optIn) {
      throw new PersonaSourceError(`persona source "${this.source.name}" requires research mode`);
    }

    let records: Record<string, unknown>[];
    try {
      records = await this.source.fetchPersonas(topic, count);
    } catch (err) {
      if (err instanceof PersonaSourceError) throw err;
      throw new PersonaSourceError(`persona source "${this.source.name}" failed: ${describeError(err)}`, { cause: err });
    }

    // Ties name other records by position; ids are reassigned once invalid records are gone.
    const kept: PersonaTraits[] = [];
    const idByPosition = new Map<number, number>();
    let dropped = 0;
    for (const [position, record] of records.entries()) {
      if (kept.length >= count) break;
      const result = validatePersonaTraits(stripFreeText(record));
      if (!result.valid) {
        dropped++;
        continue;
      }
      idByPosition.set(position, kept.length);
      kept.push(result.value);
    }
    if (dropped > 0) {
      this.log.warn({ source: this.source.name, dropped }, 'dropped invalid persona records');
    }
    return kept.map((traits, id): ExternalPersona => ({
      kind: 'external',
      id,
      source: this.source.name,
      traits: { ...traits, social: { ...traits.social, ties: remapTies(traits.social.ties, idByPosition) } },
    }));
  }
}

/** Points ties at the new ids; ties to records that were not kept are dropped. */
function remapTies(ties: readonly SocialTie[], idByPosition: ReadonlyMap<number, number>): SocialTie[] {
  const out: SocialTie[] = [];
  for (const tie of ties) {
    const agentId = idByPosition.get(tie.agentId);
    if (agentId !== undefined) out.push({ agentId, strength: tie.strength });
  }
  return out;
}

// ── Fallback ─────────────────────────────────────────────────────────────────

/**
 * Uses the primary provider and fills any shortfall from the fallback.
 * Primary failures are logged, never rethrown. Always returns `count`
 * personas with ids 0..count-1.
 */
export class FallbackPersonaProvider implements PersonaProvider {
  private readonly log: Logger;

  constructor(
    private readonly primary: PersonaProvider,
    private readonly fallback: PersonaProvider,
    logger?: Logger,
  ) {
    this.log = logger ?? silentLogger();
  }

  async generate(count: number, topic: string): Promise<Persona[]> {
    let primary: Persona[] = [];
    try {
      primary = (await this.primary.generate(count, topic)).slice(0, count);
    } catch (err) {
      this.log.warn({ err: describeError(err) }, 'persona source unavailable, using synthetic personas');
    }
    if (primary.length === count) return primary;

    if (primary.length > 0) {
      this.log.info({ received: primary.length, requested: count }, 'filling persona shortfall with synthetic personas');
    }
    const filler = await this.fallback.generate(count, topic);
    return [...primary, ...filler.slice(primary.length, count)];
  }
}
