/**
 * Dataset persona source
 *
 * Reads user profiles from a HuggingFace dataset through the public
 * datasets-server rows API and maps each profile to persona traits. Only
 * demographic fields are read; the mapping is a pure function of the row.
 *
 * Access to the default dataset is for research use only and is gated by
 * ExternalPersonaProvider's opt-in.
 */

import { z } from 'zod';
import { PersonaSourceError, describeError } from '../errors.js';
import type { IdentityGroup, NetworkPosition, PersonaSource } from '../types.js';
import { clamp, hashString, round } from '../utils.js';

export const DATASETS_SERVER_URL = 'https://datasets-server.huggingface.co';
export const DEFAULT_DATASET = 'Lishi0905/SocioVerse';
const TERMS_URL = `https://huggingface.co/datasets/${DEFAULT_DATASET}`;

/** The rows endpoint returns at most this many rows per request. */
const PAGE_SIZE = 100;

const RowsResponseSchema = z.object({
  rows: z.array(
    z.object({
      row_idx: z.number().int(),
      row: z.record(z.unknown()),
    }),
  ),
});

export interface DatasetPersonaSourceOptions {
  dataset?: string;
  config?: string;
  split?: string;
  /** HuggingFace access token for gated datasets. */
  token?: string;
  baseUrl?: string;
  fetch?: typeof fetch;
  timeoutMs?: number;
}

export class DatasetPersonaSource implements PersonaSource {
  readonly name: string;

  private readonly dataset: string;
  private readonly config: string;
  private readonly split: string;
  private readonly token: string | undefined;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(options: DatasetPersonaSourceOptions = {}) {
    this.dataset = options.dataset ?? DEFAULT_DATASET;
    this.config = options.config ?? 'default';
    this.split = options.split ?? 'train';
    this.token = options.token;
    this.baseUrl = options.baseUrl ?? DATASETS_SERVER_URL;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.name = `hf:${this.dataset}`;
  }

  /** @throws PersonaSourceError */
  async fetchPersonas(_topic: string, count: number): Promise<Record<string, unknown>[]> {
    const records: Record<string, unknown>[] = [];
    for (let offset = 0; offset < count; offset += PAGE_SIZE) {
      const length = Math.min(PAGE_SIZE, count - offset);
      const rows = await this.fetchPage(offset, length);
      for (const { row_idx, row } of rows) {
        records.push(profileToTraits(row, row_idx, count));
      }
      if (rows.length < length) break;
    }
    return records;
  }

  private async fetchPage(offset: number, length: number): Promise<z.infer<typeof RowsResponseSchema>['rows']> {
    const params = new URLSearchParams({
      dataset: this.dataset,
      config: this.config,
      split: this.split,
      offset: String(offset),
      length: String(length),
    });
    const headers: Record<string, string> = { accept: 'application/json' };
    if (this.token) headers['authorization'] = `Bearer ${this.token}`;

    let body: unknown;
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/rows?${params.toString()}`, {
        headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (response.status === 401 || response.status === 403) {
        throw new PersonaSourceError(
          `dataset ${this.dataset} denied access (${response.status}); accept its terms at ${TERMS_URL}`,
        );
      }
      if (!response.ok) {
        throw new PersonaSourceError(`dataset ${this.dataset} responded ${response.status}`);
      }
      body = await response.json();
    } catch (err) {
      if (err instanceof PersonaSourceError) throw err;
      throw new PersonaSourceError(`dataset request failed: ${describeError(err)}`, { cause: err });
    }

    const parsed = RowsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new PersonaSourceError(`unexpected rows response from ${this.dataset}`);
    }
    return parsed.data.rows;
  }
}

// ── Profile mapping ──────────────────────────────────────────────────────────

type Consumption = 'high' | 'low' | 'moderate';
type AgeBand = 'young' | 'experienced' | 'middle';

function field(row: Record<string, unknown>, key: string): string {
  const value = row[key];
  return typeof value === 'string' || typeof value === 'number' ? String(value).trim().toLowerCase() : '';
}

function consumptionOf(row: Record<string, unknown>): Consumption {
  const level = field(row, 'Level of Consumption');
  if (level.includes('high')) return 'high';
  if (level.includes('low')) return 'low';
  return 'moderate';
}

function ageBandOf(row: Record<string, unknown>): AgeBand {
  const age = field(row, 'AGE');
  if (age.includes('18') || age.includes('25')) return 'young';
  if (age.includes('45') || age.includes('55')) return 'experienced';
  return 'middle';
}

function biasOf(row: Record<string, unknown>): number {
  const education = field(row, 'Education');
  if (['graduate', 'master', 'phd'].some((e) => education.includes(e))) return 0.8;
  if (education.includes('high school')) return 1.3;
  return 1;
}

const GROUP_BY_CONSUMPTION: Record<Consumption, IdentityGroup> = {
  high: 'wsb_ape',
  low: 'skeptic',
  moderate: 'retail_investor',
};

const RISK_BY_CONSUMPTION: Record<Consumption, number> = { high: 0.8, low: 0.25, moderate: 0.5 };

function positionOf(influence: number): NetworkPosition {
  if (influence > 0.7) return 'core';
  if (influence > 0.4) return 'bridge';
  return 'periphery';
}

/**
 * Maps one dataset profile to a persona-traits record. Everything not read
 * from the profile is derived from a hash of its user id, so the same row
 * always yields the same traits.
 */
export function profileToTraits(
  row: Record<string, unknown>,
  rowIndex: number,
  populationSize: number,
): Record<string, unknown> {
  const userId = field(row, 'user_id') || `row-${rowIndex}`;
  const hash = hashString(userId);
  const consumption = consumptionOf(row);
  const ageBand = ageBandOf(row);

  const rawInfluence = row['influence'];
  const influence = typeof rawInfluence === 'number' && Number.isFinite(rawInfluence) ? clamp(rawInfluence, 0, 1) : 0.5;

  const outlook =
    consumption === 'high' ? 0.4 : consumption === 'low' ? -0.4 : [0.3, -0.3, 0][hash % 3] ?? 0;

  const tieCount = Math.min(populationSize - 1, 2 + (hash % 3));
  const ties: { agentId: number; strength: number }[] = [];
  for (let k = 1; ties.length < tieCount && k <= populationSize; k++) {
    const agentId = (rowIndex + k * (1 + (hash % 7))) % populationSize;
    if (agentId === rowIndex || ties.some((t) => t.agentId === agentId)) continue;
    ties.push({ agentId, strength: round(0.3 + ((hash >>> (k * 3)) % 50) / 100, 2) });
  }

  return {
    name: userId,
    sourceRow: rowIndex,
    neurobiology: {
      arousalBaseline: ageBand === 'young' ? 0.65 : ageBand === 'experienced' ? 0.35 : 0.5,
      valenceBaseline: outlook * 0.5,
      shockSensitivity: ageBand === 'young' ? 0.7 : ageBand === 'experienced' ? 0.4 : 0.5,
    },
    cognition: { biasCoefficient: biasOf(row), initialBelief: outlook },
    emotion: { decayRate: 0.2 },
    social: { susceptibility: ageBand === 'young' ? 0.7 : 0.5, ties },
    identity: { group: GROUP_BY_CONSUMPTION[consumption], identification: 0.5 },
    network: { position: positionOf(influence), influence },
    market: {
      actionThreshold: consumption === 'high' ? 0.3 : 0.4,
      riskTolerance: RISK_BY_CONSUMPTION[consumption],
    },
  };
}
