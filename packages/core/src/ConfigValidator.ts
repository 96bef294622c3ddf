// ConfigValidator: runtime validation of simulation configs and persona traits

import { z } from 'zod';
import { CONFIG_BOUNDS, type MarketParams } from './defaults.js';
import { ConfigValidationError, type ValidationIssue } from './errors.js';
import type { PersonaTraits, SimulationConfig } from './types.js';

export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: ValidationIssue[] };

const unit = z.number().finite().min(0).max(1);
const signed = z.number().finite().min(-1).max(1);

export const SocialTieSchema = z.object({
  agentId: z.number().int().nonnegative(),
  strength: z.number().finite().gt(0).max(1),
});

export const PersonaTraitsSchema = z.object({
  name: z.string().trim().min(1).max(120),
  neurobiology: z.object({
    arousalBaseline: unit,
    valenceBaseline: signed,
    shockSensitivity: unit,
  }),
  cognition: z.object({
    biasCoefficient: z.number().finite().min(0).max(3),
    initialBelief: signed,
  }),
  emotion: z.object({ decayRate: unit }),
  social: z.object({
    susceptibility: unit,
    ties: z.array(SocialTieSchema).max(64),
  }),
  identity: z.object({
    group: z.enum(['wsb_ape', 'retail_investor', 'institutional', 'skeptic', 'neutral']),
    identification: unit,
  }),
  network: z.object({
    position: z.enum(['core', 'bridge', 'periphery']),
    influence: unit,
  }),
  market: z.object({
    actionThreshold: unit,
    riskTolerance: unit,
  }),
});

export const SimulationConfigSchema = z.object({
  agentCount: z.number().int().min(CONFIG_BOUNDS.agentCount.min).max(CONFIG_BOUNDS.agentCount.max),
  dayCount: z.number().int().min(CONFIG_BOUNDS.dayCount.min).max(CONFIG_BOUNDS.dayCount.max),
  mockMode: z.boolean().default(false),
  marketTopic: z.string().trim().min(1).max(200).optional(),
  randomSeed: z.number().int().min(Number.MIN_SAFE_INTEGER).max(Number.MAX_SAFE_INTEGER).optional(),
  customAgents: z.array(PersonaTraitsSchema).min(1).max(CONFIG_BOUNDS.agentCount.max).optional(),
});

export const MarketParamsSchema = z
  .object({
    basePrice: z.number().finite().positive(),
    priceFloor: z.number().finite().positive(),
    sensitivity: z.number().finite().nonnegative(),
    volatility: z.number().finite().nonnegative(),
    trendWindow: z.number().int().min(1),
  })
  .refine((p) => p.basePrice >= p.priceFloor, {
    message: 'basePrice must not be below priceFloor',
    path: ['basePrice'],
  });

/** What callers may pass: defaults not yet applied. */
export type SimulationConfigInput = z.input<typeof SimulationConfigSchema>;

export function validateSimulationConfig(input: unknown): ValidationResult<SimulationConfig> {
  const parsed = SimulationConfigSchema.safeParse(input);
  if (parsed.success) return { valid: true, value: parsed.data };
  return { valid: false, errors: toIssues(parsed.error, input) };
}

export function validatePersonaTraits(input: unknown): ValidationResult<PersonaTraits> {
  const parsed = PersonaTraitsSchema.safeParse(input);
  if (parsed.success) return { valid: true, value: parsed.data };
  return { valid: false, errors: toIssues(parsed.error, input) };
}

/** @throws ConfigValidationError */
export function assertSimulationConfig(input: unknown): SimulationConfig {
  const result = validateSimulationConfig(input);
  if (!result.valid) throw new ConfigValidationError(result.errors);
  return result.value;
}

/** @throws ConfigValidationError */
export function assertMarketParams(input: unknown): MarketParams {
  const parsed = MarketParamsSchema.safeParse(input);
  if (!parsed.success) throw new ConfigValidationError(toIssues(parsed.error, input));
  return parsed.data;
}

/** @throws ConfigValidationError */
export function assertPersonaTraits(input: unknown): PersonaTraits {
  const result = validatePersonaTraits(input);
  if (!result.valid) throw new ConfigValidationError(result.errors);
  return result.value;
}

// ── Issue mapping ────────────────────────────────────────────────────────────

export function toIssues(error: z.ZodError, input: unknown): ValidationIssue[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return {
      path,
      expected: describeExpected(issue),
      received: describeValue(valueAt(input, issue.path)),
      message: path ? `${path}: ${issue.message}` : issue.message,
    };
  });
}

function describeExpected(issue: z.ZodIssue): string {
  switch (issue.code) {
    case 'invalid_type':
      return issue.expected;
    case 'too_small':
      if (issue.type === 'array') return `at least ${issue.minimum} items`;
      if (issue.type === 'string') return `at least ${issue.minimum} characters`;
      return `${issue.inclusive ? '>=' : '>'} ${issue.minimum}`;
    case 'too_big':
      if (issue.type === 'array') return `at most ${issue.maximum} items`;
      if (issue.type === 'string') return `at most ${issue.maximum} characters`;
      return `${issue.inclusive ? '<=' : '<'} ${issue.maximum}`;
    case 'invalid_enum_value':
      return `one of ${issue.options.join(', ')}`;
    default:
      return 'valid value';
  }
}

function valueAt(input: unknown, path: ReadonlyArray<string | number>): unknown {
  let current: unknown = input;
  for (const key of path) {
    if (Array.isArray(current) && typeof key === 'number') {
      current = current[key];
    } else if (isRecord(current)) {
      current = current[String(key)];
    } else {
      return undefined;
    }
  }
  return current;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (Array.isArray(value)) return `array(${value.length})`;
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'number';
  return typeof value;
}
