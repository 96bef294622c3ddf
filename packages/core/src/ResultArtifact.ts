// ResultArtifact: JSON codec for finished runs and a file-backed sink

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { PersonaTraitsSchema } from './ConfigValidator.js';
import type { ResultSink, RunArtifact } from './types.js';

const ActionLogEntrySchema = z.object({
  agentId: z.number().int().nonnegative(),
  day: z.number().int().positive(),
  step: z.number().int().nonnegative(),
  stepIndex: z.number().int().nonnegative(),
  timestamp: z.string(),
  actionType: z.literal('POST'),
  content: z.string(),
  sentimentScore: z.number().min(-1).max(1),
});

const MarketStateSchema = z.object({
  day: z.number().int().positive(),
  step: z.number().int().nonnegative(),
  stepIndex: z.number().int().nonnegative(),
  timestamp: z.string(),
  price: z.number().positive(),
  aggregateSentiment: z.number(),
  postCount: z.number().int().nonnegative(),
});

const ResolvedConfigSchema = z.object({
  agentCount: z.number().int().positive(),
  dayCount: z.number().int().positive(),
  mockMode: z.boolean(),
  marketTopic: z.string(),
  randomSeed: z.number().int(),
  customAgents: z.array(PersonaTraitsSchema),
  stepsPerDay: z.number().int().positive(),
  startTime: z.string(),
});

export const RunArtifactSchema = z.object({
  version: z.literal(1),
  runId: z.string().min(1),
  status: z.enum(['RUNNING', 'COMPLETED', 'STOPPED', 'FAILED']),
  config: ResolvedConfigSchema,
  log: z.array(ActionLogEntrySchema),
  series: z.array(MarketStateSchema),
});

export function serializeRunArtifact(artifact: RunArtifact): string {
  return JSON.stringify({ version: 1, ...artifact });
}

/** @throws Error when the text is not a valid artifact */
export function parseRunArtifact(text: string): RunArtifact {
  const parsed = RunArtifactSchema.safeParse(JSON.parse(text));
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new Error(`[ResultArtifact] invalid artifact: ${first ? `${first.path.join('.')}: ${first.message}` : 'unknown'}`);
  }
  const { version: _version, ...artifact } = parsed.data;
  return artifact;
}

/** Writes each artifact to `<dir>/<runId>.json`. */
export class FileResultSink implements ResultSink {
  constructor(private readonly dir: string) {}

  pathFor(runId: string): string {
    return join(this.dir, `${runId}.json`);
  }

  async write(artifact: RunArtifact): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await writeFile(this.pathFor(artifact.runId), serializeRunArtifact(artifact), 'utf8');
  }
}
