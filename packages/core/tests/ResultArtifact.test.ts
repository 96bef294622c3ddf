import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileResultSink, parseRunArtifact, serializeRunArtifact } from '../src/ResultArtifact.js';
import type { RunArtifact } from '../src/types.js';
import { makeTraits } from './fixtures.js';

const ARTIFACT: RunArtifact = {
  runId: 'run-1',
  status: 'COMPLETED',
  config: {
    agentCount: 2,
    dayCount: 1,
    mockMode: true,
    marketTopic: 'prediction markets',
    randomSeed: 7,
    customAgents: [makeTraits()],
    stepsPerDay: 24,
    startTime: '2021-01-11T09:00:00.000Z',
  },
  log: [
    {
      agentId: 1,
      day: 1,
      step: 0,
      stepIndex: 0,
      timestamp: '2021-01-11T09:00:00.000Z',
      actionType: 'POST',
      content: 'Watching prediction markets closely, no position yet',
      sentimentScore: 0.1,
    },
  ],
  series: [
    {
      day: 1,
      step: 0,
      stepIndex: 0,
      timestamp: '2021-01-11T09:00:00.000Z',
      price: 20.12,
      aggregateSentiment: 0.1,
      postCount: 1,
    },
  ],
};

describe('run artifact codec', () => {
  it('writes a versioned document and reads it back', () => {
    const text = serializeRunArtifact(ARTIFACT);
    expect(JSON.parse(text)).toHaveProperty('version', 1);
    expect(parseRunArtifact(text)).toEqual(ARTIFACT);
  });

  it('rejects other versions', () => {
    const text = JSON.stringify({ ...ARTIFACT, version: 2 });
    expect(() => parseRunArtifact(text)).toThrow('[ResultArtifact] invalid artifact: version: ');
  });

  it('rejects entries out of range', () => {
    const first = ARTIFACT.log[0];
    if (!first) throw new Error('fixture has an entry');
    const text = serializeRunArtifact({ ...ARTIFACT, log: [{ ...first, sentimentScore: 2 }] });
    expect(() => parseRunArtifact(text)).toThrow('[ResultArtifact] invalid artifact: log.0.sentimentScore: ');
  });
});

describe('FileResultSink', () => {
  let dir: string | null = null;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = null;
  });

  it('writes <runId>.json, creating the directory', async () => {
    dir = await mkdtemp(join(tmpdir(), 'crowdsim-'));
    const sink = new FileResultSink(join(dir, 'results'));
    await sink.write(ARTIFACT);

    const path = join(dir, 'results', 'run-1.json');
    expect(sink.pathFor('run-1')).toBe(path);
    expect(parseRunArtifact(await readFile(path, 'utf8'))).toEqual(ARTIFACT);
  });
});
