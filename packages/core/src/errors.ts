// Error taxonomy. Validation and conflict errors are thrown synchronously by
// RunManager.start(); everything raised during background execution is caught
// and recorded on the run instead.

export interface ValidationIssue {
  path: string;
  expected: string;
  received: string;
  message: string;
}

export abstract class CrowdSimError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigValidationError extends CrowdSimError {
  readonly code = 'invalid_config';

  constructor(readonly issues: ValidationIssue[]) {
    super(
      issues.length === 1
        ? `Invalid config: ${issues[0]?.message ?? 'unknown issue'}`
        : `Invalid config: ${issues.length} issues`,
    );
  }
}

export class ConflictError extends CrowdSimError {
  readonly code = 'conflict';

  constructor(readonly activeRunId: string) {
    super(`Simulation already running (${activeRunId})`);
  }
}

/** External persona fetch failed. Recovered by the synthetic fallback. */
export class PersonaSourceError extends CrowdSimError {
  readonly code = 'persona_source';
}

/** External trend fetch failed. Recovered by the neutral market default. */
export class MarketSeedError extends CrowdSimError {
  readonly code = 'market_seed';
}

/** Unexpected failure inside a step. Fatal to the run only. */
export class StepExecutionError extends CrowdSimError {
  readonly code = 'step_execution';

  constructor(readonly stepIndex: number, cause: unknown) {
    super(`step ${stepIndex} failed: ${describeError(cause)}`, { cause });
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
