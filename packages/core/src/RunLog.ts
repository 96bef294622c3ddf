// Append-only action log of one run
// Entries arrive a whole step at a time, already ordered by agent id

import type { ActionLogEntry, RecentLog } from './types.js';

export class RunLog {
  private entries: ActionLogEntry[] = [];
  private lastStepPosts = new Map<number, number>();
  private lastStepIndex = -1;

  /**
   * Commits one step's entries. Steps must arrive in increasing order and
   * every entry must belong to the committed step.
   */
  commitStep(stepIndex: number, entries: readonly ActionLogEntry[]): void {
    if (stepIndex <= this.lastStepIndex) {
      throw new Error(`[RunLog] step ${stepIndex} committed after step ${this.lastStepIndex}`);
    }
    const posts = new Map<number, number>();
    for (const entry of entries) {
      if (entry.stepIndex !== stepIndex) {
        throw new Error(`[RunLog] entry for step ${entry.stepIndex} committed with step ${stepIndex}`);
      }
      posts.set(entry.agentId, entry.sentimentScore);
    }
    this.entries.push(...entries);
    this.lastStepPosts = posts;
    this.lastStepIndex = stepIndex;
  }

  get size(): number {
    return this.entries.length;
  }

  /** Sentiment of every agent that posted on the last committed step. */
  previousStepPosts(): ReadonlyMap<number, number> {
    return this.lastStepPosts;
  }

  all(): readonly ActionLogEntry[] {
    return this.entries;
  }

  query(filter?: { since?: number; until?: number; agentId?: number }): ActionLogEntry[] {
    return this.entries.filter(e => {
      if (filter?.since !== undefined && e.stepIndex < filter.since) return false;
      if (filter?.until !== undefined && e.stepIndex > filter.until) return false;
      if (filter?.agentId !== undefined && e.agentId !== filter.agentId) return false;
      return true;
    });
  }

  /** Last `n` entries, oldest first, in the shape the dashboard shows. */
  recent(n: number): RecentLog[] {
    return this.entries.slice(-n).map(({ agentId, actionType, content, timestamp }) => ({
      agentId,
      actionType,
      content,
      timestamp,
    }));
  }

  export(format: 'json' | 'text' = 'json'): string {
    if (format === 'text') {
      return this.entries
        .map(e => `[${e.timestamp}] agent ${e.agentId} ${e.actionType} (${e.sentimentScore.toFixed(2)}): ${e.content}`)
        .join('\n');
    }
    return JSON.stringify(this.entries, null, 2);
  }
}
