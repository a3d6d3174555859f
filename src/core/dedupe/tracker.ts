// src/core/dedupe/tracker.ts
import type { RunState } from '../types/index.js';

export function createRunState(targetCount: number, knownIds: Iterable<string> = []): RunState {
  return {
    targetCount,
    capturedCount: 0,
    seenIds: new Set(knownIds),
    consecutiveErrorCount: 0,
    loopCount: 0,
    soundUsageCache: new Map(),
  };
}

/** Dedup set and progress counter, both living on the run state. */
export class ProgressTracker {
  constructor(private state: RunState) {}

  hasSeen(id: string): boolean {
    return this.state.seenIds.has(id);
  }

  isComplete(): boolean {
    return this.state.capturedCount >= this.state.targetCount;
  }

  remaining(): number {
    return Math.max(this.state.targetCount - this.state.capturedCount, 0);
  }

  /** Returns the new captured count. */
  markCaptured(id: string): number {
    this.state.seenIds.add(id);
    this.state.capturedCount++;
    return this.state.capturedCount;
  }

  get capturedCount(): number {
    return this.state.capturedCount;
  }

  get targetCount(): number {
    return this.state.targetCount;
  }
}
