// src/core/retry/backoff.ts
import { BACKOFF_EXPONENT_CAP } from '../config/constants.js';
import { describeError } from '../errors.js';
import type { BackoffPolicy, RunState } from '../types/index.js';
import type { Sleeper } from '../utils/timing.js';

/**
 * Page-level delay in milliseconds:
 * `min(max, base * 2^min(errors, 6)) + uniform(0, jitter)` seconds.
 */
export function computeBackoffMs(
  consecutiveErrors: number,
  policy: Pick<BackoffPolicy, 'baseSeconds' | 'maxSeconds' | 'jitterSeconds'>,
  random: () => number = Math.random
): number {
  const exponent = Math.min(Math.max(consecutiveErrors, 0), BACKOFF_EXPONENT_CAP);
  const expo = Math.min(policy.maxSeconds, policy.baseSeconds * 2 ** exponent);
  return (expo + random() * policy.jitterSeconds) * 1000;
}

export interface SessionResetter {
  reset(): Promise<unknown>;
}

export interface FailureOutcome {
  consecutiveErrors: number;
  sessionReset: boolean;
  backoffMs?: number;
}

/**
 * Shared consecutive-error state machine. Item failures only count and may
 * reset the session; page failures also back off before the reset check.
 */
export class RetryController {
  constructor(
    private state: RunState,
    private policy: BackoffPolicy,
    private sessions: SessionResetter,
    private sleep: Sleeper,
    private random: () => number = Math.random
  ) {}

  recordSuccess(): void {
    this.state.consecutiveErrorCount = 0;
  }

  async onItemFailure(): Promise<FailureOutcome> {
    this.state.consecutiveErrorCount++;
    const consecutiveErrors = this.state.consecutiveErrorCount;

    let sessionReset = false;
    if (consecutiveErrors >= this.policy.resetAfterErrors) {
      console.log('   ↻ restarting session due to consecutive item errors…');
      sessionReset = await this.resetSession();
    }
    return { consecutiveErrors, sessionReset };
  }

  async onPageFailure(error: unknown): Promise<FailureOutcome> {
    this.state.consecutiveErrorCount++;
    const consecutiveErrors = this.state.consecutiveErrorCount;

    const backoffMs = computeBackoffMs(consecutiveErrors, this.policy, this.random);
    console.log(`⚠️ Page error: ${describeError(error)} — backing off ${(backoffMs / 1000).toFixed(1)}s`);
    await this.sleep(backoffMs);

    let sessionReset = false;
    if (this.state.consecutiveErrorCount >= this.policy.resetAfterErrors) {
      console.log('↻ Recreating session to clear potential verification/throttle…');
      sessionReset = await this.resetSession();
    }
    return { consecutiveErrors, sessionReset, backoffMs };
  }

  private async resetSession(): Promise<boolean> {
    try {
      await this.sessions.reset();
    } catch (error) {
      // Counter stays put; the next page re-opens lazily.
      console.error(`[WARN] Session reset failed: ${describeError(error)}`);
      return false;
    }
    this.state.consecutiveErrorCount = 0;
    return true;
  }
}
