// src/core/ingest/loop.ts
import { ITEM_PAUSE_RANGE, PAGE_PAUSE_RANGE } from '../config/constants.js';
import { ProgressTracker } from '../dedupe/tracker.js';
import type { ItemEnricher } from '../enrich/enricher.js';
import { HarvestError, ErrorCode, describeError } from '../errors.js';
import type { MediaStore } from '../export/media.js';
import type { PersistenceSink } from '../export/sink.js';
import { RetryController } from '../retry/backoff.js';
import type { SessionManager } from '../session/manager.js';
import type { BackoffPolicy, CapturedItem, IngestionSummary, ItemRef, RunState } from '../types/index.js';
import { randomBetween, sleep as defaultSleep, type Sleeper } from '../utils/timing.js';

export interface IngestionOptions {
  pageSize: number;
  maxLoops: number;
  backoff: BackoffPolicy;
  /** Seconds between captured items. */
  itemPause?: readonly [number, number];
  /** Seconds between pages. */
  pagePause?: readonly [number, number];
}

export interface IngestionDeps<TSession> {
  sessions: SessionManager<TSession>;
  enricher: ItemEnricher;
  media: MediaStore;
  sink: Pick<PersistenceSink, 'appendRecord'>;
  sleep?: Sleeper;
  random?: () => number;
}

type ItemOutcome = 'captured' | 'failed';

/**
 * Drives pagination until the target is reached, the iteration ceiling is
 * hit, or a stop is requested. No item or page error escapes `run`.
 */
export class IngestionLoop<TSession> {
  private stopRequested = false;
  private readonly sleep: Sleeper;
  private readonly random: () => number;
  private pageFailures = 0;
  private itemFailures = 0;
  private duplicatesSkipped = 0;

  constructor(
    private options: IngestionOptions,
    private deps: IngestionDeps<TSession>
  ) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
  }

  /** Finish the current step, then return without starting new work. */
  stop(): void {
    this.stopRequested = true;
  }

  async run(state: RunState): Promise<IngestionSummary> {
    const startedAt = Date.now();
    const tracker = new ProgressTracker(state);
    const retry = new RetryController(
      state,
      this.options.backoff,
      this.deps.sessions,
      this.sleep,
      this.random
    );

    while (!tracker.isComplete() && state.loopCount < this.options.maxLoops && !this.stopRequested) {
      state.loopCount++;
      const pageTarget = Math.min(this.options.pageSize, tracker.remaining());
      console.log(
        `\n=== Page ${state.loopCount} (need ${tracker.remaining()} more; requesting ${pageTarget}) ===`
      );

      try {
        await this.deps.sessions.open();

        let yielded = 0;
        for await (const ref of this.deps.sessions.fetchTrendingPage(pageTarget)) {
          yielded++;
          if (tracker.isComplete() || this.stopRequested) {
            break;
          }
          await this.handleItem(ref, tracker, retry);
        }

        if (yielded === 0) {
          throw new HarvestError(ErrorCode.EMPTY_PAGE, 'Empty page (likely throttled)', true);
        }

        if (!tracker.isComplete() && !this.stopRequested) {
          await this.pause(this.options.pagePause ?? PAGE_PAUSE_RANGE);
        }
      } catch (error) {
        this.pageFailures++;
        if (this.stopRequested) {
          console.log(`⚠️ Page error while stopping: ${describeError(error)}`);
          continue;
        }
        await retry.onPageFailure(error);
      }
    }

    return {
      capturedCount: state.capturedCount,
      targetCount: state.targetCount,
      reachedTarget: tracker.isComplete(),
      stopped: this.stopRequested,
      loops: state.loopCount,
      pageFailures: this.pageFailures,
      itemFailures: this.itemFailures,
      duplicatesSkipped: this.duplicatesSkipped,
      sessionResets: this.deps.sessions.resetCount,
      durationMs: Date.now() - startedAt,
    };
  }

  private async handleItem(ref: ItemRef, tracker: ProgressTracker, retry: RetryController): Promise<void> {
    const id = ref.id;
    if (!id) {
      console.log('   ⊘ item without id, skipping');
      return;
    }
    if (tracker.hasSeen(id)) {
      this.duplicatesSkipped++;
      console.log(`   ⊘ duplicate ${id}`);
      return;
    }

    const outcome = await this.captureItem(ref, id);
    if (outcome === 'failed') {
      this.itemFailures++;
      await retry.onItemFailure();
      return;
    }

    const captured = tracker.markCaptured(id);
    retry.recordSuccess();
    console.log(`   ✓ saved ${captured}/${tracker.targetCount}`);
    await this.pause(this.options.itemPause ?? ITEM_PAUSE_RANGE);
  }

  private async captureItem(ref: ItemRef, id: string): Promise<ItemOutcome> {
    const { sessions, enricher, media, sink } = this.deps;
    try {
      const detail = await sessions.fetchItemDetail(ref);
      const enriched = await enricher.enrich(ref, detail);
      const bytes = await sessions.fetchMediaBytes({ ...ref, raw: detail });
      const mediaPath = await media.save(id, bytes);

      const item: CapturedItem = { ...enriched, id, mediaPath };
      await sink.appendRecord(item);
      return 'captured';
    } catch (error) {
      console.log(`   ✗ item error (${id}): ${describeError(error)}`);
      return 'failed';
    }
  }

  private async pause([min, max]: readonly [number, number]): Promise<void> {
    await this.sleep(randomBetween(min, max, this.random) * 1000);
  }
}
