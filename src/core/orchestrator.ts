// src/core/orchestrator.ts
import { createRunState } from './dedupe/tracker.js';
import { loadCapturedIds } from './dedupe/preload.js';
import { ItemEnricher } from './enrich/enricher.js';
import { describeError } from './errors.js';
import { MediaStore } from './export/media.js';
import { PersistenceSink } from './export/sink.js';
import { IngestionLoop } from './ingest/loop.js';
import { SessionManager } from './session/manager.js';
import { TikTokWebSource } from './source/tiktok-web.js';
import type { ContentSource } from './source/types.js';
import type { HarvestConfig, IngestionSummary } from './types/index.js';
import type { Sleeper } from './utils/timing.js';

export interface HarvestResult {
  summary: IngestionSummary;
  csvPath: string;
  jsonlPath: string;
  downloadDir: string;
}

export interface HarvestOrchestratorOptions {
  /** Defaults to the Playwright web source. */
  source?: ContentSource<unknown>;
  sleep?: Sleeper;
  random?: () => number;
}

/** Builds the pipeline from configuration and runs one ingestion. */
export class HarvestOrchestrator {
  private loop?: IngestionLoop<unknown>;
  private stopRequested = false;

  constructor(
    private config: HarvestConfig,
    private options: HarvestOrchestratorOptions = {}
  ) {}

  stop(): void {
    this.stopRequested = true;
    this.loop?.stop();
  }

  async run(): Promise<HarvestResult> {
    const { config } = this;

    const knownIds = config.resume ? await loadCapturedIds(config.jsonlPath) : new Set<string>();
    if (knownIds.size > 0) {
      console.error(`[INFO] Resuming: ${knownIds.size} item(s) already in ${config.jsonlPath}`);
    }
    const state = createRunState(config.targetCount, knownIds);

    const source = this.options.source ?? new TikTokWebSource();
    const sessions = new SessionManager<unknown>(source, {
      credentialToken: config.credentialToken,
      browser: config.browser,
    });
    const sink = await PersistenceSink.open({ csvPath: config.csvPath, jsonlPath: config.jsonlPath });

    try {
      this.loop = new IngestionLoop<unknown>(
        {
          pageSize: config.pageSize,
          maxLoops: config.maxLoops,
          backoff: config.backoff,
        },
        {
          sessions,
          enricher: new ItemEnricher(sessions, state.soundUsageCache, config.popularityThreshold),
          media: new MediaStore(config.downloadDir),
          sink,
          sleep: this.options.sleep,
          random: this.options.random,
        }
      );
      if (this.stopRequested) {
        this.loop.stop();
      }

      const summary = await this.loop.run(state);
      return {
        summary,
        csvPath: config.csvPath,
        jsonlPath: config.jsonlPath,
        downloadDir: config.downloadDir,
      };
    } finally {
      await sessions.close();
      await sink.close().catch((error: unknown) => {
        console.error(`[WARN] Failed to close outputs: ${describeError(error)}`);
      });
    }
  }
}

