// src/cli/commands/harvest.ts
import { Command } from 'commander';
import { loadConfig, type ConfigOverrides } from '../../core/config/env.js';
import { describeError } from '../../core/errors.js';
import { HarvestOrchestrator, type HarvestResult } from '../../core/orchestrator.js';
import type { HarvestConfig } from '../../core/types/index.js';

export interface HarvestCommandOptions {
  count?: string;
  pageSize?: string;
  maxLoops?: string;
  resetAfter?: string;
  popularThreshold?: string;
  downloadDir?: string;
  csv?: string;
  jsonl?: string;
  browser?: string;
  headed?: boolean;
  resume?: boolean;
}

export function registerHarvestCommand(program: Command): void {
  program
    .option('--count <n>', 'Videos to capture (env COUNT, default 1000)')
    .option('--page-size <n>', 'Items requested per page (env PAGE_SIZE, default 20)')
    .option('--max-loops <n>', 'Page request ceiling (env MAX_LOOPS)')
    .option('--reset-after <n>', 'Consecutive errors before a session reset (env RESET_SESSION_AFTER_ERRORS, default 3)')
    .option('--popular-threshold <n>', 'Sound usage count that marks a sound popular (env POPULAR_SOUND_MIN_USES, default 1000)')
    .option('--download-dir <dir>', 'Video output directory (env DOWNLOAD_DIR)')
    .option('--csv <path>', 'CSV output path (env DATA_CSV_PATH)')
    .option('--jsonl <path>', 'JSONL output path (env DATA_JSONL)')
    .option('--browser <engine>', 'Browser engine: chromium|firefox|webkit (env TIKTOK_BROWSER)')
    .option('--headed', 'Show the browser window (env HEADLESS=false)')
    .option('--no-resume', 'Do not skip items already present in the JSONL output')
    .action(async (options: HarvestCommandOptions) => {
      let config: HarvestConfig;
      try {
        config = loadConfig(toOverrides(options));
      } catch (error) {
        console.error('Error:', describeError(error));
        process.exit(1);
        return;
      }

      const orchestrator = new HarvestOrchestrator(config);
      const detach = installSignalHandlers(orchestrator);
      try {
        const result = await orchestrator.run();
        console.log(formatSummary(result));
      } catch (error) {
        console.error('Error:', describeError(error));
        process.exit(1);
      } finally {
        detach();
      }
    });
}

export function toOverrides(options: HarvestCommandOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {
    COUNT: options.count,
    PAGE_SIZE: options.pageSize,
    MAX_LOOPS: options.maxLoops,
    RESET_SESSION_AFTER_ERRORS: options.resetAfter,
    POPULAR_SOUND_MIN_USES: options.popularThreshold,
    DOWNLOAD_DIR: options.downloadDir,
    DATA_CSV_PATH: options.csv,
    DATA_JSONL: options.jsonl,
    TIKTOK_BROWSER: options.browser,
  };
  // Flags only override the environment when given.
  if (options.headed) {
    overrides.HEADLESS = 'false';
  }
  if (options.resume === false) {
    overrides.RESUME = 'false';
  }
  return overrides;
}

export function formatSummary({ summary, csvPath, jsonlPath, downloadDir }: HarvestResult): string {
  const counts = `${summary.capturedCount}/${summary.targetCount}`;
  let headline: string;
  if (summary.reachedTarget) {
    headline = `✅ Done. ${counts} videos saved.`;
  } else if (summary.stopped) {
    headline = `⏹ Interrupted. ${counts} videos saved.`;
  } else {
    headline = `⚠️ Stopped at the page ceiling. ${counts} videos saved.`;
  }

  return [
    '',
    headline,
    `  • CSV: ${csvPath}`,
    `  • JSONL: ${jsonlPath}`,
    `  • Videos: ${downloadDir}/`,
    `  Pages: ${summary.loops}, page errors: ${summary.pageFailures}, item errors: ${summary.itemFailures}, ` +
      `duplicates: ${summary.duplicatesSkipped}, session resets: ${summary.sessionResets}, ` +
      `${(summary.durationMs / 1000).toFixed(1)}s`,
  ].join('\n');
}

/** First signal stops gracefully; a second one exits immediately. */
export function installSignalHandlers(target: { stop(): void }): () => void {
  let signalled = false;
  const handler = (signal: NodeJS.Signals): void => {
    if (signalled) {
      process.exit(130);
      return;
    }
    signalled = true;
    console.error(`\n[INFO] ${signal} received, finishing the current item… (repeat to abort)`);
    target.stop();
  };

  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
  return () => {
    process.off('SIGINT', handler);
    process.off('SIGTERM', handler);
  };
}
