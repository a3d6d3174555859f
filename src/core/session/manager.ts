// src/core/session/manager.ts
import { BROWSER_CONFIGS } from '../config/browser-config.js';
import { HarvestError, ErrorCode, describeError } from '../errors.js';
import type { ContentSource, SecondaryLookup } from '../source/types.js';
import type {
  BrowserSettings,
  ItemRef,
  RawEntityRecord,
  RawItemRecord,
  SecondaryEntityKind,
} from '../types/index.js';

/** Playwright's launch error when the engine was never installed. */
const MISSING_EXECUTABLE = /Executable doesn't exist/i;

export interface SessionOptions {
  credentialToken?: string;
  browser: BrowserSettings;
}

/**
 * Owns the single authenticated context against the content source.
 * Calls are forwarded with the current session; there is no pooling.
 */
export class SessionManager<TSession> implements SecondaryLookup {
  private session?: TSession;
  private resets = 0;

  constructor(
    private source: ContentSource<TSession>,
    private options: SessionOptions
  ) {}

  async open(): Promise<TSession> {
    if (this.session !== undefined) {
      return this.session;
    }

    const { engine, headless } = this.options.browser;
    console.error(`[INFO] Opening ${BROWSER_CONFIGS[engine].name} session (headless: ${headless})`);
    if (!this.options.credentialToken) {
      console.error('[WARN] No credential token configured; the feed may come back empty');
    }

    try {
      this.session = await this.source.openSession(this.options.credentialToken, this.options.browser);
    } catch (error) {
      const reason = describeError(error);
      throw new HarvestError(
        MISSING_EXECUTABLE.test(reason) ? ErrorCode.BROWSER_NOT_FOUND : ErrorCode.SESSION_FAILED,
        `Failed to open session: ${reason}`,
        true,
        `Ensure the ${BROWSER_CONFIGS[engine].name} engine is installed (trendcap install-browsers ${engine})`
      );
    }

    return this.session;
  }

  /** Tears down the current session (best-effort) and opens a fresh one. */
  async reset(): Promise<TSession> {
    this.resets++;
    await this.teardown();
    return this.open();
  }

  async close(): Promise<void> {
    await this.teardown();
  }

  isOpen(): boolean {
    return this.session !== undefined;
  }

  get resetCount(): number {
    return this.resets;
  }

  fetchTrendingPage(pageSize: number): AsyncIterable<ItemRef> {
    return this.source.fetchTrendingPage(this.current(), pageSize);
  }

  async fetchItemDetail(ref: ItemRef): Promise<RawItemRecord> {
    return this.source.fetchItemDetail(this.current(), ref);
  }

  async fetchSecondaryEntity(kind: SecondaryEntityKind, id: string): Promise<RawEntityRecord | undefined> {
    return this.source.fetchSecondaryEntity(this.current(), kind, id);
  }

  async fetchMediaBytes(ref: ItemRef): Promise<Uint8Array> {
    return this.source.fetchMediaBytes(this.current(), ref);
  }

  private current(): TSession {
    if (this.session === undefined) {
      throw new HarvestError(ErrorCode.SESSION_NOT_OPEN, 'No open session', true);
    }
    return this.session;
  }

  private async teardown(): Promise<void> {
    const session = this.session;
    this.session = undefined;
    if (session === undefined) {
      return;
    }

    try {
      await this.source.closeSession(session);
    } catch (error) {
      console.error(`[WARN] Session teardown failed, continuing: ${describeError(error)}`);
    }
  }
}
