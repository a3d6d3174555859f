// src/core/source/tiktok-web.ts
import { chromium, firefox, webkit, type Browser, type BrowserContext, type BrowserType, type Page } from 'playwright';
import {
  DEFAULT_TIMEOUT,
  DEFAULT_USER_AGENT,
  ITEM_DETAIL_ENDPOINT,
  MUSIC_DETAIL_ENDPOINT,
  PLATFORM_ORIGIN,
  SESSION_SETTLE_MS,
  TRENDING_ENDPOINT,
} from '../config/constants.js';
import { asArray, asId, asInteger, asRecord, asString, pick } from '../enrich/raw.js';
import { HarvestError, ErrorCode, describeError } from '../errors.js';
import type {
  BrowserEngine,
  BrowserSettings,
  ItemRef,
  RawEntityRecord,
  RawItemRecord,
  SecondaryEntityKind,
} from '../types/index.js';
import type { ContentSource } from './types.js';

export interface BrowserSession {
  browser: Browser;
  context: BrowserContext;
  page: Page;
}

const LAUNCHERS: Record<BrowserEngine, BrowserType> = {
  chromium,
  firefox,
  webkit,
};

const BASE_PARAMS: Record<string, string> = {
  aid: '1988',
  app_name: 'tiktok_web',
  device_platform: 'web_pc',
  region: 'US',
  language: 'en',
};

const REHYDRATION_SCRIPT = '#__UNIVERSAL_DATA_FOR_REHYDRATION__';

/**
 * Web client for the trending feed. All JSON calls run through `fetch` inside
 * the session page so they carry the browser's cookies.
 */
export class TikTokWebSource implements ContentSource<BrowserSession> {
  async openSession(credentialToken: string | undefined, settings: BrowserSettings): Promise<BrowserSession> {
    const browser = await LAUNCHERS[settings.engine].launch({
      headless: settings.headless,
      args: settings.engine === 'chromium' ? ['--disable-blink-features=AutomationControlled'] : [],
    });

    try {
      const context = await browser.newContext({
        userAgent: DEFAULT_USER_AGENT,
        viewport: { width: 1920, height: 1080 },
      });
      if (credentialToken) {
        await context.addCookies([
          { name: 'msToken', value: credentialToken, domain: '.tiktok.com', path: '/' },
        ]);
      }

      const page = await context.newPage();
      await page.goto(PLATFORM_ORIGIN, { waitUntil: 'domcontentloaded', timeout: DEFAULT_TIMEOUT });
      await page.waitForTimeout(SESSION_SETTLE_MS);

      return { browser, context, page };
    } catch (error) {
      await browser.close().catch((closeError: unknown) => {
        console.error(`[WARN] Failed to close browser after launch error: ${describeError(closeError)}`);
      });
      throw error;
    }
  }

  async closeSession(session: BrowserSession): Promise<void> {
    await session.context.close();
    await session.browser.close();
  }

  async *fetchTrendingPage(session: BrowserSession, pageSize: number): AsyncGenerator<ItemRef> {
    const payload = await this.requestJson(session, TRENDING_ENDPOINT, {
      count: String(pageSize),
      from_page: 'fyp',
    });

    for (const entry of asArray(payload.itemList)) {
      const raw = asRecord(entry);
      if (!raw) {
        continue;
      }
      yield {
        id: asId(raw.id),
        handle: asString(pick(raw, 'author', 'uniqueId')),
        raw,
      };
    }
  }

  async fetchItemDetail(session: BrowserSession, ref: ItemRef): Promise<RawItemRecord> {
    if (!ref.id) {
      throw new HarvestError(ErrorCode.ITEM_UNAVAILABLE, 'Item reference has no id');
    }

    const payload = await this.requestJson(session, ITEM_DETAIL_ENDPOINT, { itemId: ref.id });
    const item = asRecord(pick(payload, 'itemInfo', 'itemStruct'));
    if (!item) {
      throw new HarvestError(ErrorCode.ITEM_UNAVAILABLE, `No detail returned for ${ref.id}`, true);
    }
    return item;
  }

  async fetchSecondaryEntity(
    session: BrowserSession,
    kind: SecondaryEntityKind,
    id: string
  ): Promise<RawEntityRecord | undefined> {
    const musicInfo =
      kind === 'music'
        ? pick(await this.requestJson(session, MUSIC_DETAIL_ENDPOINT, { musicId: id }), 'musicInfo')
        : pick(await this.readSoundPage(session, id), '__DEFAULT_SCOPE__', 'webapp.music-detail', 'musicInfo');

    return flattenMusicInfo(musicInfo);
  }

  async fetchMediaBytes(session: BrowserSession, ref: ItemRef): Promise<Uint8Array> {
    const mediaUrl =
      asString(pick(ref.raw, 'video', 'playAddr')) ?? asString(pick(ref.raw, 'video', 'downloadAddr'));
    if (!mediaUrl) {
      throw new HarvestError(ErrorCode.MEDIA_UNAVAILABLE, `No media address for ${ref.id ?? 'item'}`);
    }

    const response = await session.context.request.get(mediaUrl, {
      headers: { Referer: `${PLATFORM_ORIGIN}/` },
      timeout: DEFAULT_TIMEOUT,
    });
    if (!response.ok()) {
      throw new HarvestError(
        ErrorCode.MEDIA_UNAVAILABLE,
        `HTTP ${response.status()} fetching media for ${ref.id ?? 'item'}`,
        true
      );
    }
    return response.body();
  }

  private async requestJson(
    session: BrowserSession,
    endpoint: string,
    params: Record<string, string>
  ): Promise<Record<string, unknown>> {
    const query = new URLSearchParams({ ...BASE_PARAMS, ...params });
    const url = `${PLATFORM_ORIGIN}${endpoint}?${query.toString()}`;

    const body = await session.page.evaluate(async (target: string) => {
      const response = await fetch(target, { credentials: 'include' });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      return response.text();
    }, url);

    return parsePayload(body, endpoint);
  }

  private async readSoundPage(session: BrowserSession, id: string): Promise<Record<string, unknown> | undefined> {
    const page = await session.context.newPage();
    try {
      await page.goto(`${PLATFORM_ORIGIN}/music/-${encodeURIComponent(id)}`, {
        waitUntil: 'domcontentloaded',
        timeout: DEFAULT_TIMEOUT,
      });
      const script = await page.locator(REHYDRATION_SCRIPT).textContent({ timeout: DEFAULT_TIMEOUT });
      if (!script) {
        return undefined;
      }
      const parsed: unknown = JSON.parse(script);
      return asRecord(parsed);
    } finally {
      await page.close();
    }
  }
}

/**
 * Empty bodies and non-zero `statusCode` values are how the platform signals
 * throttling (10201 and friends), so both raise.
 */
export function parsePayload(body: string, endpoint: string): Record<string, unknown> {
  if (body.trim().length === 0) {
    throw new HarvestError(ErrorCode.RATE_LIMITED, `Empty response from ${endpoint}`, true);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    throw new HarvestError(ErrorCode.NETWORK_ERROR, `Unparsable response from ${endpoint}`, true);
  }

  const payload = asRecord(parsed);
  if (!payload) {
    throw new HarvestError(ErrorCode.NETWORK_ERROR, `Unexpected response shape from ${endpoint}`, true);
  }

  const statusCode = asInteger(payload.statusCode) ?? asInteger(payload.status_code) ?? 0;
  if (statusCode !== 0) {
    throw new HarvestError(
      ErrorCode.RATE_LIMITED,
      `${endpoint} returned statusCode ${statusCode}`,
      true,
      undefined,
      { statusCode, statusMsg: asString(payload.statusMsg) }
    );
  }
  return payload;
}

/** `{music, stats}` → the music fields with `stats` attached. */
export function flattenMusicInfo(musicInfo: unknown): RawEntityRecord | undefined {
  const info = asRecord(musicInfo);
  if (!info) {
    return undefined;
  }
  const music = asRecord(info.music) ?? {};
  const stats = asRecord(info.stats);
  return stats ? { ...music, stats } : { ...music };
}
