// src/core/enrich/__tests__/enricher.test.ts
import { ItemEnricher, buildWatchUrl } from '../enricher.js';
import { HarvestError, ErrorCode } from '../../errors.js';
import type { SecondaryLookup } from '../../source/types.js';
import type { RawEntityRecord, SecondaryEntityKind, SoundUsageCache } from '../../types/index.js';

class ScriptedLookup implements SecondaryLookup {
  readonly calls: string[] = [];

  constructor(private responses: Record<string, RawEntityRecord | Error | undefined>) {}

  async fetchSecondaryEntity(kind: SecondaryEntityKind, id: string): Promise<RawEntityRecord | undefined> {
    const key = `${kind}:${id}`;
    this.calls.push(key);
    const response = this.responses[key];
    if (response instanceof Error) {
      throw response;
    }
    return response;
  }
}

const DETAIL = {
  id: '7300',
  desc: 'morning run #Fitness',
  createTime: 1700000000,
  author: { uniqueId: 'runner.jo' },
  authorStats: { followerCount: 5000, videoCount: 10, heartCount: 2500 },
  stats: { playCount: 90000, diggCount: 1200, commentCount: 40, shareCount: 7 },
  music: { id: 'm-1', original: true },
  video: { duration: 21 },
};

describe('buildWatchUrl', () => {
  it('builds the canonical watch url', () => {
    expect(buildWatchUrl('runner.jo', '7300')).toBe('https://www.tiktok.com/@runner.jo/video/7300');
  });
});

describe('ItemEnricher', () => {
  it('derives every field from the detail record', async () => {
    const lookup = new ScriptedLookup({ 'music:m-1': { stats: { videoCount: 1500 } } });
    const enricher = new ItemEnricher(lookup, new Map(), 1000);

    const item = await enricher.enrich({ id: '7300', raw: {} }, DETAIL);

    expect(item).toEqual({
      id: '7300',
      sourceUrl: 'https://www.tiktok.com/@runner.jo/video/7300',
      creator: {
        handle: 'runner.jo',
        followerCount: 5000,
        videoCount: 10,
        totalLikeCount: 2500,
        avgLikesPerVideo: 250,
      },
      createdAt: '2023-11-14T22:13:20.000Z',
      durationSeconds: 21,
      caption: 'morning run #Fitness',
      hashtags: ['#Fitness'],
      sound: { isPopular: true, usageCount: 1500, reason: 'videoCount=1500' },
      stats: { playCount: 90000, likeCount: 1200, commentCount: 40, shareCount: 7 },
    });
    expect(lookup.calls).toEqual(['music:m-1']);
  });

  it('leaves missing fields absent', async () => {
    const enricher = new ItemEnricher(new ScriptedLookup({}), new Map(), 1000);

    const item = await enricher.enrich({ id: '1', raw: {} }, {});

    expect(item.sourceUrl).toBeUndefined();
    expect(item.creator.avgLikesPerVideo).toBeUndefined();
    expect(item.createdAt).toBeUndefined();
    expect(item.caption).toBe('');
    expect(item.sound).toEqual({ isPopular: false, usageCount: undefined, reason: 'no_reason' });
  });

  it('keeps a zero digg count instead of the like count', async () => {
    const enricher = new ItemEnricher(new ScriptedLookup({}), new Map(), 1000);

    const zero = await enricher.enrich({ id: '1', raw: {} }, { stats: { diggCount: 0, likeCount: 9 } });
    const missing = await enricher.enrich({ id: '2', raw: {} }, { stats: { likeCount: 9 } });

    expect(zero.stats.likeCount).toBe(0);
    expect(missing.stats.likeCount).toBe(9);
  });

  it('falls back to the sound lookup when the music lookup fails', async () => {
    const lookup = new ScriptedLookup({
      'music:m-1': new Error('HTTP 500'),
      'sound:m-1': { videoCount: 40 },
    });
    const cache: SoundUsageCache = new Map();
    const enricher = new ItemEnricher(lookup, cache, 1000);

    const entry = await enricher.resolveUsage('m-1');

    expect(entry).toEqual({ status: 'resolved', usageCount: 40 });
    expect(lookup.calls).toEqual(['music:m-1', 'sound:m-1']);
    expect(cache.get('m-1')).toEqual({ status: 'resolved', usageCount: 40 });
  });

  it('caches a failed lookup and does not retry it', async () => {
    const lookup = new ScriptedLookup({
      'music:m-1': new HarvestError(ErrorCode.RATE_LIMITED, 'throttled', true),
      'sound:m-1': new Error('no data'),
    });
    const enricher = new ItemEnricher(lookup, new Map(), 1000);

    const first = await enricher.enrich({ id: 'a', raw: {} }, { music: { id: 'm-1', original: true } });
    const second = await enricher.enrich({ id: 'b', raw: {} }, { music: { id: 'm-1', original: true } });

    expect(first.sound.reason).toBe('error:music: [rate_limited] throttled; sound: no data');
    expect(second.sound.reason).toBe(first.sound.reason);
    expect(lookup.calls).toEqual(['music:m-1', 'sound:m-1']);
  });

  it('records an unresolved entry without an error tag when nothing is found', async () => {
    const lookup = new ScriptedLookup({ 'music:m-2': new Error('HTTP 404') });
    const enricher = new ItemEnricher(lookup, new Map(), 1000);

    const entry = await enricher.resolveUsage('m-2');

    expect(entry).toEqual({ status: 'unresolved', error: undefined });
  });

  it('marks a non-original sound popular even when lookups fail', async () => {
    const lookup = new ScriptedLookup({ 'music:m-3': new Error('a'), 'sound:m-3': new Error('b') });
    const enricher = new ItemEnricher(lookup, new Map(), 1000);

    const item = await enricher.enrich({ id: 'c', raw: {} }, { music: { id: 'm-3', original: false } });

    expect(item.sound.isPopular).toBe(true);
    expect(item.sound.reason).toBe('non_original_sound|error:music: a; sound: b');
  });
});
