// src/core/enrich/enricher.ts
import { describeError } from '../errors.js';
import type { SecondaryLookup } from '../source/types.js';
import type {
  EnrichedItem,
  ItemRef,
  RawItemRecord,
  SecondaryEntityKind,
  SoundUsageCache,
  SoundUsageEntry,
} from '../types/index.js';
import { PLATFORM_ORIGIN } from '../config/constants.js';
import {
  averageLikesPerVideo,
  classifySound,
  extractHashtags,
  readSoundId,
  readUsageCount,
  toIsoTimestamp,
} from './fields.js';
import { asId, asNumber, asRecord, asString, pick } from './raw.js';

/** Secondary entity kinds, in lookup order. */
const LOOKUP_ORDER: readonly SecondaryEntityKind[] = ['music', 'sound'];

export function buildWatchUrl(handle: string, id: string): string {
  return `${PLATFORM_ORIGIN}/@${encodeURIComponent(handle)}/video/${encodeURIComponent(id)}`;
}

export class ItemEnricher {
  constructor(
    private lookup: SecondaryLookup,
    private cache: SoundUsageCache,
    private popularityThreshold: number
  ) {}

  async enrich(ref: ItemRef, detail: RawItemRecord): Promise<EnrichedItem> {
    const id = ref.id ?? asId(detail.id) ?? '';
    const handle = ref.handle ?? asString(pick(detail, 'author', 'uniqueId'));

    const authorStats = asRecord(detail.authorStats);
    const followerCount = asNumber(authorStats?.followerCount);
    const videoCount = asNumber(authorStats?.videoCount);
    const totalLikeCount = asNumber(authorStats?.heartCount);

    const stats = asRecord(detail.stats);
    const music = asRecord(detail.music);
    const usage = await this.resolveUsage(readSoundId(music));

    return {
      id,
      sourceUrl: handle ? buildWatchUrl(handle, id) : undefined,
      creator: {
        handle,
        followerCount,
        videoCount,
        totalLikeCount,
        avgLikesPerVideo: averageLikesPerVideo(authorStats?.videoCount, authorStats?.heartCount),
      },
      createdAt: toIsoTimestamp(detail.createTime),
      durationSeconds: asNumber(pick(detail, 'video', 'duration')),
      caption: typeof detail.desc === 'string' ? detail.desc : '',
      hashtags: extractHashtags(detail),
      sound: classifySound({
        music,
        usageCount: usage?.status === 'resolved' ? usage.usageCount : undefined,
        lookupError: usage?.status === 'unresolved' ? usage.error : undefined,
        threshold: this.popularityThreshold,
      }),
      stats: {
        playCount: asNumber(stats?.playCount),
        likeCount: asNumber(stats?.diggCount) ?? asNumber(stats?.likeCount),
        commentCount: asNumber(stats?.commentCount),
        shareCount: asNumber(stats?.shareCount),
      },
    };
  }

  /**
   * Cached usage count for a sound. Failed lookups are cached as
   * `unresolved` so a recurring sound is only looked up once per run.
   */
  async resolveUsage(soundId: string | undefined): Promise<SoundUsageEntry | undefined> {
    if (!soundId) {
      return undefined;
    }

    const cached = this.cache.get(soundId);
    if (cached) {
      return cached;
    }

    const errors: string[] = [];
    let entry: SoundUsageEntry | undefined;
    for (const kind of LOOKUP_ORDER) {
      try {
        const entity = await this.lookup.fetchSecondaryEntity(kind, soundId);
        const usageCount = entity ? readUsageCount(entity) : undefined;
        if (usageCount !== undefined) {
          entry = { status: 'resolved', usageCount };
          break;
        }
      } catch (error) {
        errors.push(`${kind}: ${describeError(error)}`);
      }
    }

    // An error tag only when every attempt raised.
    const resolved: SoundUsageEntry = entry ?? {
      status: 'unresolved',
      error: errors.length === LOOKUP_ORDER.length ? errors.join('; ') : undefined,
    };
    this.cache.set(soundId, resolved);
    return resolved;
  }
}
