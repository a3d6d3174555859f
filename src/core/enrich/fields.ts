// src/core/enrich/fields.ts
import type { RawEntityRecord, RawItemRecord, SoundSignal } from '../types/index.js';
import { asArray, asId, asInteger, asNumber, asRecord, asString, pick } from './raw.js';

/**
 * Epoch seconds to ISO-8601 UTC. Accepts integers, floats (truncated) and
 * integer strings; returns `undefined` for anything else.
 */
export function toIsoTimestamp(value: unknown): string | undefined {
  let seconds: number | undefined;
  if (typeof value === 'number' && Number.isFinite(value)) {
    seconds = Math.trunc(value);
  } else if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) {
    seconds = Number.parseInt(value, 10);
  }
  if (seconds === undefined) {
    return undefined;
  }

  const date = new Date(seconds * 1000);
  return Number.isNaN(date.getTime()) ? undefined : date.toISOString();
}

/**
 * Structured tag annotations first; caption `#tokens` only when there are none.
 * Distinct case-insensitively, keeping the first casing and order.
 */
export function extractHashtags(data: RawItemRecord): string[] {
  const tags: string[] = [];
  for (const entry of asArray(data.textExtra)) {
    const name = asString(asRecord(entry)?.hashtagName);
    if (name) {
      tags.push(`#${name}`);
    }
  }

  if (tags.length === 0) {
    const caption = asString(data.desc) ?? '';
    for (const token of caption.split(/\s+/)) {
      if (token.startsWith('#') && token.length > 1) {
        tags.push(token);
      }
    }
  }

  const seen = new Set<string>();
  const unique: string[] = [];
  for (const tag of tags) {
    const key = tag.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(tag);
    }
  }
  return unique;
}

/** Absent (not zero) unless videoCount is a positive integer. */
export function averageLikesPerVideo(videoCount: unknown, totalLikeCount: unknown): number | undefined {
  const videos = asInteger(videoCount);
  const likes = asNumber(totalLikeCount);
  if (videos === undefined || videos <= 0 || likes === undefined) {
    return undefined;
  }
  return likes / videos;
}

export function readSoundId(music: Record<string, unknown> | undefined): string | undefined {
  if (!music) {
    return undefined;
  }
  return asId(music.id) ?? asId(music.musicId) ?? asId(music.idStr);
}

/** `stats.videoCount`, else top-level `videoCount`; integers only. */
export function readUsageCount(entity: RawEntityRecord): number | undefined {
  return asInteger(pick(entity, 'stats', 'videoCount')) ?? asInteger(entity.videoCount);
}

export interface SoundClassification {
  music?: Record<string, unknown>;
  usageCount?: number;
  lookupError?: string;
  threshold: number;
}

export function classifySound({ music, usageCount, lookupError, threshold }: SoundClassification): SoundSignal {
  const nonOriginal = music?.original === false;
  const reasons: string[] = [];

  if (nonOriginal) {
    reasons.push('non_original_sound');
  }
  if (usageCount !== undefined) {
    reasons.push(`videoCount=${usageCount}`);
  } else if (lookupError) {
    reasons.push(`error:${lookupError}`);
  }

  return {
    isPopular: nonOriginal || (usageCount !== undefined && usageCount >= threshold),
    usageCount,
    reason: reasons.length > 0 ? reasons.join('|') : 'no_reason',
  };
}
