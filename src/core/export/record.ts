// src/core/export/record.ts
import type { CapturedItem } from '../types/index.js';

export const TABULAR_COLUMNS = [
  'video_id',
  'watch_url',
  'username',
  'creator_followers',
  'creator_video_count',
  'creator_total_likes',
  'avg_likes_per_video',
  'create_time_iso',
  'video_duration_sec',
  'hashtags',
  'uses_popular_sound',
  'music_uses_count',
  'popular_sound_reason',
  'caption',
  'play_count',
  'like_count',
  'comment_count',
  'share_count',
  'download_path',
] as const;

export type TabularColumn = (typeof TABULAR_COLUMNS)[number];

export type RecordValue = string | number | boolean | string[] | null;

export type OutputRecord = Record<TabularColumn, RecordValue>;

/** One flat record per item, keyed by the tabular column names. */
export function toOutputRecord(item: CapturedItem): OutputRecord {
  return {
    video_id: item.id,
    watch_url: item.sourceUrl ?? null,
    username: item.creator.handle ?? null,
    creator_followers: item.creator.followerCount ?? null,
    creator_video_count: item.creator.videoCount ?? null,
    creator_total_likes: item.creator.totalLikeCount ?? null,
    avg_likes_per_video: item.creator.avgLikesPerVideo ?? null,
    create_time_iso: item.createdAt ?? null,
    video_duration_sec: item.durationSeconds ?? null,
    hashtags: item.hashtags,
    uses_popular_sound: item.sound.isPopular,
    music_uses_count: item.sound.usageCount ?? null,
    popular_sound_reason: item.sound.reason,
    caption: item.caption,
    play_count: item.stats.playCount ?? null,
    like_count: item.stats.likeCount ?? null,
    comment_count: item.stats.commentCount ?? null,
    share_count: item.stats.shareCount ?? null,
    download_path: item.mediaPath,
  };
}

export function formatCsvField(value: RecordValue): string {
  if (value === null) {
    return '';
  }
  const text = Array.isArray(value) ? value.join(' ') : String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatCsvRow(values: readonly RecordValue[]): string {
  return values.map(formatCsvField).join(',') + '\n';
}

export function formatCsvHeader(): string {
  return formatCsvRow(TABULAR_COLUMNS);
}

export function formatCsvRecord(record: OutputRecord): string {
  return formatCsvRow(TABULAR_COLUMNS.map((column) => record[column]));
}

export function formatJsonLine(record: OutputRecord): string {
  return JSON.stringify(record) + '\n';
}
