// src/core/types/index.ts
export type BrowserEngine = 'chromium' | 'firefox' | 'webkit';

export interface BrowserSettings {
  engine: BrowserEngine;
  headless: boolean;
}

export interface BrowserConfig {
  name: string;
  installName: string;
}

/** Nested field bag as returned by the platform; shapes are never trusted. */
export type RawItemRecord = Record<string, unknown>;

export type RawEntityRecord = Record<string, unknown>;

export type SecondaryEntityKind = 'music' | 'sound';

export interface ItemRef {
  id?: string;
  handle?: string;
  raw: RawItemRecord;
}

export interface CreatorInfo {
  handle?: string;
  followerCount?: number;
  videoCount?: number;
  totalLikeCount?: number;
  avgLikesPerVideo?: number;
}

export interface SoundSignal {
  isPopular: boolean;
  usageCount?: number;
  reason: string;
}

export interface ItemStats {
  playCount?: number;
  likeCount?: number;
  commentCount?: number;
  shareCount?: number;
}

export interface CapturedItem {
  id: string;
  sourceUrl?: string;
  creator: CreatorInfo;
  createdAt?: string;
  durationSeconds?: number;
  caption: string;
  hashtags: string[];
  sound: SoundSignal;
  stats: ItemStats;
  /** Where the media bytes were written. Present only on captured items. */
  mediaPath: string;
}

export type EnrichedItem = Omit<CapturedItem, 'mediaPath'>;

export type SoundUsageEntry =
  | { status: 'resolved'; usageCount: number }
  | { status: 'unresolved'; error?: string };

/** Absent key: never looked up. */
export type SoundUsageCache = Map<string, SoundUsageEntry>;

export interface RunState {
  targetCount: number;
  capturedCount: number;
  seenIds: Set<string>;
  consecutiveErrorCount: number;
  loopCount: number;
  soundUsageCache: SoundUsageCache;
}

export interface IngestionSummary {
  capturedCount: number;
  targetCount: number;
  reachedTarget: boolean;
  stopped: boolean;
  loops: number;
  pageFailures: number;
  itemFailures: number;
  duplicatesSkipped: number;
  sessionResets: number;
  durationMs: number;
}

export interface BackoffPolicy {
  baseSeconds: number;
  maxSeconds: number;
  jitterSeconds: number;
  /** Consecutive failures that force a session reset. */
  resetAfterErrors: number;
}

export interface HarvestConfig {
  credentialToken?: string;
  downloadDir: string;
  csvPath: string;
  jsonlPath: string;
  targetCount: number;
  pageSize: number;
  maxLoops: number;
  backoff: BackoffPolicy;
  popularityThreshold: number;
  browser: BrowserSettings;
  resume: boolean;
}
