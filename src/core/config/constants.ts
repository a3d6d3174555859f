// src/core/config/constants.ts
export const DEFAULT_TIMEOUT = 30000; // 30 seconds

export const DEFAULT_TARGET_COUNT = 1000;
export const DEFAULT_PAGE_SIZE = 20;
export const DEFAULT_MAX_LOOPS = 999999;
export const DEFAULT_RESET_AFTER_ERRORS = 3;
export const DEFAULT_BACKOFF_BASE_SEC = 2.0;
export const DEFAULT_BACKOFF_MAX_SEC = 30.0;
export const DEFAULT_JITTER_SEC = 0.8;
export const DEFAULT_POPULAR_SOUND_MIN_USES = 1000;

/** Exponent cap for page backoff: 2^6 * base. */
export const BACKOFF_EXPONENT_CAP = 6;

/** Politeness pauses, in seconds. */
export const ITEM_PAUSE_RANGE: readonly [number, number] = [0.3, 0.9];
export const PAGE_PAUSE_RANGE: readonly [number, number] = [1.2, 2.5];

export const PLATFORM_ORIGIN = 'https://www.tiktok.com';
export const TRENDING_ENDPOINT = '/api/recommend/item_list/';
export const ITEM_DETAIL_ENDPOINT = '/api/item/detail/';
export const MUSIC_DETAIL_ENDPOINT = '/api/music/detail/';
export const SESSION_SETTLE_MS = 2000;

export const MEDIA_EXTENSION = 'mp4';

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
