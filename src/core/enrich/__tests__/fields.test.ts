// src/core/enrich/__tests__/fields.test.ts
import {
  averageLikesPerVideo,
  classifySound,
  extractHashtags,
  readSoundId,
  readUsageCount,
  toIsoTimestamp,
} from '../fields.js';

describe('toIsoTimestamp', () => {
  it('converts epoch seconds to UTC ISO-8601', () => {
    expect(toIsoTimestamp(1700000000)).toBe('2023-11-14T22:13:20.000Z');
  });

  it('truncates fractional seconds and accepts integer strings', () => {
    expect(toIsoTimestamp(1700000000.9)).toBe('2023-11-14T22:13:20.000Z');
    expect(toIsoTimestamp('1700000000')).toBe('2023-11-14T22:13:20.000Z');
  });

  it('returns undefined for unparsable values', () => {
    expect(toIsoTimestamp('yesterday')).toBeUndefined();
    expect(toIsoTimestamp(undefined)).toBeUndefined();
    expect(toIsoTimestamp(Number.NaN)).toBeUndefined();
    expect(toIsoTimestamp(1e20)).toBeUndefined();
  });
});

describe('extractHashtags', () => {
  it('falls back to caption tokens with case-insensitive dedup', () => {
    expect(extractHashtags({ desc: 'check this #Fun #fun #NEW' })).toEqual(['#Fun', '#NEW']);
  });

  it('prefers structured annotations over the caption', () => {
    const data = {
      desc: 'caption #Ignored',
      textExtra: [{ hashtagName: 'Dance' }, { hashtagName: '' }, { userId: '42' }, { hashtagName: 'dance' }],
    };
    expect(extractHashtags(data)).toEqual(['#Dance']);
  });

  it('skips a bare hash sign', () => {
    expect(extractHashtags({ desc: '# alone #ok' })).toEqual(['#ok']);
  });

  it('returns an empty list without a caption', () => {
    expect(extractHashtags({})).toEqual([]);
  });
});

describe('averageLikesPerVideo', () => {
  it('divides total likes by video count', () => {
    expect(averageLikesPerVideo(4, 100)).toBe(25);
  });

  it('is absent for zero or missing video counts', () => {
    expect(averageLikesPerVideo(0, 100)).toBeUndefined();
    expect(averageLikesPerVideo(undefined, 100)).toBeUndefined();
    expect(averageLikesPerVideo(4, undefined)).toBeUndefined();
  });
});

describe('readSoundId', () => {
  it('reads id, then musicId, then idStr', () => {
    expect(readSoundId({ id: '7001' })).toBe('7001');
    expect(readSoundId({ musicId: 7002 })).toBe('7002');
    expect(readSoundId({ idStr: '7003' })).toBe('7003');
    expect(readSoundId(undefined)).toBeUndefined();
  });
});

describe('readUsageCount', () => {
  it('prefers nested stats over the top-level field', () => {
    expect(readUsageCount({ stats: { videoCount: 12 }, videoCount: 99 })).toBe(12);
    expect(readUsageCount({ videoCount: 99 })).toBe(99);
    expect(readUsageCount({ videoCount: 'many' })).toBeUndefined();
  });
});

describe('classifySound', () => {
  it('marks non-original sounds popular without a usage count', () => {
    expect(classifySound({ music: { original: false }, threshold: 1000 })).toEqual({
      isPopular: true,
      usageCount: undefined,
      reason: 'non_original_sound',
    });
  });

  it('marks sounds at or above the threshold popular', () => {
    const signal = classifySound({ music: { original: true }, usageCount: 1500, threshold: 1000 });
    expect(signal.isPopular).toBe(true);
    expect(signal.reason).toBe('videoCount=1500');
  });

  it('records the usage count when below the threshold', () => {
    expect(classifySound({ music: { original: true }, usageCount: 50, threshold: 1000 })).toEqual({
      isPopular: false,
      usageCount: 50,
      reason: 'videoCount=50',
    });
  });

  it('joins every condition that fired', () => {
    const signal = classifySound({ music: { original: false }, usageCount: 2000, threshold: 1000 });
    expect(signal.reason).toBe('non_original_sound|videoCount=2000');
  });

  it('tags a failed lookup and otherwise reports no reason', () => {
    expect(classifySound({ music: {}, lookupError: 'music: boom', threshold: 1000 }).reason).toBe(
      'error:music: boom'
    );
    expect(classifySound({ music: {}, threshold: 1000 })).toEqual({
      isPopular: false,
      usageCount: undefined,
      reason: 'no_reason',
    });
  });
});
