// src/core/dedupe/__tests__/tracker.test.ts
import { ProgressTracker, createRunState } from '../tracker.js';

describe('createRunState', () => {
  it('starts empty with the given target', () => {
    const state = createRunState(5);

    expect(state).toMatchObject({ targetCount: 5, capturedCount: 0, consecutiveErrorCount: 0, loopCount: 0 });
    expect(state.seenIds.size).toBe(0);
    expect(state.soundUsageCache.size).toBe(0);
  });

  it('seeds the seen set with known ids', () => {
    const state = createRunState(5, ['a', 'b']);

    expect([...state.seenIds]).toEqual(['a', 'b']);
    expect(state.capturedCount).toBe(0);
  });
});

describe('ProgressTracker', () => {
  it('counts captures towards the target', () => {
    const tracker = new ProgressTracker(createRunState(2));

    expect(tracker.remaining()).toBe(2);
    expect(tracker.markCaptured('a')).toBe(1);
    expect(tracker.hasSeen('a')).toBe(true);
    expect(tracker.isComplete()).toBe(false);
    expect(tracker.markCaptured('b')).toBe(2);
    expect(tracker.isComplete()).toBe(true);
    expect(tracker.remaining()).toBe(0);
  });

  it('treats preloaded ids as seen without counting them', () => {
    const tracker = new ProgressTracker(createRunState(1, ['old']));

    expect(tracker.hasSeen('old')).toBe(true);
    expect(tracker.capturedCount).toBe(0);
    expect(tracker.isComplete()).toBe(false);
  });
});
