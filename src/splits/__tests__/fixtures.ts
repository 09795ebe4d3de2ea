import type { RunSnapshot, SegmentSnapshot, Time } from '../../shared/types';

export const PB = 'Personal Best';

export function time(realTime: number | null, gameTime: number | null = realTime): Time {
  return { realTime, gameTime };
}

interface SegmentTimes {
  pb?: Time | number | null;
  best?: Time | number | null;
  split?: Time | number | null;
}

function toTime(value: Time | number | null | undefined): Time {
  if (value === undefined || value === null) return time(null);
  return typeof value === 'number' ? time(value) : value;
}

export function segment(name: string, times: SegmentTimes = {}): SegmentSnapshot {
  return {
    name,
    comparisons: { [PB]: toTime(times.pb) },
    bestSegmentTime: toTime(times.best),
    splitTime: toTime(times.split),
  };
}

export function runSnapshot(overrides: Partial<RunSnapshot> = {}): RunSnapshot {
  return {
    phase: 'running',
    segments: [],
    currentSplitIndex: 0,
    currentComparison: PB,
    timingMethod: 'realTime',
    attemptMs: 0,
    offsetMs: 0,
    pauseMs: null,
    loadingMs: 0,
    ...overrides,
  };
}

/** Three segments: PB splits at 1:00, 2:10 and 3:20; bests of 55s, 65s and 68s */
export function threeSegments(splits: Array<number | null> = [null, null, null]): SegmentSnapshot[] {
  return [
    segment('Forest', { pb: 60_000, best: 55_000, split: splits[0] }),
    segment('Castle', { pb: 130_000, best: 65_000, split: splits[1] }),
    segment('Tower', { pb: 200_000, best: 68_000, split: splits[2] }),
  ];
}
