import type { RunSnapshot, SegmentSnapshot, Time, TimingMethod } from '../shared/types';

/** Game time when configured, or when the timer itself is on game time */
export function resolveTimingMethod(run: RunSnapshot, useGameTime: boolean): TimingMethod {
  return useGameTime || run.timingMethod === 'gameTime' ? 'gameTime' : 'realTime';
}

export function pickTime(time: Time | undefined, method: TimingMethod): number | null {
  return time?.[method] ?? null;
}

/** Clock-face subtraction: never below zero */
export function saturatingSub(a: number, b: number): number {
  return Math.max(0, a - b);
}

/**
 * Elapsed attempt time as shown on the main readout. Signed: a negative
 * run offset counts down to zero before the run starts.
 */
export function currentAttemptMs(run: RunSnapshot): number {
  const loading = run.timingMethod === 'gameTime' ? run.loadingMs : 0;
  return run.attemptMs + run.offsetMs - (run.pauseMs ?? 0) - loading;
}

export function comparisonTotalMs(
  segment: SegmentSnapshot,
  comparison: string,
  method: TimingMethod,
): number | null {
  return pickTime(segment.comparisons[comparison], method);
}

/** Comparison split time of the segment before `index`; zero for the first */
export function previousComparisonMs(run: RunSnapshot, index: number, method: TimingMethod): number {
  if (index <= 0) return 0;
  return comparisonTotalMs(run.segments[index - 1], run.currentComparison, method) ?? 0;
}

/**
 * Latest split time recorded before `index` in this attempt. Skipped
 * segments have none, so the search walks back; zero before the first.
 */
export function previousSplitMs(run: RunSnapshot, index: number, method: TimingMethod): number {
  for (let i = index - 1; i >= 0; i--) {
    const ms = pickTime(run.segments[i].splitTime, method);
    if (ms !== null) return ms;
  }
  return 0;
}

/**
 * The comparison's own duration for one segment. Absolute, since a later
 * comparison split can be recorded shorter than the one before it.
 */
export function segmentComparisonMs(run: RunSnapshot, index: number, method: TimingMethod): number {
  const total = comparisonTotalMs(run.segments[index], run.currentComparison, method) ?? 0;
  return Math.abs(total - previousComparisonMs(run, index, method));
}

export function bestSegmentMs(segment: SegmentSnapshot, method: TimingMethod): number | null {
  return pickTime(segment.bestSegmentTime, method);
}
