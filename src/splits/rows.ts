import { NO_DURATION } from '../format/duration';
import type { RunSnapshot, SegmentSnapshot, SplitRow, TimingMethod } from '../shared/types';
import { classifySplit, hasRecordedBest } from './classify';
import { formatSegmentDelta, formatSplitTime, type RenderContext } from './context';
import {
  bestSegmentMs,
  comparisonTotalMs,
  currentAttemptMs,
  pickTime,
  previousSplitMs,
  resolveTimingMethod,
  saturatingSub,
  segmentComparisonMs,
} from './timing';

type Cell = Pick<SplitRow, 'value' | 'splitClass'>;

/** The segment in progress shows its live delta once it is behind or past its best */
function currentCell(
  run: RunSnapshot,
  segment: SegmentSnapshot,
  index: number,
  method: TimingMethod,
  ctx: RenderContext,
): Cell | null {
  const comparisonMs = comparisonTotalMs(segment, run.currentComparison, method) ?? 0;
  const attemptMs = currentAttemptMs(run);
  const diffMs = attemptMs - comparisonMs;
  const runningMs = saturatingSub(attemptMs, previousSplitMs(run, index, method));
  const goldMs = bestSegmentMs(segment, method);

  if (diffMs <= 0 && !(goldMs !== null && hasRecordedBest(goldMs) && runningMs >= goldMs)) return null;

  return {
    value: formatSegmentDelta(diffMs, ctx),
    splitClass: classifySplit({
      comparisonMs: segmentComparisonMs(run, index, method),
      splitMs: runningMs,
      diffMs,
      goldMs,
      running: true,
    }),
  };
}

function completedCell(
  run: RunSnapshot,
  segment: SegmentSnapshot,
  index: number,
  method: TimingMethod,
  ctx: RenderContext,
): Cell {
  const splitMs = pickTime(segment.splitTime, method);
  if (splitMs === null) return { value: NO_DURATION, splitClass: 'none' }; // skipped

  const comparisonMs = comparisonTotalMs(segment, run.currentComparison, method) ?? 0;
  const diffMs = splitMs - comparisonMs;
  const value = ctx.config.general.splitFormat === 'time'
    ? formatSplitTime(segment.splitTime, method, ctx)
    : formatSegmentDelta(diffMs, ctx);

  return {
    value,
    splitClass: classifySplit({
      comparisonMs: segmentComparisonMs(run, index, method),
      splitMs: saturatingSub(splitMs, previousSplitMs(run, index, method)),
      diffMs,
      goldMs: bestSegmentMs(segment, method),
      running: false,
    }),
  };
}

/**
 * One row per segment. Upcoming segments show the comparison split time,
 * completed ones their split time or delta, the current one its live delta.
 */
export function computeSplitRows(run: RunSnapshot, ctx: RenderContext): SplitRow[] {
  const method = resolveTimingMethod(run, ctx.config.general.useGameTime);
  const current = run.currentSplitIndex;
  // Only a live attempt has a segment in progress
  const live = run.phase === 'running' || run.phase === 'paused';

  return run.segments.map((segment, index) => {
    const row: SplitRow = {
      index,
      name: segment.name,
      value: formatSplitTime(segment.comparisons[run.currentComparison], method, ctx),
      current: live && index === current,
      splitClass: 'none',
    };
    if (current === null || index > current) return row;
    if (index === current) {
      if (!live) return row;
      return { ...row, ...currentCell(run, segment, index, method, ctx) };
    }
    return { ...row, ...completedCell(run, segment, index, method, ctx) };
  });
}
