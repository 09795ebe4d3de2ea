import { formatSigned, splitReadout } from '../format/duration';
import type { RunSnapshot, SegmentDelta, SegmentInfo, TimerReadout, TimingMethod } from '../shared/types';
import { classifySplit, hasRecordedBest } from './classify';
import { formatSegmentDelta, formatSegmentTime, formatSplitTime, type RenderContext } from './context';
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

const DEFAULT_COMPARISON_LABEL = 'PB';

export function timerReadout(run: RunSnapshot, ctx: RenderContext): TimerReadout {
  const ms = currentAttemptMs(run);
  const text = formatSigned(ms, ctx.formats.timer.getPattern(Math.abs(ms)));
  return { text, ...splitReadout(text) };
}

/** Best and comparison durations of the selected segment, or the current one */
export function selectedSegmentInfo(
  run: RunSnapshot,
  ctx: RenderContext,
  selectedIndex: number | null = null,
): SegmentInfo | null {
  if (run.segments.length === 0) return null;
  const method = resolveTimingMethod(run, ctx.config.general.useGameTime);
  const wanted = selectedIndex ?? run.currentSplitIndex ?? 0;
  const index = Math.max(0, Math.min(wanted, run.segments.length - 1));
  const segment = run.segments[index];

  return {
    bestLabel: 'Best:',
    best: formatSplitTime(segment.bestSegmentTime, method, ctx),
    comparisonLabel: `${ctx.config.general.comparison ?? DEFAULT_COMPARISON_LABEL}:`,
    comparison: formatSegmentTime(segmentComparisonMs(run, index, method), ctx),
  };
}

/** Index and own duration of the last completed segment, if it has a split */
function previousSegment(run: RunSnapshot, method: TimingMethod) {
  const current = run.currentSplitIndex;
  if (current === null || current <= 0) return null;
  const index = Math.min(current, run.segments.length) - 1;
  const splitMs = pickTime(run.segments[index].splitTime, method);
  if (splitMs === null || splitMs === 0) return null;
  return { index, durationMs: saturatingSub(splitMs, previousSplitMs(run, index, method)) };
}

/** How the previous segment did against the comparison's segment */
export function previousSegmentDiff(run: RunSnapshot, ctx: RenderContext): SegmentDelta | null {
  const method = resolveTimingMethod(run, ctx.config.general.useGameTime);
  const prev = previousSegment(run, method);
  if (prev === null) return null;

  const segment = run.segments[prev.index];
  if (!comparisonTotalMs(segment, run.currentComparison, method)) return null;

  const comparisonMs = segmentComparisonMs(run, prev.index, method);
  const diffMs = prev.durationMs - comparisonMs;
  return {
    index: prev.index,
    value: formatSegmentDelta(diffMs, ctx),
    splitClass: classifySplit({
      comparisonMs,
      splitMs: prev.durationMs,
      diffMs,
      goldMs: bestSegmentMs(segment, method),
      running: false,
    }),
  };
}

/** How the previous segment did against its best recorded duration */
export function previousSegmentBest(run: RunSnapshot, ctx: RenderContext): SegmentDelta | null {
  const method = resolveTimingMethod(run, ctx.config.general.useGameTime);
  const prev = previousSegment(run, method);
  if (prev === null) return null;

  const goldMs = bestSegmentMs(run.segments[prev.index], method);
  if (goldMs === null || !hasRecordedBest(goldMs)) return null;

  const diffMs = prev.durationMs - goldMs;
  return {
    index: prev.index,
    value: formatSegmentDelta(diffMs, ctx),
    splitClass: classifySplit({
      comparisonMs: goldMs,
      splitMs: prev.durationMs,
      diffMs,
      goldMs,
      running: false,
    }),
  };
}
